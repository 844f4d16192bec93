import { Express, Request, Response } from "express";
import {
  Address,
  isHexBytes,
  isRevert,
  parseAddress,
  parseBytes32,
  parseUint,
} from "@refute/core";
import { DisputeService, NotFoundError } from "../services/DisputeService";
import log from "../logger";

/** A field of the JSON body, or undefined when the body has none. */
function field(req: Request, key: string): unknown {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null || !(key in body)) {
    return undefined;
  }
  return Reflect.get(body, key);
}

function requireAddress(req: Request, key: string): Address {
  const value = field(req, key);
  if (value === undefined) {
    throw new TypeError(`${key} required`);
  }
  return parseAddress(value);
}

function optionalAddress(req: Request, key: string): Address | undefined {
  const value = field(req, key);
  return value === undefined ? undefined : parseAddress(value);
}

function requireUint(req: Request, key: string): bigint {
  const value = field(req, key);
  if (value === undefined) {
    throw new TypeError(`${key} required`);
  }
  return parseUint(value);
}

function optionalUint(req: Request, key: string): bigint | undefined {
  const value = field(req, key);
  return value === undefined ? undefined : parseUint(value);
}

function requireIndex(req: Request, key: string): number {
  const value = requireUint(req, key);
  if (value > 0xffffffffn) {
    throw new RangeError(`${key} out of range`);
  }
  return Number(value);
}

function requireHex(req: Request, key: string, fallback?: string): string {
  const value = field(req, key) ?? fallback;
  if (!isHexBytes(value)) {
    throw new TypeError(`${key} must be 0x-prefixed hex bytes`);
  }
  return value;
}

function requireBool(req: Request, key: string): boolean {
  const value = field(req, key);
  if (typeof value !== "boolean") {
    throw new TypeError(`${key} must be a boolean`);
  }
  return value;
}

function sendError(res: Response, err: unknown): void {
  if (isRevert(err)) {
    res.status(400).json({ error: err.message, reason: err.reason });
    return;
  }
  if (err instanceof NotFoundError) {
    res.status(404).json({ error: err.message });
    return;
  }
  if (err instanceof TypeError || err instanceof RangeError) {
    res.status(400).json({ error: err.message });
    return;
  }
  const message = err instanceof Error ? err.message : String(err);
  log.error({ err: message }, "Request failed");
  res.status(500).json({ error: message });
}

/** Run `handler` and send its result as JSON, mapping failures to status codes. */
function respond(handler: (req: Request) => unknown) {
  return (req: Request, res: Response): void => {
    try {
      res.json(handler(req));
    } catch (err) {
      sendError(res, err);
    }
  };
}

export function bindRoutes(app: Express, service: DisputeService): void {
  // Health check
  app.get("/health/check", respond(() => ({ status: "ok", ...service.health() })));

  app.get(
    "/api/anchors/:gameType",
    respond((req) => service.anchor(requireGameType(req.params.gameType)))
  );

  // Games
  app.get("/api/games", respond(() => ({ games: service.listGames() })));

  app.get("/api/games/:address", respond((req) => service.getGame(parseAddress(req.params.address))));

  app.get(
    "/api/games/:address/validity",
    respond((req) => service.validity(parseAddress(req.params.address)))
  );

  app.get(
    "/api/games/:address/credit/:recipient",
    respond((req) => service.credit(parseAddress(req.params.address), parseAddress(req.params.recipient)))
  );

  app.post(
    "/api/games",
    respond((req) =>
      service.createGame(
        requireAddress(req, "caller"),
        parseBytes32(field(req, "rootClaim")),
        requireUint(req, "l2SequenceNumber"),
        optionalUint(req, "value")
      )
    )
  );

  for (const [route, isAttack] of [
    ["attack", true],
    ["defend", false],
  ] as const) {
    app.post(
      `/api/games/:address/${route}`,
      respond((req) => {
        const disputed = field(req, "disputed");
        return service.move(parseAddress(req.params.address), requireAddress(req, "caller"), {
          parentIndex: requireIndex(req, "parentIndex"),
          claim: parseBytes32(field(req, "claim")),
          isAttack,
          disputed: disputed === undefined ? undefined : parseBytes32(disputed),
          value: optionalUint(req, "value"),
        });
      })
    );
  }

  app.post(
    "/api/games/:address/step",
    respond((req) =>
      service.step(
        parseAddress(req.params.address),
        requireAddress(req, "caller"),
        requireIndex(req, "claimIndex"),
        requireBool(req, "isAttack"),
        requireHex(req, "stateData"),
        requireHex(req, "proof", "0x")
      )
    )
  );

  app.post(
    "/api/games/:address/resolve-claim",
    respond((req) =>
      service.resolveClaim(
        parseAddress(req.params.address),
        requireAddress(req, "caller"),
        requireIndex(req, "claimIndex"),
        field(req, "numToResolve") === undefined ? 0 : requireIndex(req, "numToResolve")
      )
    )
  );

  app.post(
    "/api/games/:address/resolve",
    respond((req) => service.resolve(parseAddress(req.params.address), requireAddress(req, "caller")))
  );

  app.post(
    "/api/games/:address/close",
    respond((req) => service.closeGame(parseAddress(req.params.address), requireAddress(req, "caller")))
  );

  app.post(
    "/api/games/:address/claim-credit",
    respond((req) => {
      const caller = requireAddress(req, "caller");
      return service.claimCredit(
        parseAddress(req.params.address),
        caller,
        optionalAddress(req, "recipient") ?? caller
      );
    })
  );

  // Escrow
  app.post(
    "/api/escrow/deposit",
    respond((req) => service.escrowDeposit(requireAddress(req, "caller"), requireUint(req, "amount")))
  );

  app.post(
    "/api/escrow/unlock",
    respond((req) =>
      service.escrowUnlock(
        requireAddress(req, "caller"),
        requireAddress(req, "recipient"),
        requireUint(req, "amount")
      )
    )
  );

  app.post(
    "/api/escrow/withdraw",
    respond((req) => {
      const caller = requireAddress(req, "caller");
      return service.escrowWithdraw(caller, optionalAddress(req, "recipient") ?? caller, requireUint(req, "amount"));
    })
  );

  // Guardian
  app.post(
    "/api/guardian/respected-game-type",
    respond((req) => {
      service.setRespectedGameType(requireAddress(req, "caller"), requireIndex(req, "gameType"));
      return { success: true };
    })
  );

  app.post(
    "/api/guardian/blacklist",
    respond((req) => {
      service.blacklist(requireAddress(req, "caller"), requireAddress(req, "game"));
      return { success: true };
    })
  );

  app.post("/api/guardian/retire", respond((req) => service.retire(requireAddress(req, "caller"))));

  app.post(
    "/api/guardian/pause",
    respond((req) => {
      service.pause(requireAddress(req, "caller"), optionalAddress(req, "identifier"));
      return { success: true };
    })
  );

  app.post(
    "/api/guardian/unpause",
    respond((req) => {
      service.unpause(requireAddress(req, "caller"), optionalAddress(req, "identifier"));
      return { success: true };
    })
  );

  // Devnet chain controls
  app.post("/api/chain/warp", respond((req) => service.warp(requireUint(req, "seconds"))));

  app.post(
    "/api/chain/deal",
    respond((req) => service.deal(requireAddress(req, "address"), requireUint(req, "amount")))
  );
}

function requireGameType(value: string): number {
  const gameType = parseUint(value);
  if (gameType > 0xffffffffn) {
    throw new RangeError("gameType out of range");
  }
  return Number(gameType);
}
