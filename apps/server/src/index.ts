import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { getAddress } from "ethers";
import { parseBytes32 } from "@refute/core";
import { alphabetOutputRoot } from "@refute/vm-alphabet";
import config from "./config";
import log from "./logger";
import { DisputeService } from "./services/DisputeService";
import { createHttpWsServer } from "./ws/server";

(function main() {
  // 1. Deploy the dispute system on a fresh devnet ledger
  const startingRoot = config.startingAnchorRoot
    ? parseBytes32(config.startingAnchorRoot)
    : alphabetOutputRoot(config.startingSequenceNumber);
  const service = new DisputeService(
    {
      deployer: getAddress(config.deployer),
      owner: getAddress(config.owner),
      guardian: getAddress(config.guardian),
      gameType: config.gameType,
      maxGameDepth: config.maxGameDepth,
      splitDepth: config.splitDepth,
      clockExtension: config.clockExtension,
      maxClockDuration: config.maxClockDuration,
      bondCurve: config.bondCurve,
      l2ChainId: config.l2ChainId,
      withdrawalDelaySeconds: config.withdrawalDelaySeconds,
      finalityDelaySeconds: config.finalityDelaySeconds,
      startingAnchor: { root: startingRoot, l2SequenceNumber: config.startingSequenceNumber },
    },
    log
  );

  // 2. Start HTTP + WebSocket server
  const { httpServer, hub } = createHttpWsServer(service);
  httpServer.listen(config.port, () => {
    log.info({ port: config.port }, "HTTP/WS server listening");
  });

  log.info("Dispute devnet started");

  // Graceful shutdown
  const shutdown = () => {
    log.info("Shutting down...");
    hub.closeAll();
    httpServer.close(() => process.exit(0));
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
})();
