import http from "http";
import { parse as parseUrl } from "url";
import express from "express";
import { WebSocketServer, WebSocket } from "ws";
import { EventLog, jsonReplacer } from "@refute/core";
import { DisputeService } from "../services/DisputeService";
import { bindRoutes } from "../routes/index";
import { EventHub } from "./events";
import log from "../logger";

const HEARTBEAT_INTERVAL_MS = 30_000;
const PONG_TIMEOUT_MS = 10_000;

export function createHttpWsServer(service: DisputeService): {
  app: express.Express;
  httpServer: http.Server;
  hub: EventHub;
} {
  const app = express();

  // CORS: any origin may call the devnet API
  app.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.use(express.json());

  bindRoutes(app, service);

  const httpServer = http.createServer(app);
  const eventsWss = new WebSocketServer({ noServer: true });
  const hub = new EventHub();
  service.onEvent((event: EventLog) => hub.broadcast(event));

  httpServer.on("upgrade", (request, socket, head) => {
    const { pathname } = parseUrl(request.url || "");

    // /ws/events
    if (pathname === "/ws/events") {
      eventsWss.handleUpgrade(request, socket, head, (ws) => {
        eventsWss.emit("connection", ws, request);
      });
      return;
    }

    socket.destroy();
  });

  eventsWss.on("connection", (ws: WebSocket) => {
    log.info({ subscribers: hub.size + 1 }, "Event stream connection");
    setupHeartbeat(ws);
    hub.add(ws);
    ws.on("close", () => hub.remove(ws));
    ws.send(JSON.stringify({ type: "HELLO", ...service.health() }, jsonReplacer));
  });

  return { app, httpServer, hub };
}

function setupHeartbeat(ws: WebSocket): void {
  let alive = true;
  let pongTimer: ReturnType<typeof setTimeout> | null = null;

  const interval = setInterval(() => {
    if (!alive) {
      clearInterval(interval);
      ws.terminate();
      return;
    }
    alive = false;
    ws.ping();
    pongTimer = setTimeout(() => {
      if (!alive) {
        clearInterval(interval);
        ws.terminate();
      }
    }, PONG_TIMEOUT_MS);
  }, HEARTBEAT_INTERVAL_MS);

  ws.on("pong", () => {
    alive = true;
    if (pongTimer) {
      clearTimeout(pongTimer);
      pongTimer = null;
    }
  });

  ws.on("close", () => {
    clearInterval(interval);
    if (pongTimer) clearTimeout(pongTimer);
  });
}
