import WebSocket from "ws";
import { EventLog, jsonReplacer } from "@refute/core";

/**
 * Fans ledger events out to every connected event-stream socket.
 */
export class EventHub {
  private sockets = new Set<WebSocket>();

  get size(): number {
    return this.sockets.size;
  }

  add(ws: WebSocket): void {
    this.sockets.add(ws);
  }

  remove(ws: WebSocket): void {
    this.sockets.delete(ws);
  }

  /** Broadcast a ledger event to every open socket */
  broadcast(event: EventLog): void {
    const payload = JSON.stringify({ type: "EVENT", event }, jsonReplacer);
    for (const ws of this.sockets) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(payload);
      }
    }
  }

  closeAll(): void {
    for (const ws of this.sockets) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.close();
      }
    }
    this.sockets.clear();
  }
}
