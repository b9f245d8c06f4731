import { randomUUID } from "node:crypto";
import type { Server } from "node:http";
import { WebSocketServer, type RawData } from "ws";

import { errorMessage } from "../core/errors.js";
import { Logger, createLogger } from "../logger.js";
import { ClientConnection, SessionFactory } from "./connection.js";

export function frameText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

export interface SessionServerOptions {
  path?: string;
  logger?: Logger;
}

/** Accepts WebSocket clients on `path` and gives each its own search session. */
export class SessionServer {
  private wss: WebSocketServer;
  private connections = new Map<string, ClientConnection>();
  private log: Logger;

  constructor(
    server: Server,
    private createSession: SessionFactory,
    options?: SessionServerOptions,
  ) {
    this.log = options?.logger ?? createLogger("ws");
    this.wss = new WebSocketServer({ server, path: options?.path ?? "/ws" });

    this.wss.on("connection", (socket) => {
      const id = randomUUID();
      const connection = new ClientConnection(id, socket, this.createSession, this.log);
      this.connections.set(id, connection);
      this.log.info(`Client connected (${this.connections.size} open)`, { connectionId: id });

      socket.on("message", (data) => connection.receive(frameText(data)));
      socket.on("close", () => {
        connection.close();
        this.connections.delete(id);
        this.log.info(`Client disconnected (${this.connections.size} open)`, { connectionId: id });
      });
      socket.on("error", (err) => {
        this.log.warn("Socket error", { connectionId: id, error: errorMessage(err) });
      });
    });

    this.wss.on("error", (err) => {
      this.log.error("WebSocket server error", { error: errorMessage(err) });
    });
  }

  get size(): number {
    return this.connections.size;
  }

  /** Closes every live session, then the server itself. */
  close(): Promise<void> {
    for (const connection of this.connections.values()) connection.close();
    this.connections.clear();
    for (const client of this.wss.clients) client.close(1001, "Server shutting down");

    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
