import { randomUUID } from "node:crypto";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { devLog, devWarn, devError, errorMessage } from "../shared/index.js";

const DEFAULT_PORT = 5030;
const DEFAULT_HEARTBEAT_MS = 30_000;
const DEFAULT_MAX_PAYLOAD_BYTES = 16 * 1024 * 1024;
const INITIAL_BACKOFF_MS = 1000;
const MAX_BACKOFF_MS = 30_000;
const MAX_RETRIES = 10;

export interface WsServerOptions {
  /** 0 picks a free port. */
  port?: number;
  /** Interval between liveness pings; 0 disables them. */
  heartbeatMs?: number;
  /** Frames above this size close the connection. */
  maxPayloadBytes?: number;
  onMessage: (clientId: string, data: unknown) => void;
  onDisconnect?: (clientId: string) => void;
}

interface Connection {
  socket: WebSocket;
  /** Cleared on each ping, set again by the pong. */
  alive: boolean;
}

/**
 * JSON-over-WebSocket transport. Every connection gets its own client id;
 * frames are parsed before they reach `onMessage`, and clients that stop
 * answering pings are dropped.
 */
export class WsServer {
  private readonly port: number;
  private readonly heartbeatMs: number;
  private readonly maxPayloadBytes: number;
  private readonly onMessage: (clientId: string, data: unknown) => void;
  private readonly onDisconnect?: (clientId: string) => void;
  private wss: WebSocketServer | null = null;
  private readonly connections = new Map<string, Connection>();
  private heartbeat: ReturnType<typeof setInterval> | null = null;
  private retryCount = 0;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private stopping = false;

  constructor(options: WsServerOptions) {
    this.port = options.port ?? DEFAULT_PORT;
    this.heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
    this.maxPayloadBytes = options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;
    this.onMessage = options.onMessage;
    this.onDisconnect = options.onDisconnect;
  }

  /** Port actually bound, once listening. */
  get boundPort(): number | null {
    const address = this.wss?.address();
    return address && typeof address === "object" ? address.port : null;
  }

  get clientCount(): number {
    return this.connections.size;
  }

  async start(): Promise<void> {
    this.stopping = false;
    this.retryCount = 0;
    await this.bind();
    this.startHeartbeat();
  }

  private bind(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const wss = new WebSocketServer({ port: this.port, maxPayload: this.maxPayloadBytes });
      this.wss = wss;

      wss.on("listening", () => {
        devLog(`WebSocket server listening on port ${this.boundPort ?? this.port}`);
        this.retryCount = 0;
        resolve();
      });

      wss.on("connection", (socket) => this.accept(socket));

      wss.on("error", (err: NodeJS.ErrnoException) => {
        devError(`WebSocket server error: ${err.message}`);
        this.scheduleRetry();
        // Only the first failure rejects start(); later ones just retry.
        reject(err);
      });
    });
  }

  private accept(socket: WebSocket): void {
    const clientId = randomUUID();
    const connection: Connection = { socket, alive: true };
    this.connections.set(clientId, connection);
    devLog(`Client connected: ${clientId}`);

    socket.on("pong", () => {
      connection.alive = true;
    });
    socket.on("message", (raw) => this.receive(clientId, connection, raw));
    socket.on("close", () => {
      this.connections.delete(clientId);
      devLog(`Client disconnected: ${clientId}`);
      this.onDisconnect?.(clientId);
    });
    socket.on("error", (err) => {
      devError(`Client error (${clientId}):`, err.message);
    });
  }

  private receive(clientId: string, connection: Connection, raw: RawData): void {
    connection.alive = true;
    const text = raw.toString();
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      devWarn(`Invalid JSON from ${clientId}: ${text.slice(0, 200)}`);
      connection.socket.send(JSON.stringify({ type: "error", message: "Invalid JSON" }));
      return;
    }
    try {
      this.onMessage(clientId, parsed);
    } catch (err) {
      devError(`Message handler failed for ${clientId}:`, errorMessage(err));
    }
  }

  private startHeartbeat(): void {
    if (this.heartbeatMs <= 0 || this.heartbeat) return;
    this.heartbeat = setInterval(() => {
      for (const [clientId, connection] of this.connections) {
        if (!connection.alive) {
          devWarn(`Client ${clientId} missed a heartbeat, terminating`);
          connection.socket.terminate();
          continue;
        }
        connection.alive = false;
        connection.socket.ping();
      }
    }, this.heartbeatMs);
    this.heartbeat.unref();
  }

  private scheduleRetry(): void {
    if (this.stopping) return;

    if (this.retryCount >= MAX_RETRIES) {
      devError(`Max retries (${MAX_RETRIES}) reached. Giving up.`);
      return;
    }

    const backoff = Math.min(INITIAL_BACKOFF_MS * 2 ** this.retryCount, MAX_BACKOFF_MS);
    this.retryCount++;
    devWarn(`Retrying in ${backoff}ms (attempt ${this.retryCount}/${MAX_RETRIES})...`);

    this.retryTimer = setTimeout(() => {
      if (this.stopping) return;
      devLog("Attempting to restart WebSocket server...");
      void this.bind().then(
        () => this.startHeartbeat(),
        (err: unknown) => devWarn(`Restart attempt ${this.retryCount} failed: ${errorMessage(err)}`),
      );
    }, backoff);
  }

  send(clientId: string, data: unknown): void {
    const socket = this.connections.get(clientId)?.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      devWarn(`send(): client ${clientId} is not connected`);
      return;
    }
    socket.send(JSON.stringify(data));
  }

  async stop(): Promise<void> {
    this.stopping = true;

    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }

    for (const { socket } of this.connections.values()) {
      socket.close(1001, "Server shutting down");
    }
    this.connections.clear();

    const wss = this.wss;
    this.wss = null;
    if (!wss) return;
    await new Promise<void>((resolve) => {
      wss.close(() => {
        devLog("WebSocket server stopped");
        resolve();
      });
    });
  }
}
