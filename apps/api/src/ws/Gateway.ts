import { randomUUID } from "node:crypto";
import { STATUS_CODES } from "node:http";
import type { IncomingMessage, Server as HttpServer } from "node:http";
import type { Duplex } from "node:stream";
import { WebSocket, WebSocketServer } from "ws";
import type { RawData } from "ws";
import { isValidPin } from "@livequiz/shared";
import type { ConnectionRole } from "@livequiz/shared";
import type { HostIdentityResolver } from "../auth/client";
import { errorMessage, logEvent } from "../lib/logger";
import type { Connection } from "../services/ConnectionRegistry";
import type { SessionEngine } from "../services/SessionEngine";
import type { RouterContext, SessionRouter } from "../services/SessionRouter";

export const GATEWAY_PATH = "/ws";

type GatewayOptions = {
  engine: SessionEngine;
  router: SessionRouter;
  resolveHostUserId: HostIdentityResolver;
};

type UpgradeContext = {
  pin: string;
  role: ConnectionRole;
  userId: string | null;
};

export type UpgradeRejection = { status: number; message: string };

export function rawDataToString(data: RawData) {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

/** Reads `/ws?pin=<PIN>&role=host|player`; anything else is refused before the upgrade. */
export function parseUpgradeTarget(
  rawUrl: string | undefined,
): { ok: true; pin: string; role: ConnectionRole } | ({ ok: false } & UpgradeRejection) {
  const url = new URL(rawUrl ?? "/", "http://localhost");
  if (url.pathname !== GATEWAY_PATH) {
    return { ok: false, status: 404, message: "Not Found" };
  }
  const pin = url.searchParams.get("pin")?.trim() ?? "";
  if (!isValidPin(pin)) {
    return { ok: false, status: 400, message: "pin must be a 6-digit code" };
  }
  const role = url.searchParams.get("role");
  if (role !== "host" && role !== "player") {
    return { ok: false, status: 400, message: "role must be host or player" };
  }
  return { ok: true, pin, role };
}

class WsConnection implements Connection {
  constructor(
    readonly id: string,
    private readonly socket: WebSocket,
  ) {}

  send(payload: string) {
    if (this.socket.readyState !== WebSocket.OPEN) {
      throw new Error("SOCKET_NOT_OPEN");
    }
    this.socket.send(payload, (error) => {
      if (!error) return;
      logEvent("warn", "socket_send_failed", { connectionId: this.id, error: error.message });
      this.socket.terminate();
    });
  }

  close(code: number, reason: string) {
    if (this.socket.readyState === WebSocket.CLOSING || this.socket.readyState === WebSocket.CLOSED) return;
    this.socket.close(code, reason);
  }
}

export class SessionGateway {
  private readonly engine: SessionEngine;
  private readonly router: SessionRouter;
  private readonly resolveHostUserId: HostIdentityResolver;
  private readonly wss: WebSocketServer;

  constructor(server: HttpServer, options: GatewayOptions) {
    this.engine = options.engine;
    this.router = options.router;
    this.resolveHostUserId = options.resolveHostUserId;
    this.wss = new WebSocketServer({ noServer: true });

    server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head).catch((error: unknown) => {
        logEvent("error", "ws_upgrade_failed", { url: req.url ?? null, error: errorMessage(error) });
        this.rejectUpgrade(socket, 500, "Internal error");
      });
    });
  }

  async authorizeUpgrade(req: IncomingMessage): Promise<{ ok: true; auth: UpgradeContext } | ({ ok: false } & UpgradeRejection)> {
    const target = parseUpgradeTarget(req.url);
    if (!target.ok) return target;

    const hostUserId = await this.engine.hostUserIdFor(target.pin);
    if (hostUserId === null) {
      return { ok: false, status: 404, message: "session not found" };
    }
    if (target.role === "player") {
      return { ok: true, auth: { pin: target.pin, role: "player", userId: null } };
    }

    const userId = await this.resolveHostUserId(req.headers);
    if (!userId) {
      return { ok: false, status: 401, message: "sign in to host this session" };
    }
    return { ok: true, auth: { pin: target.pin, role: "host", userId } };
  }

  private async handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer) {
    const authorized = await this.authorizeUpgrade(req);
    if (!authorized.ok) {
      logEvent("info", "ws_upgrade_rejected", { url: req.url ?? null, status: authorized.status });
      this.rejectUpgrade(socket, authorized.status, authorized.message);
      return;
    }

    this.wss.handleUpgrade(req, socket, head, (ws) => {
      this.handleConnection(ws, authorized.auth);
    });
  }

  private handleConnection(socket: WebSocket, auth: UpgradeContext) {
    const connection = new WsConnection(randomUUID(), socket);
    let context: RouterContext;
    if (auth.role === "host" && auth.userId !== null) {
      context = this.router.attachHost(auth.pin, auth.userId, connection).context;
    } else {
      context = this.router.attachPlayer(auth.pin, connection);
    }
    logEvent("debug", "ws_connected", { pin: auth.pin, role: auth.role, connectionId: connection.id });

    socket.on("message", (data) => {
      void this.router.receive(context, rawDataToString(data));
    });
    socket.on("close", (code) => {
      logEvent("debug", "ws_closed", { pin: auth.pin, role: auth.role, connectionId: connection.id, code });
      void this.router.detach(context);
    });
    socket.on("error", (error) => {
      logEvent("warn", "ws_socket_error", { pin: auth.pin, connectionId: connection.id, error: error.message });
    });
  }

  private rejectUpgrade(socket: Duplex, status: number, message: string) {
    socket.write(
      `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? "Error"}\r\nConnection: close\r\n\r\n${message}`,
    );
    socket.destroy();
  }

  close() {
    for (const client of this.wss.clients) {
      client.terminate();
    }
    return new Promise<void>((resolve, reject) => {
      this.wss.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}
