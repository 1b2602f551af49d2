import type { ConnectionRole, ServerMessage } from "@livequiz/shared";
import { encodeServerMessage } from "@livequiz/shared";
import { errorMessage, logEvent } from "../lib/logger";
import type { EngineResult } from "./session-types";
import { fail, succeed } from "./session-types";

/** One live socket as the engine sees it. `send` may throw once the peer is gone. */
export interface Connection {
  readonly id: string;
  send(payload: string): void;
  close(code: number, reason: string): void;
}

export type ConnectionIdentity = { role: "host" } | { role: "player"; name: string };

export const CLOSE_CODES = {
  normal: 1000,
  replaced: 4000,
  kicked: 4001,
  sessionFinished: 4002,
  hostTakeover: 4003,
  sendFailed: 4004,
  rejected: 4400,
} as const;

type HostSlot = {
  connection: Connection;
  seenAtMs: number;
};

type SessionConnections = {
  host: HostSlot | null;
  players: Map<string, Connection>;
};

type ConnectionRegistryOptions = {
  heartbeatTimeoutMs: number;
  now?: () => number;
};

function safeClose(connection: Connection, code: number, reason: string) {
  try {
    connection.close(code, reason);
  } catch (error) {
    logEvent("debug", "connection_close_failed", {
      connectionId: connection.id,
      error: errorMessage(error),
    });
  }
}

export class ConnectionRegistry {
  private readonly sessions = new Map<string, SessionConnections>();
  private readonly heartbeatTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: ConnectionRegistryOptions) {
    this.heartbeatTimeoutMs = options.heartbeatTimeoutMs;
    this.now = options.now ?? (() => Date.now());
  }

  private entry(pin: string) {
    let entry = this.sessions.get(pin);
    if (!entry) {
      entry = { host: null, players: new Map() };
      this.sessions.set(pin, entry);
    }
    return entry;
  }

  private dropIfEmpty(pin: string) {
    const entry = this.sessions.get(pin);
    if (entry && !entry.host && entry.players.size === 0) {
      this.sessions.delete(pin);
    }
  }

  registerHost(pin: string, connection: Connection): EngineResult<{ replaced: Connection | null }> {
    const entry = this.entry(pin);
    const nowMs = this.now();
    const current = entry.host;

    if (current && current.connection.id !== connection.id) {
      const silentForMs = nowMs - current.seenAtMs;
      if (silentForMs <= this.heartbeatTimeoutMs) {
        return fail("HOST_ALREADY_CONNECTED", "another host connection is active for this session");
      }
      logEvent("info", "host_connection_takeover", {
        pin,
        previousConnectionId: current.connection.id,
        connectionId: connection.id,
        silentForMs,
      });
      safeClose(current.connection, CLOSE_CODES.hostTakeover, "replaced by a newer host connection");
    }

    entry.host = { connection, seenAtMs: nowMs };
    const replaced = current && current.connection.id !== connection.id ? current.connection : null;
    return succeed({ replaced });
  }

  /** Binds the name to this connection; an older connection for the same name is closed. */
  registerPlayer(pin: string, name: string, connection: Connection) {
    const entry = this.entry(pin);
    const previous = entry.players.get(name);
    entry.players.set(name, connection);
    if (previous && previous.id !== connection.id) {
      safeClose(previous, CLOSE_CODES.replaced, "replaced by a new connection");
      return previous;
    }
    return null;
  }

  /** Removes the binding only while it still points at `connectionId`. */
  unregister(pin: string, identity: ConnectionIdentity, connectionId: string) {
    const entry = this.sessions.get(pin);
    if (!entry) return false;

    let removed = false;
    if (identity.role === "host") {
      if (entry.host?.connection.id === connectionId) {
        entry.host = null;
        removed = true;
      }
    } else if (entry.players.get(identity.name)?.id === connectionId) {
      entry.players.delete(identity.name);
      removed = true;
    }
    this.dropIfEmpty(pin);
    return removed;
  }

  touch(pin: string, role: ConnectionRole, connectionId: string) {
    if (role !== "host") return;
    const host = this.sessions.get(pin)?.host;
    if (host && host.connection.id === connectionId) {
      host.seenAtMs = this.now();
    }
  }

  private deliver(pin: string, identity: ConnectionIdentity, connection: Connection, payload: string) {
    try {
      connection.send(payload);
      return true;
    } catch (error) {
      logEvent("warn", "broadcast_send_failed", {
        pin,
        role: identity.role,
        connectionId: connection.id,
        error: errorMessage(error),
      });
      safeClose(connection, CLOSE_CODES.sendFailed, "send failed");
      this.unregister(pin, identity, connection.id);
      return false;
    }
  }

  broadcastToPlayers(pin: string, message: ServerMessage) {
    const entry = this.sessions.get(pin);
    if (!entry) return 0;
    const payload = encodeServerMessage(message);
    let delivered = 0;
    for (const [name, connection] of [...entry.players.entries()]) {
      if (this.deliver(pin, { role: "player", name }, connection, payload)) {
        delivered += 1;
      }
    }
    return delivered;
  }

  sendToHost(pin: string, message: ServerMessage) {
    const host = this.sessions.get(pin)?.host;
    if (!host) return false;
    return this.deliver(pin, { role: "host" }, host.connection, encodeServerMessage(message));
  }

  sendToPlayer(pin: string, name: string, message: ServerMessage) {
    const connection = this.sessions.get(pin)?.players.get(name);
    if (!connection) return false;
    return this.deliver(pin, { role: "player", name }, connection, encodeServerMessage(message));
  }

  /** Sends a last message to the player, then closes and forgets the socket. */
  disconnectPlayer(pin: string, name: string, message: ServerMessage, code: number) {
    const connection = this.sessions.get(pin)?.players.get(name);
    if (!connection) return false;
    if (this.deliver(pin, { role: "player", name }, connection, encodeServerMessage(message))) {
      safeClose(connection, code, message.type);
      this.unregister(pin, { role: "player", name }, connection.id);
    }
    return true;
  }

  closeSession(pin: string, code: number, reason: string) {
    const entry = this.sessions.get(pin);
    if (!entry) return 0;
    this.sessions.delete(pin);

    let closed = 0;
    if (entry.host) {
      safeClose(entry.host.connection, code, reason);
      closed += 1;
    }
    for (const connection of entry.players.values()) {
      safeClose(connection, code, reason);
      closed += 1;
    }
    return closed;
  }

  hasHost(pin: string) {
    return Boolean(this.sessions.get(pin)?.host);
  }

  isPlayerConnected(pin: string, name: string) {
    return this.sessions.get(pin)?.players.has(name) ?? false;
  }

  connectedPlayerCount(pin: string) {
    return this.sessions.get(pin)?.players.size ?? 0;
  }

  diagnostics() {
    let hostCount = 0;
    let playerCount = 0;
    for (const entry of this.sessions.values()) {
      if (entry.host) hostCount += 1;
      playerCount += entry.players.size;
    }
    return { sessionCount: this.sessions.size, hostCount, playerCount };
  }
}
