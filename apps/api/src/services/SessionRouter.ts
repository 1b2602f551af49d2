import type { ClientMessage, ConnectionRole, EngineErrorCode } from "@livequiz/shared";
import { encodeServerMessage, parseClientMessage } from "@livequiz/shared";
import { errorMessage, logEvent } from "../lib/logger";
import { CLOSE_CODES, type Connection } from "./ConnectionRegistry";
import type { SessionEngine } from "./SessionEngine";
import type { EngineResult } from "./session-types";
import { fail, succeed } from "./session-types";

/** Per-socket state: who is talking and the queue that keeps its messages in order. */
export type RouterContext = {
  pin: string;
  role: ConnectionRole;
  connection: Connection;
  userId: string | null;
  playerName: string | null;
  closed: boolean;
  inbox: Promise<void>;
};

type SessionRouterOptions = {
  now?: () => number;
};

export class SessionRouter {
  private readonly now: () => number;

  constructor(
    private readonly engine: SessionEngine,
    options: SessionRouterOptions = {},
  ) {
    this.now = options.now ?? (() => Date.now());
  }

  private sendError(context: RouterContext, code: EngineErrorCode, message: string, requestType: string | null) {
    try {
      context.connection.send(encodeServerMessage({ type: "error", code, message, requestType }));
    } catch (error) {
      logEvent("warn", "error_frame_send_failed", {
        pin: context.pin,
        connectionId: context.connection.id,
        error: errorMessage(error),
      });
    }
  }

  private schedule(context: RouterContext, step: () => Promise<void>) {
    const next = context.inbox.then(step);
    context.inbox = next.catch((error: unknown) => {
      logEvent("error", "router_step_failed", {
        pin: context.pin,
        connectionId: context.connection.id,
        error: errorMessage(error),
      });
    });
    return context.inbox;
  }

  /** Registers a verified host socket; on refusal the socket gets an error frame and is closed. */
  attachHost(pin: string, userId: string, connection: Connection) {
    const context: RouterContext = {
      pin,
      role: "host",
      connection,
      userId,
      playerName: null,
      closed: false,
      inbox: Promise.resolve(),
    };
    const ready = this.schedule(context, async () => {
      const attached = await this.engine.attachHost(pin, userId, connection);
      if (attached.ok) return;
      context.closed = true;
      this.sendError(context, attached.error, attached.message, null);
      connection.close(CLOSE_CODES.rejected, attached.error);
    });
    return { context, ready };
  }

  /** Player sockets start anonymous; the first `join` binds a name. */
  attachPlayer(pin: string, connection: Connection): RouterContext {
    return {
      pin,
      role: "player",
      connection,
      userId: null,
      playerName: null,
      closed: false,
      inbox: Promise.resolve(),
    };
  }

  receive(context: RouterContext, raw: string) {
    const receivedAtMs = this.now();
    return this.schedule(context, async () => {
      if (context.closed) return;
      const parsed = parseClientMessage(raw, context.role);
      if (!parsed.ok) {
        this.sendError(context, parsed.error, parsed.message, parsed.requestType);
        return;
      }
      const result = await this.forwardToStateMachine(context, parsed.message, receivedAtMs);
      if (!result.ok) {
        this.sendError(context, result.error, result.message, parsed.message.type);
      }
    });
  }

  async forwardToStateMachine(
    context: RouterContext,
    message: ClientMessage,
    receivedAtMs = this.now(),
  ): Promise<EngineResult<unknown>> {
    const { pin } = context;
    switch (message.type) {
      case "heartbeat":
        return await this.heartbeat(context);
      case "start_question":
        return await this.engine.startQuestion(pin, message.index);
      case "close_question":
        return await this.engine.closeQuestion(pin);
      case "next_question":
        return await this.engine.nextQuestion(pin);
      case "end_game":
        return await this.engine.endGame(pin);
      case "kick_player":
        return await this.engine.kickPlayer(pin, message.name);
      case "abort":
        return await this.engine.abort(pin, "aborted");
      case "join":
        return await this.join(context, message.name, message.resumeToken);
      case "submit_answer": {
        if (context.playerName === null) {
          return fail("NOT_FOUND", "join the session before answering");
        }
        return await this.engine.submitAnswer(pin, context.playerName, message.value, receivedAtMs);
      }
    }
  }

  private async heartbeat(context: RouterContext): Promise<EngineResult<{ serverNowMs: number }>> {
    if (context.role === "host") {
      const touched = await this.engine.hostHeartbeat(context.pin, context.connection.id);
      if (!touched.ok) return touched;
      context.connection.send(encodeServerMessage({ type: "heartbeat_ack", serverNowMs: touched.value.serverNowMs }));
      return touched;
    }
    const serverNowMs = this.now();
    context.connection.send(encodeServerMessage({ type: "heartbeat_ack", serverNowMs }));
    return succeed({ serverNowMs });
  }

  private async join(context: RouterContext, name: string, resumeToken: string | null) {
    if (context.playerName !== null) {
      return fail("VALIDATION_ERROR", `this connection already joined as ${context.playerName}`);
    }
    const joined = await this.engine.joinPlayer(context.pin, {
      name,
      resumeToken,
      connection: context.connection,
    });
    if (joined.ok) {
      context.playerName = joined.value.name;
    }
    return joined;
  }

  /** Socket closed: drop the binding so the name can be resumed later. */
  detach(context: RouterContext) {
    context.closed = true;
    if (context.role === "host") {
      this.engine.hostDisconnected(context.pin, context.connection.id);
      return Promise.resolve();
    }
    const name = context.playerName;
    if (name === null) return Promise.resolve();
    return this.engine.playerDisconnected(context.pin, name, context.connection.id).then((result) => {
      if (!result.ok) {
        logEvent("warn", "player_detach_failed", { pin: context.pin, name, error: result.error });
      }
    });
  }
}
