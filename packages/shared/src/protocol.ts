import { MAX_ANSWER_LENGTH, MAX_DISPLAY_NAME_LENGTH, PIN_LENGTH } from "./constants";
import type { ClientMessage, HostCommand, PlayerCommand, ServerMessage } from "./events";
import type { ConnectionRole, EngineErrorCode } from "./types";

export type ParsedClientMessage =
  | { ok: true; message: ClientMessage }
  | { ok: false; error: EngineErrorCode; message: string; requestType: string | null };

const HOST_ONLY_TYPES = new Set<string>([
  "start_question",
  "close_question",
  "next_question",
  "end_game",
  "kick_player",
  "abort",
]);

const PLAYER_ONLY_TYPES = new Set<string>(["join", "submit_answer"]);

function asRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return null;
  return value as Record<string, unknown>;
}

function readStringField(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function readOptionalNumberField(record: Record<string, unknown>, key: string) {
  const value = record[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  return null;
}

export function normalizeDisplayName(value: string) {
  const collapsed = value.normalize("NFC").replace(/\s+/g, " ").trim();
  if (collapsed.length === 0 || collapsed.length > MAX_DISPLAY_NAME_LENGTH) return null;
  return collapsed;
}

export function isValidPin(value: string) {
  return value.length === PIN_LENGTH && /^[0-9]+$/.test(value);
}

function invalid(message: string, requestType: string | null): ParsedClientMessage {
  return { ok: false, error: "VALIDATION_ERROR", message, requestType };
}

function parseHostCommand(type: string, record: Record<string, unknown>): ParsedClientMessage {
  let command: HostCommand;
  switch (type) {
    case "start_question": {
      const index = readOptionalNumberField(record, "index");
      if (index === null || !Number.isInteger(index) || index < 0) {
        return invalid("index must be a non-negative integer", type);
      }
      command = { type: "start_question", index };
      break;
    }
    case "kick_player": {
      const raw = readStringField(record, "name");
      const name = raw ? normalizeDisplayName(raw) : null;
      if (!name) return invalid("name is required", type);
      command = { type: "kick_player", name };
      break;
    }
    case "close_question":
      command = { type: "close_question" };
      break;
    case "next_question":
      command = { type: "next_question" };
      break;
    case "end_game":
      command = { type: "end_game" };
      break;
    case "abort":
      command = { type: "abort" };
      break;
    default:
      return invalid(`unknown message type ${type}`, type);
  }
  return { ok: true, message: command };
}

function parsePlayerCommand(type: string, record: Record<string, unknown>): ParsedClientMessage {
  let command: PlayerCommand;
  switch (type) {
    case "join": {
      const raw = readStringField(record, "name");
      const name = raw ? normalizeDisplayName(raw) : null;
      if (!name) {
        return invalid(`name must be 1-${MAX_DISPLAY_NAME_LENGTH} characters`, type);
      }
      command = { type: "join", name, resumeToken: readStringField(record, "resumeToken") };
      break;
    }
    case "submit_answer": {
      const rawValue = record.value;
      const value =
        typeof rawValue === "number" && Number.isFinite(rawValue)
          ? String(rawValue)
          : readStringField(record, "value");
      if (!value) return invalid("value is required", type);
      if (value.length > MAX_ANSWER_LENGTH) return invalid("value is too long", type);
      command = { type: "submit_answer", value, clientTimestamp: readOptionalNumberField(record, "clientTimestamp") };
      break;
    }
    default:
      return invalid(`unknown message type ${type}`, type);
  }
  return { ok: true, message: command };
}

export function parseClientMessage(raw: string, role: ConnectionRole): ParsedClientMessage {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return invalid("message is not valid JSON", null);
  }

  const record = asRecord(decoded);
  if (!record) return invalid("message must be a JSON object", null);
  const type = readStringField(record, "type");
  if (!type) return invalid("type is required", null);

  if (type === "heartbeat") return { ok: true, message: { type: "heartbeat" } };

  if (HOST_ONLY_TYPES.has(type)) {
    if (role !== "host") {
      return { ok: false, error: "UNAUTHORIZED", message: `${type} is host-only`, requestType: type };
    }
    return parseHostCommand(type, record);
  }

  if (PLAYER_ONLY_TYPES.has(type)) {
    if (role !== "player") {
      return { ok: false, error: "UNAUTHORIZED", message: `${type} is player-only`, requestType: type };
    }
    return parsePlayerCommand(type, record);
  }

  return invalid(`unknown message type ${type}`, type);
}

export function encodeServerMessage(message: ServerMessage) {
  return JSON.stringify(message);
}
