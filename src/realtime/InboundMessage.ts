import { GameCommandInputError } from "../domain/errors/GameCommandInputError.js";
import type { SessionId } from "../domain/typedefs.js";

export type InboundMessage =
  | { readonly type: "join_lobby" }
  | { readonly type: "leave_lobby" }
  | { readonly type: "join_session"; readonly sessionId: SessionId }
  | { readonly type: "submit_move"; readonly sessionId: SessionId; readonly move: unknown }
  | { readonly type: "request_rematch"; readonly sessionId: SessionId };

export type InboundType = InboundMessage["type"];

const INBOUND_TYPES: readonly InboundType[] = [
  "join_lobby",
  "leave_lobby",
  "join_session",
  "submit_move",
  "request_rematch",
];

function isInboundType(value: unknown): value is InboundType {
  return INBOUND_TYPES.some((type) => type === value);
}

function readSessionId(payload: object): SessionId {
  const sessionId = "sessionId" in payload ? payload.sessionId : undefined;
  if (typeof sessionId !== "string" || sessionId.length === 0) {
    throw GameCommandInputError.because(["sessionId must be a non-empty string"]);
  }
  return sessionId;
}

/** Decode one text frame from a client. Move values are checked by the command. */
export function parseInboundMessage(raw: string): InboundMessage {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    throw GameCommandInputError.because(["Message is not valid JSON"]);
  }

  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    throw GameCommandInputError.because(["Message must be a JSON object"]);
  }

  const type = "type" in payload ? payload.type : undefined;
  if (!isInboundType(type)) {
    throw GameCommandInputError.because([`Unknown message type: ${String(type)}`]);
  }

  switch (type) {
    case "join_lobby":
    case "leave_lobby":
      return { type };
    case "join_session":
    case "request_rematch":
      return { type, sessionId: readSessionId(payload) };
    case "submit_move":
      return {
        type,
        sessionId: readSessionId(payload),
        move: "move" in payload ? payload.move : undefined,
      };
  }
}
