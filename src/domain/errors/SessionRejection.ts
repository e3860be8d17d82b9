export type RejectionCode =
  | "AlreadyActive"
  | "NotActive"
  | "NotCompleted"
  | "UnknownParticipant"
  | "AlreadyChosen"
  | "SessionNotFound"
  | "InvalidMove"
  | "AccountNotFound"
  | "OpponentUnavailable"
  | "InvalidMessage";

/**
 * A local, non-fatal refusal of an inbound request. Rejections never change
 * session state and are acknowledged to the originating connection only.
 */
export abstract class SessionRejection extends Error {
  abstract readonly code: RejectionCode;
}
