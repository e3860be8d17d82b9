export { AccountNotFoundError } from "./AccountNotFoundError.js";
export { AlreadyChosenError } from "./AlreadyChosenError.js";
export { GameCommandInputError } from "./GameCommandInputError.js";
export { InvalidMoveError } from "./InvalidMoveError.js";
export { InvalidSessionStateError } from "./InvalidSessionStateError.js";
export { OpponentUnavailableError } from "./OpponentUnavailableError.js";
export { PersistenceFailureError } from "./PersistenceFailureError.js";
export { SessionNotFoundError } from "./SessionNotFoundError.js";
export { SessionRejection, type RejectionCode } from "./SessionRejection.js";
export { SessionStateError } from "./SessionStateError.js";
export { UnknownParticipantError } from "./UnknownParticipantError.js";
