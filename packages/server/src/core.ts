export type {
  Command,
  CommandContext,
} from "@rps-arena/core/domain/commands/Command.js";
export { CancelSession } from "@rps-arena/core/domain/commands/CancelSession.js";
export { JoinSession } from "@rps-arena/core/domain/commands/JoinSession.js";
export { RequestQuickMatch } from "@rps-arena/core/domain/commands/RequestQuickMatch.js";
export { RequestRematch } from "@rps-arena/core/domain/commands/RequestRematch.js";
export { SubmitMove } from "@rps-arena/core/domain/commands/SubmitMove.js";
export { TurnTimeout } from "@rps-arena/core/domain/commands/TurnTimeout.js";
export { WAITING_MESSAGE } from "@rps-arena/core/domain/commands/SessionTransitions.js";
export { dispatchCommand } from "@rps-arena/core/domain/commands/dispatchCommand.js";
export { isValidAccountId } from "@rps-arena/core/domain/commands/validation.js";
export type { Channel } from "@rps-arena/core/domain/channels.js";
export { winRate } from "@rps-arena/core/domain/entities/AccountRules.js";
export { isOpen } from "@rps-arena/core/domain/entities/SessionRules.js";
export {
  AccountNotFoundError,
  SessionNotFoundError,
  SessionRejection,
} from "@rps-arena/core/domain/errors/index.js";
export type { OutboundEvent } from "@rps-arena/core/domain/events.js";
export type { GameConfig } from "@rps-arena/core/domain/GameConfig.js";
export { createGameConfig } from "@rps-arena/core/domain/GameConfig.js";
export type {
  Account,
  AccountGateway,
  MatchRecord,
} from "@rps-arena/core/domain/ports/AccountGateway.js";
export type { Logger } from "@rps-arena/core/domain/ports/Logger.js";
export type { MessageBus } from "@rps-arena/core/domain/ports/MessageBus.js";
export type { PresenceRegistry } from "@rps-arena/core/domain/ports/PresenceRegistry.js";
export type { Scheduler } from "@rps-arena/core/domain/ports/Scheduler.js";
export type {
  SessionGateway,
  SessionState,
} from "@rps-arena/core/domain/ports/SessionGateway.js";
export type {
  AccountId,
  ConnectionId,
  Room,
  SessionId,
  Slot,
  TimePoint,
} from "@rps-arena/core/domain/typedefs.js";
export { InMemoryAccountGateway } from "@rps-arena/core/adapters/in-memory/InMemoryAccountGateway.js";
export { InMemoryPresenceRegistry } from "@rps-arena/core/adapters/in-memory/InMemoryPresenceRegistry.js";
export { InMemorySessionGateway } from "@rps-arena/core/adapters/in-memory/InMemorySessionGateway.js";
export { RealtimeGateway } from "@rps-arena/core/realtime/RealtimeGateway.js";
