/**
 * @poolvault/event-store — Append-only vault event log.
 *
 * Provides:
 * - EventLog interface for the hash-chained log
 * - InMemoryEventLog for tests, the sandbox service and the demo
 * - EventCatalog for payload validation
 * - Vault domain event definitions (22 event types)
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  ChainedContent,
  AppendResult,
  ReadDirection,
  EventQuery,
  EventHandler,
  SubscriberErrorHandler,
  SubscriberFailure,
  Subscription,
  EventLog,
  EventStoreErrorCode,
  IntegrityError,
  EventLogIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventLog } from "./in-memory-log.js";
export type { InMemoryEventLogOptions } from "./in-memory-log.js";

// Catalog
export type { EventSchema, PayloadFieldKind } from "./catalog.js";
export { EventCatalog } from "./catalog.js";

// Vault domain events
export { VAULT_EVENTS, createVaultCatalog } from "./vault-events.js";
export type {
  VaultEventType,
  VaultEventPayloads,
  PoolRegisteredPayload,
  LiquidityAddedPayload,
  LiquidityRemovedPayload,
  ManagerChangedPayload,
  InvestmentMovedPayload,
  InvestmentUpdatedPayload,
  SwapExecutedPayload,
  BatchSettledPayload,
  FlashLoanExecutedPayload,
  UserBalanceDepositedPayload,
  UserBalanceWithdrawnPayload,
  UserBalanceTransferredPayload,
  AgentChangedPayload,
  UniversalAgentChangedPayload,
  UniversalAgentManagerChangedPayload,
  FeeUpdatedPayload,
  FeesWithdrawnPayload,
} from "./vault-events.js";
