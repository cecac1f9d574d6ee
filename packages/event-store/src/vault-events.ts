/**
 * @poolvault/event-store — Vault Domain Event Definitions.
 *
 * The catalog of every event a committed vault operation can emit.
 *
 * Naming convention: `<entity>.<action>`
 * Examples:
 * - pool.registered
 * - liquidity.added
 * - swap.executed
 * - fees.withdrawn
 *
 * Amounts are decimal integer strings; fees are 18-decimal fixed point
 * strings. Payloads that concern a pool carry its id as `poolId`.
 */

import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Registry Events
// =============================================================================

export type PoolRegisteredPayload = {
  readonly poolId: string;
  readonly controller: string;
  readonly strategy: string;
  readonly index: number;
};

export type LiquidityAddedPayload = {
  readonly poolId: string;
  readonly from: string;
  readonly tokens: readonly string[];
  readonly amounts: readonly string[];
  /** Part of each amount drawn from the user balance */
  readonly fromUserBalance: readonly string[];
};

export type LiquidityRemovedPayload = {
  readonly poolId: string;
  readonly to: string;
  readonly tokens: readonly string[];
  readonly amounts: readonly string[];
  readonly fees: readonly string[];
  readonly toUserBalance: boolean;
};

export type ManagerChangedPayload = {
  readonly poolId: string;
  readonly token: string;
  readonly manager: string;
};

export type InvestmentMovedPayload = {
  readonly poolId: string;
  readonly token: string;
  readonly manager: string;
  readonly amount: string;
  readonly fee: string;
};

export type InvestmentUpdatedPayload = {
  readonly poolId: string;
  readonly token: string;
  readonly manager: string;
  readonly managed: string;
};

// =============================================================================
// Settlement Events
// =============================================================================

export type SwapExecutedPayload = {
  readonly poolId: string;
  readonly tokenIn: string;
  readonly tokenOut: string;
  readonly amountIn: string;
  readonly amountOut: string;
  readonly fee: string;
};

export type BatchSettledPayload = {
  readonly kind: string;
  readonly sender: string;
  readonly recipient: string;
  readonly assets: readonly string[];
  /** Signed decimal strings; positive flowed into the vault */
  readonly deltas: readonly string[];
};

export type FlashLoanExecutedPayload = {
  readonly receiver: string;
  readonly token: string;
  readonly amount: string;
  readonly fee: string;
};

// =============================================================================
// User Events
// =============================================================================

export type UserBalanceDepositedPayload = {
  readonly user: string;
  readonly token: string;
  readonly amount: string;
};

export type UserBalanceWithdrawnPayload = {
  readonly user: string;
  readonly recipient: string;
  readonly token: string;
  readonly amount: string;
  readonly fee: string;
};

export type UserBalanceTransferredPayload = {
  readonly from: string;
  readonly to: string;
  readonly token: string;
  readonly amount: string;
};

export type AgentChangedPayload = {
  readonly user: string;
  readonly agent: string;
};

export type UniversalAgentChangedPayload = {
  readonly agent: string;
};

export type UniversalAgentManagerChangedPayload = {
  readonly manager: string;
};

// =============================================================================
// Fee Events
// =============================================================================

export type FeeUpdatedPayload = {
  readonly kind: string;
  readonly fee: string;
};

export type FeesWithdrawnPayload = {
  readonly token: string;
  readonly amount: string;
  readonly recipient: string;
};

// =============================================================================
// Event Type Constants
// =============================================================================

/**
 * All vault event types as constants.
 * Use these instead of string literals for type safety.
 */
export const VAULT_EVENTS = {
  // Registry
  POOL_REGISTERED: "pool.registered",
  LIQUIDITY_ADDED: "liquidity.added",
  LIQUIDITY_REMOVED: "liquidity.removed",
  MANAGER_AUTHORIZED: "manager.authorized",
  MANAGER_REVOKED: "manager.revoked",
  INVESTMENT_INVESTED: "investment.invested",
  INVESTMENT_DIVESTED: "investment.divested",
  INVESTMENT_UPDATED: "investment.updated",

  // Settlement
  SWAP_EXECUTED: "swap.executed",
  BATCH_SETTLED: "batch.settled",

  // Flash loans
  FLASH_LOAN_EXECUTED: "flash-loan.executed",

  // Users
  USER_BALANCE_DEPOSITED: "user-balance.deposited",
  USER_BALANCE_WITHDRAWN: "user-balance.withdrawn",
  USER_BALANCE_TRANSFERRED: "user-balance.transferred",
  AGENT_ADDED: "agent.added",
  AGENT_REMOVED: "agent.removed",
  UNIVERSAL_AGENT_ADDED: "universal-agent.added",
  UNIVERSAL_AGENT_REMOVED: "universal-agent.removed",
  UNIVERSAL_AGENT_MANAGER_ADDED: "universal-agent-manager.added",
  UNIVERSAL_AGENT_MANAGER_REMOVED: "universal-agent-manager.removed",

  // Fees
  FEE_UPDATED: "fees.updated",
  FEES_WITHDRAWN: "fees.withdrawn",
} as const;

export type VaultEventType = (typeof VAULT_EVENTS)[keyof typeof VAULT_EVENTS];

/**
 * Payload shape of each event type.
 */
export type VaultEventPayloads = {
  "pool.registered": PoolRegisteredPayload;
  "liquidity.added": LiquidityAddedPayload;
  "liquidity.removed": LiquidityRemovedPayload;
  "manager.authorized": ManagerChangedPayload;
  "manager.revoked": ManagerChangedPayload;
  "investment.invested": InvestmentMovedPayload;
  "investment.divested": InvestmentMovedPayload;
  "investment.updated": InvestmentUpdatedPayload;
  "swap.executed": SwapExecutedPayload;
  "batch.settled": BatchSettledPayload;
  "flash-loan.executed": FlashLoanExecutedPayload;
  "user-balance.deposited": UserBalanceDepositedPayload;
  "user-balance.withdrawn": UserBalanceWithdrawnPayload;
  "user-balance.transferred": UserBalanceTransferredPayload;
  "agent.added": AgentChangedPayload;
  "agent.removed": AgentChangedPayload;
  "universal-agent.added": UniversalAgentChangedPayload;
  "universal-agent.removed": UniversalAgentChangedPayload;
  "universal-agent-manager.added": UniversalAgentManagerChangedPayload;
  "universal-agent-manager.removed": UniversalAgentManagerChangedPayload;
  "fees.updated": FeeUpdatedPayload;
  "fees.withdrawn": FeesWithdrawnPayload;
};

// =============================================================================
// Schema Definitions
// =============================================================================

const MANAGER_FIELDS = { poolId: "string", token: "string", manager: "string" } as const;
const INVESTMENT_FIELDS = { ...MANAGER_FIELDS, amount: "string", fee: "string" } as const;

const REGISTRY_SCHEMAS: readonly EventSchema[] = [
  {
    type: VAULT_EVENTS.POOL_REGISTERED,
    description: "A pool was registered",
    source: "registry",
    fields: { poolId: "string", controller: "string", strategy: "string", index: "number" },
  },
  {
    type: VAULT_EVENTS.LIQUIDITY_ADDED,
    description: "A controller added tokens to its pool",
    source: "registry",
    fields: { poolId: "string", from: "string", tokens: "strings", amounts: "strings", fromUserBalance: "strings" },
  },
  {
    type: VAULT_EVENTS.LIQUIDITY_REMOVED,
    description: "A controller removed tokens from its pool",
    source: "registry",
    fields: {
      poolId: "string",
      to: "string",
      tokens: "strings",
      amounts: "strings",
      fees: "strings",
      toUserBalance: "boolean",
    },
  },
  {
    type: VAULT_EVENTS.MANAGER_AUTHORIZED,
    description: "An investment manager was assigned to a pool token",
    source: "registry",
    fields: MANAGER_FIELDS,
  },
  {
    type: VAULT_EVENTS.MANAGER_REVOKED,
    description: "A pool token's investment manager was revoked",
    source: "registry",
    fields: MANAGER_FIELDS,
  },
  {
    type: VAULT_EVENTS.INVESTMENT_INVESTED,
    description: "Pool cash was handed to its investment manager",
    source: "registry",
    fields: INVESTMENT_FIELDS,
  },
  {
    type: VAULT_EVENTS.INVESTMENT_DIVESTED,
    description: "An investment manager returned funds to pool cash",
    source: "registry",
    fields: INVESTMENT_FIELDS,
  },
  {
    type: VAULT_EVENTS.INVESTMENT_UPDATED,
    description: "An investment manager reported a new managed balance",
    source: "registry",
    fields: { ...MANAGER_FIELDS, managed: "string" },
  },
];

const SETTLEMENT_SCHEMAS: readonly EventSchema[] = [
  {
    type: VAULT_EVENTS.SWAP_EXECUTED,
    description: "One swap step of a batch was applied to a pool",
    source: "settlement",
    fields: {
      poolId: "string",
      tokenIn: "string",
      tokenOut: "string",
      amountIn: "string",
      amountOut: "string",
      fee: "string",
    },
  },
  {
    type: VAULT_EVENTS.BATCH_SETTLED,
    description: "The net token movements of a batch were settled",
    source: "settlement",
    fields: { kind: "string", sender: "string", recipient: "string", assets: "strings", deltas: "strings" },
  },
  {
    type: VAULT_EVENTS.FLASH_LOAN_EXECUTED,
    description: "A flash loan was repaid with its fee",
    source: "flash-loans",
    fields: { receiver: "string", token: "string", amount: "string", fee: "string" },
  },
];

const USER_SCHEMAS: readonly EventSchema[] = [
  {
    type: VAULT_EVENTS.USER_BALANCE_DEPOSITED,
    description: "Tokens were deposited into a user balance",
    source: "users",
    fields: { user: "string", token: "string", amount: "string" },
  },
  {
    type: VAULT_EVENTS.USER_BALANCE_WITHDRAWN,
    description: "Tokens were withdrawn from a user balance",
    source: "users",
    fields: { user: "string", recipient: "string", token: "string", amount: "string", fee: "string" },
  },
  {
    type: VAULT_EVENTS.USER_BALANCE_TRANSFERRED,
    description: "A user balance moved to another user inside the vault",
    source: "users",
    fields: { from: "string", to: "string", token: "string", amount: "string" },
  },
  {
    type: VAULT_EVENTS.AGENT_ADDED,
    description: "A user authorized an agent",
    source: "users",
    fields: { user: "string", agent: "string" },
  },
  {
    type: VAULT_EVENTS.AGENT_REMOVED,
    description: "A user revoked an agent",
    source: "users",
    fields: { user: "string", agent: "string" },
  },
  {
    type: VAULT_EVENTS.UNIVERSAL_AGENT_ADDED,
    description: "An agent was authorized for every user",
    source: "users",
    fields: { agent: "string" },
  },
  {
    type: VAULT_EVENTS.UNIVERSAL_AGENT_REMOVED,
    description: "A universal agent was revoked",
    source: "users",
    fields: { agent: "string" },
  },
  {
    type: VAULT_EVENTS.UNIVERSAL_AGENT_MANAGER_ADDED,
    description: "An account may now manage universal agents",
    source: "users",
    fields: { manager: "string" },
  },
  {
    type: VAULT_EVENTS.UNIVERSAL_AGENT_MANAGER_REMOVED,
    description: "An account may no longer manage universal agents",
    source: "users",
    fields: { manager: "string" },
  },
];

const FEE_SCHEMAS: readonly EventSchema[] = [
  {
    type: VAULT_EVENTS.FEE_UPDATED,
    description: "A protocol fee percentage was changed",
    source: "fees",
    fields: { kind: "string", fee: "string" },
  },
  {
    type: VAULT_EVENTS.FEES_WITHDRAWN,
    description: "Collected protocol fees were paid out",
    source: "fees",
    fields: { token: "string", amount: "string", recipient: "string" },
  },
];

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an EventCatalog holding every vault event type.
 */
export function createVaultCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of [...REGISTRY_SCHEMAS, ...SETTLEMENT_SCHEMAS, ...USER_SCHEMAS, ...FEE_SCHEMAS]) {
    catalog.register(schema);
  }
  return catalog;
}
