import type { DomainEvent, EventSource } from "@poolvault/types";

export const POOL_ID = `0x${"0".repeat(24)}00000000000000000000000000000000000c0de1`;

let counter = 0;

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = {},
  overrides: { correlationId?: string; source?: EventSource } = {},
): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2025-01-01T00:00:00.000Z",
      actor: "0x00000000000000000000000000000000000a11ce",
      blockNumber: 1,
      correlationId: overrides.correlationId ?? "op-1",
      source: overrides.source ?? "registry",
    },
    payload,
  };
}

export const fixedClock = (): Date => new Date("2025-01-01T00:00:00.000Z");
