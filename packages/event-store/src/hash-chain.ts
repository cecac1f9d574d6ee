/**
 * @poolvault/event-store — Hash chain for the tamper-evident event log.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous event's hash, forming a chain:
 *
 *   event[1].hash = sha256(canonicalize(event[1]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Any modification to any event breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  ChainedContent,
  EventLogIntegrityResult,
  IntegrityError,
  StoredEvent,
} from "./types.js";

/**
 * The hash used as `previousHash` for the first event in the chain.
 */
export const GENESIS_HASH = "genesis";

/**
 * Canonical JSON of the hashed fields of an event.
 */
function canonicalEventContent(content: ChainedContent): string {
  return canonicalize({
    event: {
      type: content.event.type,
      metadata: content.event.metadata,
      payload: content.event.payload,
    },
    position: content.position,
    appendedAt: content.appendedAt,
  });
}

/**
 * Compute the SHA-256 hash of an event given its predecessor's hash.
 *
 * @returns Hex-encoded SHA-256 hash
 */
export function computeEventHash(content: ChainedContent, previousHash: string): string {
  return createHash("sha256")
    .update(canonicalEventContent(content) + previousHash)
    .digest("hex");
}

/**
 * Verify the hash chain of a sequence of events in position order,
 * starting from GENESIS_HASH.
 */
export function verifyHashChain(events: readonly StoredEvent[]): EventLogIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = GENESIS_HASH;
  let expectedPosition = 1;

  for (const stored of events) {
    if (stored.position !== expectedPosition) {
      errors.push({
        position: stored.position,
        reason: `Position gap: expected ${expectedPosition}, got ${stored.position}`,
      });
    }

    if (stored.previousHash !== previousHash) {
      errors.push({
        position: stored.position,
        reason: `previousHash mismatch at position ${stored.position}: expected "${previousHash}", got "${stored.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(stored, stored.previousHash);
    if (stored.hash !== expectedHash) {
      errors.push({
        position: stored.position,
        reason: `Hash mismatch at position ${stored.position}: expected "${expectedHash}", got "${stored.hash}"`,
      });
    }

    previousHash = stored.hash;
    lastVerifiedPosition = stored.position;
    expectedPosition = stored.position + 1;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
