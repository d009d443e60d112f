/**
 * Identifier Utilities for scratchpay
 *
 * Uses @noble/hashes for random bytes and hex encoding.
 * Record ids are 10 random bytes (20 hex chars); plan ids carry a `plan-` prefix.
 */

import { bytesToHex, randomBytes } from '@noble/hashes/utils';

const RECORD_ID_BYTES = 10;
const PLAN_ID_BYTES = 4;

const RECORD_ID_PATTERN = /^[0-9a-f]{20}$/;
const PLAN_ID_PATTERN = /^plan-[0-9a-f]{8}$/;

/**
 * Generate a new payload record id
 */
export function generateRecordId(): string {
  return bytesToHex(randomBytes(RECORD_ID_BYTES));
}

/**
 * Generate a new plan entry id
 */
export function generatePlanId(): string {
  return `plan-${bytesToHex(randomBytes(PLAN_ID_BYTES))}`;
}

export function isValidRecordId(id: string): boolean {
  return RECORD_ID_PATTERN.test(id);
}

export function isValidPlanId(id: string): boolean {
  return PLAN_ID_PATTERN.test(id);
}

/**
 * Current time as an ISO-8601 UTC string
 */
export function isoNow(clock: () => Date = () => new Date()): string {
  return clock().toISOString();
}
