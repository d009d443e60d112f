/**
 * Payload Builder for scratchpay
 *
 * Turns raw command-line input into a PayloadRecord. Building has no side
 * effects; persisting is the record store's job.
 */

import {
  OPERATION_KINDS,
  type NetworkEndpoints,
  type NetworkLookup,
  type OperationKind,
  type PayloadInput,
  type PayloadRecord,
} from '../types/index.js';
import {
  InvalidAmountError,
  InvalidOperationError,
  UnknownNetworkError,
} from '../errors/index.js';
import { generateRecordId, isoNow } from '../ids/index.js';

// Signed decimal with optional fraction and exponent. No hex, no Infinity.
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const REQUIRED_PAYLOAD_FIELDS = [
  'id',
  'operation',
  'target',
  'amount',
  'note',
  'created_at',
  'network',
  'endpoints',
  'metadata',
] as const;

export interface BuildOptions {
  // A function defers loading until the network is actually checked
  catalog?: NetworkLookup | (() => NetworkLookup);
  clock?: () => Date;
  generateId?: () => string;
}

export function isOperationKind(value: string): value is OperationKind {
  return (OPERATION_KINDS as readonly string[]).includes(value);
}

/**
 * Parse an amount. Sign and range are left to the caller.
 */
export function parseAmount(raw: string | number): number {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) {
      throw new InvalidAmountError(String(raw));
    }
    return raw;
  }

  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new InvalidAmountError(raw);
  }

  const amount = Number(trimmed);
  // Exponents like 1e999 overflow to Infinity
  if (!Number.isFinite(amount)) {
    throw new InvalidAmountError(raw);
  }
  return amount;
}

function resolveEndpoints(
  network: string | undefined,
  source?: NetworkLookup | (() => NetworkLookup)
): NetworkEndpoints | null {
  if (network === undefined) return null;

  const catalog = typeof source === 'function' ? source() : source;
  if (!catalog || !catalog.has(network)) {
    throw new UnknownNetworkError(network, catalog?.listNames() ?? []);
  }

  const profile = catalog.lookup(network);
  return { rpc: profile.rpc, explorer: profile.explorer };
}

/**
 * Build a payload record from raw input.
 *
 * Checks run in a fixed order: operation, then amount, then network.
 */
export function buildPayload(input: PayloadInput, options: BuildOptions = {}): PayloadRecord {
  if (!isOperationKind(input.operation)) {
    throw new InvalidOperationError(input.operation, OPERATION_KINDS);
  }

  const amount = parseAmount(input.amount);
  const endpoints = resolveEndpoints(input.network, options.catalog);
  const generateId = options.generateId ?? generateRecordId;

  return {
    id: generateId(),
    operation: input.operation,
    target: input.target,
    amount,
    note: input.note ?? '',
    created_at: isoNow(options.clock),
    network: input.network ?? null,
    endpoints,
    metadata: { ...input.metadata },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringMap(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((entry) => typeof entry === 'string');
}

function isEndpoints(value: unknown): value is NetworkEndpoints {
  return isRecord(value) && typeof value.rpc === 'string' && typeof value.explorer === 'string';
}

/**
 * Check that a value carries every payload key with the right primitive type.
 * Returns the list of problems; empty means the shape is valid.
 */
export function checkPayloadShape(value: unknown): string[] {
  if (!isRecord(value)) {
    return ['payload is not an object'];
  }

  const missing = REQUIRED_PAYLOAD_FIELDS.filter((field) => !(field in value));
  if (missing.length > 0) {
    return [`missing payload keys: ${missing.join(', ')}`];
  }

  const problems: string[] = [];
  if (typeof value.id !== 'string' || value.id.length === 0) problems.push('id must be a non-empty string');
  if (typeof value.operation !== 'string' || !isOperationKind(value.operation)) {
    problems.push(`operation must be one of ${OPERATION_KINDS.join(', ')}`);
  }
  if (typeof value.target !== 'string') problems.push('target must be a string');
  if (typeof value.amount !== 'number' || !Number.isFinite(value.amount)) problems.push('amount must be numeric');
  if (typeof value.note !== 'string') problems.push('note must be a string');
  if (typeof value.created_at !== 'string') problems.push('created_at must be a string');
  if (value.network !== null && typeof value.network !== 'string') problems.push('network must be a string or null');
  if (value.endpoints !== null && !isEndpoints(value.endpoints)) {
    problems.push('endpoints must hold rpc and explorer strings');
  }
  if (!isStringMap(value.metadata)) {
    problems.push('metadata values must be strings');
  }
  return problems;
}

export function isPayloadRecord(value: unknown): value is PayloadRecord {
  return checkPayloadShape(value).length === 0;
}
