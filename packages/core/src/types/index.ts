/**
 * Core Types for scratchpay
 */

// Operation Kinds
export const OPERATION_KINDS = ['mint', 'swap', 'stake'] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

// Plan Urgency
export const URGENCY_LEVELS = ['low', 'medium', 'high'] as const;

export type Urgency = (typeof URGENCY_LEVELS)[number];

// Network Profile (metadata only, never dialed)
export interface NetworkProfile {
  name: string;
  rpc: string;
  explorer: string;
  description: string;
}

export interface NetworkEndpoints {
  rpc: string;
  explorer: string;
}

// Read-only view of the network catalog used by the payload builder
export interface NetworkLookup {
  listNames(): string[];
  has(name: string): boolean;
  lookup(name: string): NetworkProfile;
}

// Payload Record
export interface PayloadRecord {
  id: string;                 // 20 hex chars
  operation: OperationKind;
  target: string;             // Free-form, unvalidated
  amount: number;             // Unvalidated for sign and range
  note: string;
  created_at: string;         // ISO-8601 UTC
  network: string | null;
  endpoints: NetworkEndpoints | null;
  metadata: Record<string, string>;
}

// Raw input for building a payload, typically straight from the command line
export interface PayloadInput {
  operation: string;
  target: string;
  amount: string | number;
  note?: string;
  network?: string;
  metadata?: Record<string, string>;
}

// On-disk wrapper for a payload record
export interface StoredRecord {
  version: 1;
  payload: PayloadRecord;
  plan: string | null;
  captured_at: string;
}

// Summary over the record store
export interface RecordSummary {
  count: number;
  total_amount: number;
  ops: Record<OperationKind, number>;
}

// Plan Entry
export interface PlanEntry {
  id: string;
  text: string;
  urgency: Urgency | null;
  tags: string[];
  created_at: string;
}

export interface PlanInput {
  text: string;
  urgency?: Urgency;
  tags?: string[];
}

// On-disk wrapper for a plan entry
export interface StoredPlan {
  entry: PlanEntry;
  metadata: {
    urgency: Urgency | null;
    tags: string;
  };
  logged_at: string;
}
