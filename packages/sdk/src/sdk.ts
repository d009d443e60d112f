import {
  OPERATION_KINDS,
  buildPayload,
  type PayloadInput,
  type PayloadRecord,
} from '@scratchpay/core';
import { NetworkCatalog } from '@scratchpay/networks';
import { PlanBook } from '@scratchpay/planner';
import { RecordStore } from '@scratchpay/records';
import * as path from 'node:path';

export interface ScratchpadConfig {
  dataDir: string;
  networksFile?: string;
  clock?: () => Date;
}

export interface RecordedPayload {
  record: PayloadRecord;
  path: string;
}

export class Scratchpad {
  readonly dataDir: string;
  readonly networksFile: string;
  records: RecordStore;
  plans: PlanBook;
  private readonly clock?: () => Date;
  private catalog?: NetworkCatalog;

  constructor(config: ScratchpadConfig) {
    this.dataDir = config.dataDir;
    this.networksFile = config.networksFile ?? path.join(config.dataDir, 'data', 'networks.json');
    this.clock = config.clock;
    this.records = new RecordStore(path.join(config.dataDir, 'records'), { clock: config.clock });
    this.plans = new PlanBook(path.join(config.dataDir, 'plans'), { clock: config.clock });
  }

  /**
   * The network catalog, read from disk on first use.
   */
  networks(): NetworkCatalog {
    if (!this.catalog) {
      this.catalog = NetworkCatalog.load(this.networksFile);
    }
    return this.catalog;
  }

  /**
   * Build a payload and save it. Nothing is written when building fails.
   */
  recordPayload(input: PayloadInput, plan: string | null = null): RecordedPayload {
    const record = buildPayload(input, { catalog: () => this.networks(), clock: this.clock });
    const saved = this.records.save(record, plan);
    return { record, path: saved.path };
  }

  describe(network?: string): string {
    const where = `scratchpay writing records to ${this.records.directory} and plans to ${this.plans.directory}`;
    const tracking = `tracking ops ${OPERATION_KINDS.join(', ')}`;
    if (network === undefined) {
      return `${where}, ${tracking}.`;
    }
    const profile = this.networks().lookup(network);
    return `${where} on ${profile.name} using ${profile.rpc}, ${tracking}.`;
  }
}

export type {
  PayloadInput,
  PayloadRecord,
  PlanEntry,
  PlanInput,
  RecordSummary,
  NetworkProfile,
} from '@scratchpay/core';
export { NetworkCatalog } from '@scratchpay/networks';
export { PlanBook } from '@scratchpay/planner';
export { RecordStore } from '@scratchpay/records';
