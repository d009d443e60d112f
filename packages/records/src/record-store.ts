import {
  ReadFailureError,
  WriteFailureError,
  checkPayloadShape,
  describeCause,
  isPayloadRecord,
  getLogger,
  isoNow,
  type OperationKind,
  type PayloadRecord,
  type RecordSummary,
  type StoredRecord,
} from '@scratchpay/core';
import * as fs from 'node:fs';
import * as path from 'node:path';

const logger = getLogger();

const RECORD_EXTENSION = '.json';

export interface RecordStoreOptions {
  clock?: () => Date;
}

export interface SavedRecord {
  path: string;
  stored: StoredRecord;
}

function isRecordFile(name: string): boolean {
  return name.endsWith(RECORD_EXTENSION);
}

function emptyCounts(): Record<OperationKind, number> {
  return { mint: 0, swap: 0, stake: 0 };
}

/**
 * One JSON file per payload, named by the record id.
 */
export class RecordStore {
  readonly directory: string;
  private readonly clock?: () => Date;

  constructor(directory: string, options: RecordStoreOptions = {}) {
    this.directory = directory;
    this.clock = options.clock;
  }

  recordPath(id: string): string {
    return path.join(this.directory, `${id}${RECORD_EXTENSION}`);
  }

  /**
   * Persist a payload. Refuses to overwrite an existing record with the same id.
   */
  save(record: PayloadRecord, plan: string | null = null): SavedRecord {
    const recordPath = this.recordPath(record.id);
    const problems = checkPayloadShape(record);
    if (problems.length > 0) {
      throw new WriteFailureError(recordPath, `invalid payload (${problems.join('; ')})`);
    }

    const stored: StoredRecord = {
      version: 1,
      payload: record,
      plan,
      captured_at: isoNow(this.clock),
    };

    try {
      fs.mkdirSync(this.directory, { recursive: true });
      fs.writeFileSync(recordPath, JSON.stringify(stored, null, 2), { flag: 'wx' });
    } catch (error) {
      throw new WriteFailureError(recordPath, describeCause(error), { cause: error });
    }

    logger.debug(`Saved ${record.operation} record ${record.id} to ${recordPath}`);
    return { path: recordPath, stored };
  }

  /**
   * Saved record file names, sorted.
   */
  listFiles(): string[] {
    return this.readDirectory().sort();
  }

  /**
   * Lazily read every saved record in directory-listing order.
   * Each iteration re-lists the directory, so the result can be walked more than once.
   */
  listAll(): Iterable<PayloadRecord> {
    return {
      [Symbol.iterator]: () => this.iterateRecords(),
    };
  }

  /**
   * Read a single stored record by file name.
   */
  readStored(fileName: string): StoredRecord {
    const recordPath = path.join(this.directory, fileName);

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(recordPath, 'utf-8'));
    } catch (error) {
      throw new ReadFailureError(recordPath, describeCause(error), { cause: error });
    }

    if (typeof data !== 'object' || data === null || !('payload' in data)) {
      throw new ReadFailureError(recordPath, 'missing payload');
    }

    const payload = data.payload;
    if (!isPayloadRecord(payload)) {
      throw new ReadFailureError(recordPath, checkPayloadShape(payload).join('; '));
    }

    const plan = 'plan' in data && typeof data.plan === 'string' ? data.plan : null;
    const capturedAt = 'captured_at' in data && typeof data.captured_at === 'string' ? data.captured_at : '';
    return {
      version: 1,
      payload,
      plan,
      captured_at: capturedAt,
    };
  }

  /**
   * Count records per operation kind and total their amounts.
   */
  summarize(): RecordSummary {
    const summary: RecordSummary = {
      count: 0,
      total_amount: 0,
      ops: emptyCounts(),
    };

    for (const record of this.listAll()) {
      summary.count += 1;
      summary.total_amount += record.amount;
      summary.ops[record.operation] += 1;
    }

    return summary;
  }

  private *iterateRecords(): Generator<PayloadRecord> {
    for (const fileName of this.readDirectory()) {
      yield this.readStored(fileName).payload;
    }
  }

  private readDirectory(): string[] {
    try {
      return fs.readdirSync(this.directory).filter(isRecordFile);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw new ReadFailureError(this.directory, describeCause(error), { cause: error });
    }
  }
}
