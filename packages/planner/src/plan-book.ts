import {
  ReadFailureError,
  URGENCY_LEVELS,
  WriteFailureError,
  describeCause,
  generatePlanId,
  getLogger,
  isoNow,
  type PlanEntry,
  type PlanInput,
  type StoredPlan,
  type Urgency,
} from '@scratchpay/core';
import * as fs from 'node:fs';
import * as path from 'node:path';

const logger = getLogger();

export const EMPTY_SUGGESTION = 'No next steps queued; jot down a todo.';

export interface PlanBookOptions {
  clock?: () => Date;
  generateId?: () => string;
}

export interface AppendedPlan {
  path: string;
  entry: PlanEntry;
}

function uniqueTags(tags: readonly string[]): string[] {
  return [...new Set(tags)];
}

function isUrgency(value: unknown): value is Urgency {
  return typeof value === 'string' && (URGENCY_LEVELS as readonly string[]).includes(value);
}

function isPlanEntry(value: unknown): value is PlanEntry {
  if (typeof value !== 'object' || value === null) return false;
  const entry: Record<string, unknown> = { ...value };
  return (
    typeof entry.id === 'string' &&
    typeof entry.text === 'string' &&
    (entry.urgency === null || isUrgency(entry.urgency)) &&
    Array.isArray(entry.tags) &&
    entry.tags.every((tag) => typeof tag === 'string') &&
    typeof entry.created_at === 'string'
  );
}

function isPlanMetadata(value: unknown): value is StoredPlan['metadata'] {
  if (typeof value !== 'object' || value === null) return false;
  const metadata: Record<string, unknown> = { ...value };
  return (metadata.urgency === null || isUrgency(metadata.urgency)) && typeof metadata.tags === 'string';
}

function randomPick(count: number): number {
  return Math.floor(Math.random() * count);
}

/**
 * Append-only journal of planning notes, one JSON file per note.
 */
export class PlanBook {
  readonly directory: string;
  private readonly clock?: () => Date;
  private readonly generateId: () => string;

  constructor(directory: string, options: PlanBookOptions = {}) {
    this.directory = directory;
    this.clock = options.clock;
    this.generateId = options.generateId ?? generatePlanId;
  }

  entryPath(id: string): string {
    return path.join(this.directory, `${id}.json`);
  }

  append(input: PlanInput): AppendedPlan {
    const now = isoNow(this.clock);
    const entry: PlanEntry = {
      id: this.generateId(),
      text: input.text,
      urgency: input.urgency ?? null,
      tags: uniqueTags(input.tags ?? []),
      created_at: now,
    };

    const stored: StoredPlan = {
      entry,
      metadata: {
        urgency: entry.urgency,
        tags: entry.tags.join(', '),
      },
      logged_at: now,
    };

    const entryPath = this.entryPath(entry.id);
    try {
      fs.mkdirSync(this.directory, { recursive: true });
      fs.writeFileSync(entryPath, JSON.stringify(stored, null, 2), { flag: 'wx' });
    } catch (error) {
      throw new WriteFailureError(entryPath, describeCause(error), { cause: error });
    }

    logger.debug(`Logged plan ${entry.id} to ${entryPath}`);
    return { path: entryPath, entry };
  }

  read(id: string): StoredPlan {
    const entryPath = this.entryPath(id);

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(entryPath, 'utf-8'));
    } catch (error) {
      throw new ReadFailureError(entryPath, describeCause(error), { cause: error });
    }

    if (typeof data !== 'object' || data === null || !('entry' in data) || !isPlanEntry(data.entry)) {
      throw new ReadFailureError(entryPath, 'malformed plan entry');
    }

    const entry = data.entry;
    const metadata = 'metadata' in data ? data.metadata : undefined;
    if (!isPlanMetadata(metadata)) {
      throw new ReadFailureError(entryPath, 'malformed plan metadata');
    }

    const loggedAt = 'logged_at' in data && typeof data.logged_at === 'string' ? data.logged_at : entry.created_at;
    return { entry, metadata, logged_at: loggedAt };
  }

  /**
   * Pick one hint as the next thing to tackle.
   */
  suggestNext(hints: readonly string[], pick: (count: number) => number = randomPick): string {
    if (hints.length === 0) {
      return EMPTY_SUGGESTION;
    }
    const index = Math.min(Math.max(pick(hints.length), 0), hints.length - 1);
    return hints[index] ?? EMPTY_SUGGESTION;
  }
}
