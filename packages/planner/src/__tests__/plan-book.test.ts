import { describe, it, expect, beforeEach } from 'vitest';
import { ReadFailureError, WriteFailureError } from '@scratchpay/core';
import { EMPTY_SUGGESTION, PlanBook } from '../plan-book.js';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

describe('Plan Book', () => {
  let tempDir: string;
  let book: PlanBook;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scratchpay-plans-test-'));
    book = new PlanBook(path.join(tempDir, 'plans'), {
      clock: () => new Date('2024-02-03T04:05:06.000Z'),
    });
  });

  describe('Appending', () => {
    it('should write one file per note', () => {
      const first = book.append({ text: 'try the swap route' });
      const second = book.append({ text: 'compare stake rewards' });

      expect(first.path).not.toBe(second.path);
      expect(fs.readdirSync(book.directory).sort()).toEqual(
        [`${first.entry.id}.json`, `${second.entry.id}.json`].sort()
      );
    });

    it('should generate plan ids', () => {
      const { entry } = book.append({ text: 'note' });
      expect(entry.id).toMatch(/^plan-[0-9a-f]{8}$/);
    });

    it('should leave urgency unset when not supplied', () => {
      const { entry } = book.append({ text: 'someday' });
      expect(entry.urgency).toBeNull();
      expect(entry.tags).toEqual([]);
    });

    it('should store the on-disk layout', () => {
      const fixed = new PlanBook(book.directory, {
        clock: () => new Date('2024-02-03T04:05:06.000Z'),
        generateId: () => 'plan-0000abcd',
      });
      const { path: entryPath } = fixed.append({ text: 'ship it', urgency: 'high', tags: ['release'] });

      expect(JSON.parse(fs.readFileSync(entryPath, 'utf-8'))).toEqual({
        entry: {
          id: 'plan-0000abcd',
          text: 'ship it',
          urgency: 'high',
          tags: ['release'],
          created_at: '2024-02-03T04:05:06.000Z',
        },
        metadata: { urgency: 'high', tags: 'release' },
        logged_at: '2024-02-03T04:05:06.000Z',
      });
    });

    it('should de-duplicate tags keeping first-seen order', () => {
      const { entry } = book.append({ text: 'x', tags: ['plan', 'experiment', 'plan'] });
      expect(entry.tags).toEqual(['plan', 'experiment']);
    });

    it('should fail with WriteFailure when the directory is blocked', () => {
      const blocker = path.join(tempDir, 'blocker');
      fs.writeFileSync(blocker, 'file');
      const blocked = new PlanBook(path.join(blocker, 'plans'));

      expect(() => blocked.append({ text: 'nope' })).toThrow(WriteFailureError);
    });
  });

  describe('Reading', () => {
    it('should read back exactly the supplied metadata', () => {
      const { entry } = book.append({ text: 'wire up metrics', urgency: 'medium', tags: ['experiment', 'plan'] });
      const stored = book.read(entry.id);

      expect(stored.entry.text).toBe('wire up metrics');
      expect(stored.entry.urgency).toBe('medium');
      expect(new Set(stored.entry.tags)).toEqual(new Set(['experiment', 'plan']));
      expect(stored.metadata).toEqual({ urgency: 'medium', tags: 'experiment, plan' });
    });

    it('should fail with ReadFailure for unknown ids', () => {
      expect(() => book.read('plan-ffffffff')).toThrow(ReadFailureError);
    });

    it('should fail with ReadFailure for malformed files', () => {
      fs.mkdirSync(book.directory, { recursive: true });
      fs.writeFileSync(book.entryPath('plan-bad00000'), JSON.stringify({ entry: { id: 'plan-bad00000' } }));

      expect(() => book.read('plan-bad00000')).toThrow('malformed plan entry');
    });
  });

  describe('Suggestions', () => {
    it('should fall back when there are no hints', () => {
      expect(book.suggestNext([])).toBe(EMPTY_SUGGESTION);
    });

    it('should pick the chosen hint', () => {
      expect(book.suggestNext(['a', 'b', 'c'], () => 1)).toBe('b');
    });

    it('should clamp out-of-range picks', () => {
      expect(book.suggestNext(['a', 'b'], () => 7)).toBe('b');
      expect(book.suggestNext(['a', 'b'], () => -1)).toBe('a');
    });

    it('should pick one of the hints by default', () => {
      expect(['a', 'b', 'c']).toContain(book.suggestNext(['a', 'b', 'c']));
    });
  });
});
