/**
 * Run Ledger Tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { IN_MEMORY, RunLedger, openDatabase } from '../index.js';
import { TransientIOError } from '../../errors/index.js';
import type { BatchOutcome, FileReport } from '../../ingest/types.js';

function steppingClock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++));
}

function report(path: string, overrides: Partial<FileReport> = {}): FileReport {
  return {
    file: path.replace(/^\/data\//, ''),
    path,
    state: 'completed',
    recordsRead: 4,
    recordsSkipped: 0,
    embeddedFromCache: 1,
    embeddedComputed: 3,
    committedVectors: 4,
    committedDocuments: 4,
    batchesCompleted: 2,
    batchesAbandoned: 0,
    abandonedChunkIds: [],
    durationMs: 12.6,
    ...overrides,
  };
}

function abandonedOutcome(path: string, ordinal: number): BatchOutcome {
  return {
    file: path.replace(/^\/data\//, ''),
    path,
    ordinal,
    chunkIds: [`${ordinal}-a`, `${ordinal}-b`],
    vectors: { status: 'fatal', attempts: 6, cause: new TransientIOError('qdrant timed out') },
    documents: { status: 'committed', attempts: 1 },
  };
}

describe('RunLedger', () => {
  let ledger: RunLedger;

  beforeEach(() => {
    ledger = new RunLedger(openDatabase(IN_MEMORY), steppingClock());
  });

  afterEach(() => {
    ledger.close();
  });

  describe('runs', () => {
    it('starts and finishes a run with its totals', () => {
      const run = ledger.startRun('run-1');

      expect(run).toEqual({
        id: 'run-1',
        started_at: '2026-01-01T00:00:00.000Z',
        finished_at: null,
        status: 'running',
        totals: null,
      });

      ledger.finishRun('run-1', 'completed', {
        files: 1,
        filesCompleted: 1,
        filesAbandoned: 0,
        recordsRead: 4,
        recordsSkipped: 0,
        embeddedFromCache: 0,
        embeddedComputed: 4,
        committedVectors: 4,
        committedDocuments: 4,
        batchesCompleted: 2,
        batchesAbandoned: 0,
        chunksAbandoned: 0,
      });

      const finished = ledger.getRun('run-1');
      expect(finished?.status).toBe('completed');
      expect(finished?.finished_at).toBe('2026-01-01T00:00:01.000Z');
      expect(JSON.parse(finished?.totals ?? '{}')).toMatchObject({ files: 1, committedVectors: 4 });
    });

    it('generates ids when none is given', () => {
      expect(ledger.startRun().id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('lists recent runs newest first', () => {
      ledger.startRun('a');
      ledger.startRun('b');
      ledger.startRun('c');

      expect(ledger.recentRuns(2).map((run) => run.id)).toEqual(['c', 'b']);
    });

    it('returns undefined for an unknown run', () => {
      expect(ledger.getRun('missing')).toBeUndefined();
    });
  });

  describe('files', () => {
    it('stores file counters, rounding the duration', () => {
      ledger.startRun('run-1');
      ledger.recordFile('run-1', report('/data/b.jsonl'));
      ledger.recordFile('run-1', report('/data/a.jsonl', { state: 'abandoned', batchesAbandoned: 1 }));

      const files = ledger.fileRuns('run-1');

      expect(files.map((f) => [f.file, f.state])).toEqual([
        ['a.jsonl', 'abandoned'],
        ['b.jsonl', 'completed'],
      ]);
      expect(files[1]).toMatchObject({ records_read: 4, embedded_from_cache: 1, duration_ms: 13 });
    });

    it('overwrites the row of a file recorded twice in one run', () => {
      ledger.startRun('run-1');
      ledger.recordFile('run-1', report('/data/a.jsonl', { state: 'in-flight' }));
      ledger.recordFile('run-1', report('/data/a.jsonl'));

      expect(ledger.fileRuns('run-1').map((f) => f.state)).toEqual(['completed']);
    });
  });

  describe('abandoned batches', () => {
    it('records batches with their per-sink status and error', () => {
      ledger.startRun('run-1');
      ledger.recordAbandoned('run-1', abandonedOutcome('/data/a.jsonl', 3));

      const [batch] = ledger.unresolvedBatches();

      expect(batch).toMatchObject({
        run_id: 'run-1',
        file: 'a.jsonl',
        batch_ordinal: 3,
        chunk_ids: ['3-a', '3-b'],
        vectors_status: 'fatal',
        vectors_error: 'qdrant timed out',
        documents_status: 'committed',
        documents_error: null,
        resolved_at: null,
      });
      expect(ledger.countUnresolved()).toBe(1);
    });

    it('lists files with unresolved batches once each, sorted', () => {
      ledger.startRun('run-1');
      ledger.recordAbandoned('run-1', abandonedOutcome('/data/b.jsonl', 0));
      ledger.recordAbandoned('run-1', abandonedOutcome('/data/a.jsonl', 0));
      ledger.recordAbandoned('run-1', abandonedOutcome('/data/b.jsonl', 1));

      expect(ledger.unresolvedFiles()).toEqual(['/data/a.jsonl', '/data/b.jsonl']);
    });

    it('resolves batches when a later run completes the file', () => {
      ledger.startRun('run-1');
      ledger.recordAbandoned('run-1', abandonedOutcome('/data/a.jsonl', 0));
      ledger.recordAbandoned('run-1', abandonedOutcome('/data/b.jsonl', 0));

      ledger.startRun('run-2');
      ledger.recordFile('run-2', report('/data/a.jsonl'));

      expect(ledger.unresolvedFiles()).toEqual(['/data/b.jsonl']);
      expect(ledger.countUnresolved()).toBe(1);
    });

    it('keeps batches unresolved when the file is abandoned again', () => {
      ledger.startRun('run-1');
      ledger.recordAbandoned('run-1', abandonedOutcome('/data/a.jsonl', 0));
      ledger.recordFile('run-1', report('/data/a.jsonl', { state: 'abandoned' }));

      expect(ledger.unresolvedFiles()).toEqual(['/data/a.jsonl']);
    });

    it('resolveFile returns the number of batches resolved', () => {
      ledger.startRun('run-1');
      ledger.recordAbandoned('run-1', abandonedOutcome('/data/a.jsonl', 0));
      ledger.recordAbandoned('run-1', abandonedOutcome('/data/a.jsonl', 1));

      expect(ledger.resolveFile('/data/a.jsonl')).toBe(2);
      expect(ledger.resolveFile('/data/a.jsonl')).toBe(0);
    });
  });
});
