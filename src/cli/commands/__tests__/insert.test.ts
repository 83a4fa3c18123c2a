import { describe, it, expect } from 'vitest';
import { createInsertCommand, runExitCode } from '../insert.js';
import type { CommandContext } from '../../types.js';
import type { InsertRunResult, RunTotals } from '../../../ingest/index.js';
import { silentLogger } from '../../../utils/logger.js';

const totals: RunTotals = {
  files: 2,
  filesCompleted: 2,
  filesAbandoned: 0,
  recordsRead: 10,
  recordsSkipped: 0,
  embeddedFromCache: 0,
  embeddedComputed: 10,
  committedVectors: 10,
  committedDocuments: 10,
  batchesCompleted: 2,
  batchesAbandoned: 0,
  chunksAbandoned: 0,
};

function result(overrides: Partial<InsertRunResult> = {}): InsertRunResult {
  return { files: [], totals, deferredCommit: { status: 'not-needed' }, stopped: false, durationMs: 10, ...overrides };
}

const context: CommandContext = {
  options: { verbose: false, json: false },
  log: () => {},
  debug: () => {},
  warn: () => {},
  error: () => {},
  createLogger: () => silentLogger,
};

describe('createInsertCommand', () => {
  it('takes paths and --only-failed', () => {
    const command = createInsertCommand(() => context);

    expect(command.name()).toBe('insert');
    expect(command.registeredArguments.map((argument) => argument.name())).toEqual(['paths']);
    expect(command.options.map((option) => option.long)).toEqual(['--only-failed']);
  });
});

describe('runExitCode', () => {
  it('is 0 for a clean run', () => {
    expect(runExitCode(result())).toBe(0);
    expect(runExitCode(result({ deferredCommit: { status: 'committed' } }))).toBe(0);
  });

  it('is 0 for a stopped run without abandoned files', () => {
    expect(runExitCode(result({ stopped: true }))).toBe(0);
  });

  it('is 1 when a file was abandoned', () => {
    expect(runExitCode(result({ totals: { ...totals, filesCompleted: 1, filesAbandoned: 1 } }))).toBe(1);
  });

  it('is 1 when the deferred commit failed', () => {
    expect(runExitCode(result({ deferredCommit: { status: 'failed', error: 'index gone' } }))).toBe(1);
  });
});
