/**
 * Test Utilities Module
 *
 * Shared fakes and fixtures for the test suites.
 *
 * @example
 * ```typescript
 * import { FakeTransport, FakeVectorSink, createFakeScheduler } from '../../test-utils/index.js';
 *
 * const transport = new FakeTransport({ dimension: 4 }).failNext(new TransientIOError('reset'));
 * ```
 */

export {
  createFakeScheduler,
  createRecordingLogger,
  fakeVector,
  tick,
  FakeTransport,
  FakeVectorSink,
  FakeSearchSink,
  type FakeScheduler,
  type FakeTransportOptions,
  type LogEntry,
  type RecordingLogger,
} from './fakes.js';
export {
  createTempDir,
  removeTempDir,
  writeChunkFile,
  documentRecords,
  sqliteConfig,
  type ChunkLine,
} from './fixtures.js';
