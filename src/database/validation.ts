/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime. better-sqlite3
 * returns `unknown` rows; these schemas turn them into typed values and
 * catch schema drift with a clear error instead of silent corruption.
 *
 * Usage:
 * ```ts
 * const row = db.prepare('SELECT * FROM runs WHERE id = ?').get(id);
 * return row ? validateRow(RunRowSchema, row, `runs.id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

// ============================================================================
// Ledger Schemas
// ============================================================================

export const RunRowSchema = z.object({
  id: z.string(),
  started_at: z.string(),
  finished_at: z.string().nullable(),
  status: z.enum(['running', 'completed', 'stopped', 'failed']),
  totals: z.string().nullable(),
});

export const FileRunRowSchema = z.object({
  run_id: z.string(),
  file: z.string(),
  path: z.string(),
  state: z.enum(['pending', 'in-flight', 'completed', 'abandoned']),
  records_read: z.number().int().nonnegative(),
  records_skipped: z.number().int().nonnegative(),
  embedded_from_cache: z.number().int().nonnegative(),
  embedded_computed: z.number().int().nonnegative(),
  committed_vectors: z.number().int().nonnegative(),
  committed_documents: z.number().int().nonnegative(),
  batches_completed: z.number().int().nonnegative(),
  batches_abandoned: z.number().int().nonnegative(),
  duration_ms: z.number().int().nonnegative(),
});

const SinkStatusSchema = z.enum(['committed', 'fatal']);

/**
 * `chunk_ids` is stored as a JSON array and parsed here.
 */
const ChunkIdsColumnSchema = z.string().transform((value, ctx) => {
  let raw: unknown = null;
  try {
    raw = JSON.parse(value);
  } catch {
    raw = null;
  }
  const parsed = z.array(z.string()).safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'chunk_ids is not a JSON string array' });
  return z.NEVER;
});

export const AbandonedBatchRowSchema = z.object({
  id: z.number().int(),
  run_id: z.string(),
  file: z.string(),
  path: z.string(),
  batch_ordinal: z.number().int().nonnegative(),
  chunk_ids: ChunkIdsColumnSchema,
  vectors_status: SinkStatusSchema,
  vectors_error: z.string().nullable(),
  documents_status: SinkStatusSchema,
  documents_error: z.string().nullable(),
  created_at: z.string(),
  resolved_at: z.string().nullable(),
});

// ============================================================================
// Sink Schemas
// ============================================================================

export const CollectionRowSchema = z.object({
  name: z.string(),
  dimension: z.number().int().positive(),
  distance: z.string(),
});

export const DocumentRowSchema = z.object({
  id: z.string(),
  document_id: z.string(),
  chunk_index: z.number().int(),
  text: z.string(),
  metadata: z.string(),
});

export const CountRowSchema = z.object({ count: z.number().int().nonnegative() });

// ============================================================================
// Validation Errors
// ============================================================================

/**
 * Thrown when a row read from SQLite does not match its schema.
 *
 * Exit code 5 (database error).
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const issues = zodIssues.map((issue) => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message,
    }));

    const summary = issues
      .slice(0, 3)
      .map((issue) => `  - ${issue.path}: ${issue.message}`)
      .join('\n');

    super(
      message,
      `Schema validation failed:\n${summary}` +
        (issues.length > 3 ? `\n  ... and ${issues.length - 3} more` : '') +
        `\n\nThe database may have been written by a different version of corpus-ingest.`,
      5
    );
    this.name = 'SchemaValidationError';
    this.issues = issues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row against a Zod schema.
 *
 * @param context - Where the row came from, for error messages (e.g. "runs.id=...")
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodTypeAny>(schema: T, row: unknown, context: string): z.output<T> {
  const result = schema.safeParse(row);
  if (result.success) {
    return result.data;
  }
  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of rows, throwing on the first invalid one.
 */
export function validateRows<T extends z.ZodTypeAny>(
  schema: T,
  rows: unknown[],
  context: string
): Array<z.output<T>> {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
