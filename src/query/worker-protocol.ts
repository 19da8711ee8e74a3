/**
 * Messages exchanged between the query engine and its worker threads
 */

import { z } from 'zod';

export const QueryWorkerDataSchema = z.object({
  databasePath: z.string().min(1),
  busyTimeoutMs: z.number().int().nonnegative(),
});

export type QueryWorkerData = z.infer<typeof QueryWorkerDataSchema>;

export const QueryWorkerRequestSchema = z.object({
  sql: z.string(),
  /** Full-text form of `sql`, tried first when present */
  rewrittenSql: z.string().nullable(),
  args: z.array(z.unknown()),
  limit: z.number().int().positive(),
});

export type QueryWorkerRequest = z.infer<typeof QueryWorkerRequestSchema>;

/** First message a worker sends, once its modules have loaded */
export const QueryWorkerReadySchema = z.object({ ready: z.literal(true) });

export type QueryWorkerReady = z.infer<typeof QueryWorkerReadySchema>;

// Buffers arrive as plain Uint8Array after structured cloning
const CellSchema = z.union([z.string(), z.number(), z.bigint(), z.null(), z.instanceof(Uint8Array)]);

export type WorkerCell = z.infer<typeof CellSchema>;

export const WorkerFailureKindSchema = z.enum(['not_reader', 'bind', 'sqlite', 'other']);

export type WorkerFailureKind = z.infer<typeof WorkerFailureKindSchema>;

export const QueryWorkerReplySchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    columns: z.array(z.string()),
    rows: z.array(z.record(CellSchema)),
    truncated: z.boolean(),
    rewritten: z.boolean(),
    /** Why the full-text form failed to compile, when it did */
    rewriteError: z.string().nullable(),
    generation: z.number(),
  }),
  z.object({
    ok: z.literal(false),
    error: z.object({
      kind: WorkerFailureKindSchema,
      message: z.string(),
      code: z.string().nullable(),
    }),
  }),
]);

export type QueryWorkerReply = z.infer<typeof QueryWorkerReplySchema>;

export type QueryWorkerSuccess = Extract<QueryWorkerReply, { ok: true }>;
export type QueryWorkerFailure = Extract<QueryWorkerReply, { ok: false }>['error'];
