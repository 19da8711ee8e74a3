/**
 * Query worker thread
 *
 * Holds one read-only connection and runs one statement per message inside
 * a deferred transaction. The engine terminates the thread when a statement
 * outlives its deadline, which is the only way to stop a long row step.
 */

import { parentPort, workerData } from 'node:worker_threads';
import Database, { Database as DatabaseType } from 'better-sqlite3';
import {
  QueryWorkerDataSchema,
  QueryWorkerRequestSchema,
  type QueryWorkerFailure,
  type QueryWorkerReady,
  type QueryWorkerReply,
  type QueryWorkerRequest,
  type QueryWorkerSuccess,
  type WorkerCell,
} from './worker-protocol.js';

const data = QueryWorkerDataSchema.parse(workerData);
let connection: DatabaseType | null = null;

class NotReaderError extends Error {}

function open(): DatabaseType {
  if (connection === null) {
    connection = new Database(data.databasePath, {
      readonly: true,
      fileMustExist: true,
      timeout: data.busyTimeoutMs,
    });
  }
  return connection;
}

function prepareStatement(
  db: DatabaseType,
  request: QueryWorkerRequest
): { statement: Database.Statement<unknown[]>; rewritten: boolean; rewriteError: string | null } {
  let rewriteError: string | null = null;
  if (request.rewrittenSql !== null) {
    try {
      return { statement: db.prepare(request.rewrittenSql), rewritten: true, rewriteError };
    } catch (error) {
      rewriteError = error instanceof Error ? error.message : String(error);
    }
  }
  return { statement: db.prepare(request.sql), rewritten: false, rewriteError };
}

function run(request: QueryWorkerRequest): QueryWorkerSuccess {
  const db = open();
  return db
    .transaction((): QueryWorkerSuccess => {
      const generationRow = db
        .prepare("SELECT value FROM index_state WHERE key = 'generation'")
        .get() as { value: number } | undefined;
      const { statement, rewritten, rewriteError } = prepareStatement(db, request);
      if (!statement.reader) {
        throw new NotReaderError('Statement does not return rows');
      }
      const columns = statement.columns().map((column) => column.name);
      const rows: Record<string, WorkerCell>[] = [];
      let truncated = false;
      for (const row of statement.iterate(...request.args)) {
        if (rows.length >= request.limit) {
          truncated = true;
          break;
        }
        rows.push(row as Record<string, WorkerCell>);
      }
      return {
        ok: true,
        columns,
        rows,
        truncated,
        rewritten,
        rewriteError,
        generation: generationRow?.value ?? 0,
      };
    })
    .deferred();
}

function describeFailure(error: unknown): QueryWorkerFailure {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof NotReaderError) {
    return { kind: 'not_reader', message, code: null };
  }
  // better-sqlite3 reports binding mistakes as RangeError or TypeError
  if (error instanceof RangeError || error instanceof TypeError) {
    return { kind: 'bind', message, code: null };
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return { kind: 'sqlite', message, code: error.code };
  }
  return { kind: 'other', message, code: null };
}

parentPort?.on('message', (message: unknown) => {
  let reply: QueryWorkerReply;
  try {
    reply = run(QueryWorkerRequestSchema.parse(message));
  } catch (error) {
    reply = { ok: false, error: describeFailure(error) };
  }
  parentPort?.postMessage(reply);
});

const ready: QueryWorkerReady = { ready: true };
parentPort?.postMessage(ready);
