/**
 * Pool of query worker threads
 *
 * Each worker owns a read-only connection and runs one statement at a time.
 * A statement that outlives its deadline fails with TIMEOUT at once and its
 * worker is terminated; the thread stops when its current row step returns,
 * ending the read transaction. A fresh worker is spawned on demand.
 */

import { Worker } from 'node:worker_threads';
import type { MdqueryLogger } from '../logging/logger.js';
import { StorageError, StorageErrorCode } from '../storage/types.js';
import { QueryExecutionError, QueryExecutionErrorCode } from './types.js';
import {
  QueryWorkerReadySchema,
  QueryWorkerReplySchema,
  type QueryWorkerData,
  type QueryWorkerReply,
  type QueryWorkerRequest,
} from './worker-protocol.js';

export interface QueryWorkerPoolOptions {
  databasePath: string;
  /** Most workers alive at once */
  size: number;
  busyTimeoutMs: number;
  logger: MdqueryLogger;
}

// Running from TypeScript sources (tests) the worker needs the tsx loader
const RUNNING_FROM_SOURCE = import.meta.url.endsWith('.ts');
const WORKER_URL = new URL(RUNNING_FROM_SOURCE ? './query-worker.ts' : './query-worker.js', import.meta.url);
const WORKER_EXEC_ARGV = RUNNING_FROM_SOURCE ? ['--import', 'tsx'] : [];

export class QueryWorkerPool {
  private readonly all = new Set<Worker>();
  private readonly idle: Worker[] = [];
  private readonly waiters: (() => void)[] = [];
  private readonly stopping = new Set<Promise<void>>();
  private closed = false;

  constructor(private readonly options: QueryWorkerPoolOptions) {}

  /**
   * Run one request on an idle worker
   *
   * @throws QueryExecutionError TIMEOUT when no reply arrives in time
   * @throws StorageError CLOSED once the pool is closed
   */
  async run(request: QueryWorkerRequest, timeoutMs: number): Promise<QueryWorkerReply> {
    const worker = await this.acquire();
    try {
      const reply = await this.exchange(worker, request, timeoutMs);
      this.release(worker);
      return reply;
    } catch (error) {
      this.discard(worker);
      throw error;
    }
  }

  /**
   * Terminate every worker and fail pending requests
   */
  async close(): Promise<void> {
    this.closed = true;
    for (const worker of [...this.all]) {
      this.discard(worker);
    }
    this.idle.length = 0;
    for (const wake of this.waiters.splice(0)) {
      wake();
    }
    await Promise.all([...this.stopping]);
  }

  private async acquire(): Promise<Worker> {
    for (;;) {
      if (this.closed) {
        throw new StorageError('Store is closed', StorageErrorCode.CLOSED);
      }
      const idle = this.idle.pop();
      if (idle !== undefined) {
        idle.ref();
        return idle;
      }
      if (this.all.size < this.options.size) {
        return this.spawn();
      }
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  private async spawn(): Promise<Worker> {
    const workerData: QueryWorkerData = {
      databasePath: this.options.databasePath,
      busyTimeoutMs: this.options.busyTimeoutMs,
    };
    const worker = new Worker(WORKER_URL, { workerData, execArgv: WORKER_EXEC_ARGV });
    this.all.add(worker);
    worker.on('error', (error) => {
      this.options.logger.warn({ err: error.message }, 'Query worker failed');
    });
    worker.on('exit', () => {
      this.forget(worker);
    });
    try {
      await this.started(worker);
    } catch (error) {
      this.discard(worker);
      throw error;
    }
    this.options.logger.debug({ workers: this.all.size }, 'Query worker started');
    return worker;
  }

  /**
   * Resolve once the worker reports its modules loaded, so start-up time
   * never counts against a query's deadline
   */
  private started(worker: Worker): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const cleanup = (): void => {
        worker.off('message', onMessage);
        worker.off('error', onError);
        worker.off('exit', onExit);
      };
      const onMessage = (message: unknown): void => {
        cleanup();
        if (QueryWorkerReadySchema.safeParse(message).success) {
          resolve();
        } else {
          reject(new QueryExecutionError('Query worker sent no ready signal', QueryExecutionErrorCode.ENGINE_FAULT));
        }
      };
      const onError = (error: Error): void => {
        cleanup();
        reject(
          new QueryExecutionError(
            `Query worker failed to start: ${error.message}`,
            QueryExecutionErrorCode.ENGINE_FAULT,
            error
          )
        );
      };
      const onExit = (code: number): void => {
        cleanup();
        reject(
          this.closed
            ? new StorageError('Store is closed', StorageErrorCode.CLOSED)
            : new QueryExecutionError(
                `Query worker exited with code ${code} while starting`,
                QueryExecutionErrorCode.ENGINE_FAULT
              )
        );
      };
      worker.on('message', onMessage);
      worker.on('error', onError);
      worker.on('exit', onExit);
    });
  }

  private exchange(worker: Worker, request: QueryWorkerRequest, timeoutMs: number): Promise<QueryWorkerReply> {
    return new Promise<QueryWorkerReply>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        worker.off('message', onMessage);
        worker.off('error', onError);
        worker.off('exit', onExit);
      };
      const onMessage = (message: unknown): void => {
        cleanup();
        const parsed = QueryWorkerReplySchema.safeParse(message);
        if (parsed.success) {
          resolve(parsed.data);
        } else {
          reject(
            new QueryExecutionError(
              `Malformed reply from query worker: ${parsed.error.message}`,
              QueryExecutionErrorCode.ENGINE_FAULT
            )
          );
        }
      };
      const onError = (error: Error): void => {
        cleanup();
        reject(
          new QueryExecutionError(`Query worker failed: ${error.message}`, QueryExecutionErrorCode.ENGINE_FAULT, error)
        );
      };
      const onExit = (code: number): void => {
        cleanup();
        reject(
          this.closed
            ? new StorageError('Store is closed', StorageErrorCode.CLOSED)
            : new QueryExecutionError(
                `Query worker exited with code ${code}`,
                QueryExecutionErrorCode.ENGINE_FAULT
              )
        );
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(
          new QueryExecutionError(`Query exceeded its ${timeoutMs}ms timeout`, QueryExecutionErrorCode.TIMEOUT)
        );
      }, timeoutMs);

      worker.on('message', onMessage);
      worker.on('error', onError);
      worker.on('exit', onExit);
      worker.postMessage(request);
    });
  }

  private release(worker: Worker): void {
    if (this.closed || !this.all.has(worker)) {
      return;
    }
    // Idle workers must not keep the process alive
    worker.unref();
    this.idle.push(worker);
    this.waiters.shift()?.();
  }

  private discard(worker: Worker): void {
    if (!this.all.has(worker)) {
      return;
    }
    this.forget(worker);
    const stopped = worker.terminate().then(
      () => undefined,
      (error: unknown) => {
        this.options.logger.warn(
          { err: error instanceof Error ? error.message : String(error) },
          'Query worker did not stop cleanly'
        );
      }
    );
    this.stopping.add(stopped);
    void stopped.finally(() => this.stopping.delete(stopped));
  }

  private forget(worker: Worker): void {
    if (!this.all.delete(worker)) {
      return;
    }
    const index = this.idle.indexOf(worker);
    if (index !== -1) {
      this.idle.splice(index, 1);
    }
    this.waiters.shift()?.();
  }
}
