/**
 * Worker-thread pool for random rollouts
 *
 * Searches are synchronous, so a batch blocks the calling thread on a shared
 * completion counter (`Atomics.wait`) while the workers play their share of
 * the rollouts. Every rollout is seeded before the batch is split, in rollout
 * order, so a sum does not depend on the pool size or on which worker
 * finishes first.
 *
 * Workers are unref'd and never keep the process alive. Running from the
 * TypeScript sources, workers load their entry through tsx.
 */

import { availableParallelism } from 'node:os';
import { MessageChannel, type MessagePort, Worker, receiveMessageOnPort } from 'node:worker_threads';

import type { Board } from '../board/board.js';
import { SearchConfigError, SearchWorkerError } from '../errors.js';

import type { RandomTreeMetric } from './random-tree.js';

const RUNNING_FROM_SOURCES = import.meta.url.endsWith('.ts');

const WORKER_ENTRY = new URL(
  RUNNING_FROM_SOURCES ? './rollout-worker.ts' : './rollout-worker.js',
  import.meta.url,
);

const WORKER_EXEC_ARGV = RUNNING_FROM_SOURCES ? ['--import', 'tsx'] : [];

const MAX_DEFAULT_WORKERS = 4;

/**
 * How long a new pool waits for its workers to load
 */
export const DEFAULT_STARTUP_TIMEOUT_MS = 30_000;

/**
 * Data every worker is started with
 */
export interface WorkerSetup {
  index: number;
  /** One Int32 flag per worker, set once the worker listens for jobs */
  ready: SharedArrayBuffer;
  /** Where the worker reports jobs that threw */
  failures: MessagePort;
}

/**
 * One worker's share of a batch
 */
export interface RolloutJob {
  cells: number[];
  score: number;
  numMoves: number;
  metric: RandomTreeMetric;
  seeds: number[];
  /** Index of this job's sum in `results` */
  slot: number;
  /** Float64 sums, one per job */
  results: SharedArrayBuffer;
  /** Int32 count of finished jobs */
  done: SharedArrayBuffer;
}

export interface RolloutPoolOptions {
  /** Worker count; defaults to one less than the available cores, at most 4 */
  size?: number;
  startupTimeoutMs?: number;
}

interface PoolWorker {
  worker: Worker;
  failures: MessagePort;
}

function defaultPoolSize(): number {
  return Math.max(1, Math.min(MAX_DEFAULT_WORKERS, availableParallelism() - 1));
}

/**
 * Split seeds into at most `parts` contiguous chunks of near-equal length
 */
export function splitSeeds(seeds: readonly number[], parts: number): number[][] {
  const chunkSize = Math.ceil(seeds.length / parts);
  const chunks: number[][] = [];
  for (let start = 0; start < seeds.length; start += chunkSize) {
    chunks.push(seeds.slice(start, start + chunkSize));
  }
  return chunks;
}

/**
 * Fixed-size pool of rollout workers
 */
export class RolloutPool {
  readonly size: number;
  private readonly startupTimeoutMs: number;
  private readonly readyBuffer: SharedArrayBuffer;
  private readonly ready: Int32Array;
  private readonly workers: PoolWorker[];
  private started = false;
  private closed = false;
  private crash: Error | undefined;

  constructor(options: RolloutPoolOptions = {}) {
    const size = options.size ?? defaultPoolSize();
    if (!Number.isInteger(size) || size < 1) {
      throw new SearchConfigError('size', `must be a positive integer, got ${size}`);
    }
    this.size = size;
    this.startupTimeoutMs = options.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS;
    this.readyBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT * size);
    this.ready = new Int32Array(this.readyBuffer);
    this.workers = Array.from({ length: size }, (_, index) => this.spawn(index));
  }

  private spawn(index: number): PoolWorker {
    const { port1, port2 } = new MessageChannel();
    const setup: WorkerSetup = { index, ready: this.readyBuffer, failures: port2 };
    const worker = new Worker(WORKER_ENTRY, {
      workerData: setup,
      transferList: [port2],
      execArgv: WORKER_EXEC_ARGV,
    });
    worker.on('error', (error) => {
      this.crash = error;
    });
    worker.unref();
    port1.unref();
    return { worker, failures: port1 };
  }

  /**
   * Sum a terminal metric over one rollout per seed, played on the workers
   *
   * Blocks until every rollout has finished.
   * @throws SearchWorkerError if the pool is closed, a worker failed to start
   *   or a rollout threw
   */
  sum(board: Board, seeds: readonly number[], metric: RandomTreeMetric): number {
    if (seeds.length === 0) {
      return 0;
    }
    this.assertUsable();
    this.awaitStartup();

    const chunks = splitSeeds(seeds, this.size);
    const results = new SharedArrayBuffer(Float64Array.BYTES_PER_ELEMENT * chunks.length);
    const done = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
    const cells = board.getCells();

    chunks.forEach((chunk, slot) => {
      const job: RolloutJob = {
        cells,
        score: board.score,
        numMoves: board.numMoves,
        metric,
        seeds: chunk,
        slot,
        results,
        done,
      };
      this.workerAt(slot).worker.postMessage(job);
    });

    this.awaitJobs(new Int32Array(done), chunks.length);
    this.throwReportedFailure();

    return new Float64Array(results).reduce((total, value) => total + value, 0);
  }

  /**
   * Stop every worker; the pool cannot be used afterwards
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const { failures } of this.workers) {
      failures.close();
    }
    await Promise.all(this.workers.map(({ worker }) => worker.terminate()));
  }

  private workerAt(slot: number): PoolWorker {
    const entry = this.workers[slot % this.size];
    if (entry === undefined) {
      throw new SearchWorkerError(`No worker for job ${slot}`);
    }
    return entry;
  }

  private assertUsable(): void {
    if (this.closed) {
      throw new SearchWorkerError('Rollout pool is closed');
    }
    if (this.crash !== undefined) {
      throw new SearchWorkerError(`Rollout worker crashed: ${this.crash.message}`, {
        cause: this.crash,
      });
    }
  }

  private awaitStartup(): void {
    if (this.started) return;

    const deadline = Date.now() + this.startupTimeoutMs;
    for (let index = 0; index < this.size; index++) {
      while (Atomics.load(this.ready, index) === 0) {
        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          throw new SearchWorkerError(
            `Rollout worker ${index} did not start within ${this.startupTimeoutMs} ms`,
          );
        }
        Atomics.wait(this.ready, index, 0, remaining);
      }
    }
    this.started = true;
  }

  private awaitJobs(done: Int32Array, expected: number): void {
    for (;;) {
      const finished = Atomics.load(done, 0);
      if (finished >= expected) return;
      Atomics.wait(done, 0, finished);
    }
  }

  private throwReportedFailure(): void {
    const reports: string[] = [];
    for (const { failures } of this.workers) {
      let received = receiveMessageOnPort(failures);
      while (received !== undefined) {
        const report: unknown = received.message;
        reports.push(String(report));
        received = receiveMessageOnPort(failures);
      }
    }
    const first = reports[0];
    if (first !== undefined) {
      throw new SearchWorkerError(first);
    }
  }
}

let sharedPool: RolloutPool | undefined;

/**
 * The process-wide pool used by parallel searches, started on first use
 */
export function sharedRolloutPool(): RolloutPool {
  sharedPool ??= new RolloutPool();
  return sharedPool;
}

/**
 * Stop the process-wide pool; the next parallel search starts a new one
 */
export async function closeSharedRolloutPool(): Promise<void> {
  const pool = sharedPool;
  sharedPool = undefined;
  if (pool !== undefined) {
    await pool.close();
  }
}
