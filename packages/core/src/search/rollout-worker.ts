/**
 * Rollout worker entry, started by RolloutPool
 */

import { parentPort, workerData } from 'node:worker_threads';

import { Board } from '../board/board.js';

import { sumSeededRollouts } from './random-tree.js';
import type { RolloutJob, WorkerSetup } from './worker-pool.js';

const port = parentPort;
if (port === null) {
  throw new Error('rollout-worker must be started as a worker thread');
}

const setup: WorkerSetup = workerData;
const ready = new Int32Array(setup.ready);

function runJob(job: RolloutJob): void {
  const done = new Int32Array(job.done);
  try {
    const board = Board.fromCells(job.cells, { score: job.score, numMoves: job.numMoves });
    new Float64Array(job.results)[job.slot] = sumSeededRollouts(board, job.seeds, job.metric);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    setup.failures.postMessage(`Rollout job ${job.slot} failed: ${reason}`);
  } finally {
    Atomics.add(done, 0, 1);
    Atomics.notify(done, 0);
  }
}

port.on('message', runJob);

Atomics.store(ready, setup.index, 1);
Atomics.notify(ready, setup.index);
