/**
 * Worker Thread Pool: mines proof-of-work off the main event loop
 *
 * Architecture:
 * - Up to N worker threads (default: CPU cores - 1, min 1, max 4), spawned lazily
 * - One mining task per worker; further tasks wait for a free slot
 * - Each task gets a unique ID and a Promise that resolves when the worker answers
 * - Cancelling (AbortSignal) or timing out terminates that worker; the slot
 *   respawns on next use
 *
 * Usage:
 *   const pool = new WorkerPool({ size: 2 });
 *   const mined = await pool.mine(unsigned, 20, { signal });
 *   await pool.destroy();
 */
import { Worker } from 'worker_threads';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { MinedEvent } from '../anti-spam/pow';
import { ProtocolError } from '../errors';
import { UnsignedEvent } from '../events/types';
import { logger, StructuredLogger } from './structured-logger';
import type { PowTaskMessage } from './pow-worker';

const DEFAULT_TASK_TIMEOUT_MS = 120_000;
const DEFAULT_BATCH_SIZE = 5_000;

interface PendingTask {
  id: string;
  resolve: (value: MinedEvent) => void;
  reject: (reason: Error) => void;
  timer: NodeJS.Timeout;
  detach: () => void;
}

interface Slot {
  index: number;
  worker?: Worker;
  task?: PendingTask;
  /** Held by a caller between acquire() and the end of its task */
  claimed: boolean;
}

interface Waiter {
  resolve: (slot: Slot) => void;
  reject: (reason: Error) => void;
}

interface WorkerReply {
  id: string;
  result?: MinedEvent;
  error?: string;
}

function isWorkerReply(value: unknown): value is WorkerReply {
  return typeof value === 'object' && value !== null && 'id' in value && typeof value.id === 'string';
}

export class WorkerPool {
  private slots: Slot[] = [];
  private waiting: Waiter[] = [];
  private taskCounter = 0;
  private destroyed = false;
  private readonly taskTimeout: number;
  private readonly workerPath: string;
  private readonly log: StructuredLogger;

  constructor(opts: { size?: number; taskTimeoutMs?: number; logger?: StructuredLogger } = {}) {
    const cpus = os.cpus().length;
    const size = opts.size ?? Math.max(1, Math.min(4, cpus - 1));
    this.taskTimeout = opts.taskTimeoutMs ?? DEFAULT_TASK_TIMEOUT_MS;
    this.log = opts.logger ?? logger;
    this.workerPath = WorkerPool.resolveWorkerPath();

    for (let i = 0; i < size; i++) {
      this.slots.push({ index: i, claimed: false });
    }
  }

  // Compiled: dist/scaling/pow-worker.js. From sources (tests): the .ts file through ts-node.
  private static resolveWorkerPath(): string {
    const compiled = path.resolve(__dirname, 'pow-worker.js');
    return fs.existsSync(compiled) ? compiled : path.resolve(__dirname, 'pow-worker.ts');
  }

  private spawn(slot: Slot): Worker {
    const worker = new Worker(this.workerPath, {
      execArgv: this.workerPath.endsWith('.ts') ? ['--require', 'ts-node/register/transpile-only'] : [],
    });

    worker.on('message', (msg: unknown) => {
      if (!isWorkerReply(msg)) return;
      const task = slot.task;
      if (!task || task.id !== msg.id) return;

      if (msg.result) {
        this.finish(slot, task);
        task.resolve(msg.result);
      } else {
        this.finish(slot, task);
        task.reject(new Error(msg.error ?? 'Worker returned no result'));
      }
    });

    worker.on('error', err => {
      this.log.error('WorkerPool', `Worker ${slot.index} error`, { error: err.message });
    });

    worker.on('exit', code => {
      if (slot.worker !== worker) return;
      slot.worker = undefined;
      const task = slot.task;
      if (task) {
        this.finish(slot, task);
        task.reject(new ProtocolError('WORKER_UNAVAILABLE', `Worker ${slot.index} exited with code ${code}`));
      }
    });

    slot.worker = worker;
    return worker;
  }

  private acquire(): Promise<Slot> {
    const free = this.slots.find(slot => !slot.claimed);
    if (free) {
      free.claimed = true;
      return Promise.resolve(free);
    }
    return new Promise((resolve, reject) => this.waiting.push({ resolve, reject }));
  }

  private finish(slot: Slot, task: PendingTask): void {
    clearTimeout(task.timer);
    task.detach();
    slot.task = undefined;
    this.release(slot);
  }

  // The slot passes straight to the next waiter, still claimed
  private release(slot: Slot): void {
    const next = this.waiting.shift();
    if (next) {
      next.resolve(slot);
    } else {
      slot.claimed = false;
    }
  }

  private kill(slot: Slot): void {
    const worker = slot.worker;
    if (!worker) return;
    slot.worker = undefined;
    worker.terminate().catch(err => {
      this.log.warn('WorkerPool', `Failed to terminate worker ${slot.index}`, {
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }

  async mine(
    event: UnsignedEvent,
    difficulty: number,
    opts: { signal?: AbortSignal; startNonce?: number; batchSize?: number } = {}
  ): Promise<MinedEvent> {
    if (this.destroyed) {
      throw new ProtocolError('WORKER_UNAVAILABLE', 'WorkerPool is destroyed');
    }
    if (opts.signal?.aborted) {
      throw new ProtocolError('ABORTED', 'Mining cancelled before it started');
    }

    const slot = await this.acquire();
    if (opts.signal?.aborted) {
      this.release(slot);
      throw new ProtocolError('ABORTED', 'Mining cancelled while waiting for a worker');
    }
    const worker = slot.worker ?? this.spawn(slot);
    const id = `pow_${++this.taskCounter}`;
    const signal = opts.signal;

    return new Promise<MinedEvent>((resolve, reject) => {
      const onAbort = () => {
        const task = slot.task;
        if (!task || task.id !== id) return;
        this.kill(slot);
        this.finish(slot, task);
        reject(new ProtocolError('ABORTED', `Mining task ${id} cancelled`));
      };

      const timer = setTimeout(() => {
        const task = slot.task;
        if (!task || task.id !== id) return;
        this.kill(slot);
        this.finish(slot, task);
        reject(new ProtocolError('WORKER_TIMEOUT', `Mining task ${id} timed out after ${this.taskTimeout}ms`));
      }, this.taskTimeout);

      slot.task = {
        id,
        resolve,
        reject,
        timer,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const message: PowTaskMessage = {
        id,
        event,
        difficulty,
        startNonce: opts.startNonce ?? 0,
        batchSize: opts.batchSize ?? DEFAULT_BATCH_SIZE,
      };
      worker.postMessage(message);
    });
  }

  getStats(): { workers: number; running: number; busy: number; waiting: number; totalDispatched: number } {
    return {
      workers: this.slots.length,
      running: this.slots.filter(slot => slot.worker).length,
      busy: this.slots.filter(slot => slot.claimed).length,
      waiting: this.waiting.length,
      totalDispatched: this.taskCounter,
    };
  }

  async destroy(): Promise<void> {
    this.destroyed = true;
    const terminations: Promise<number>[] = [];
    for (const slot of this.slots) {
      const task = slot.task;
      if (task) {
        clearTimeout(task.timer);
        task.detach();
        slot.task = undefined;
        task.reject(new ProtocolError('WORKER_UNAVAILABLE', 'WorkerPool destroyed'));
      }
      slot.claimed = false;
      const worker = slot.worker;
      slot.worker = undefined;
      if (worker) terminations.push(worker.terminate());
    }
    for (const waiter of this.waiting.splice(0)) {
      waiter.reject(new ProtocolError('WORKER_UNAVAILABLE', 'WorkerPool destroyed'));
    }
    await Promise.all(terminations);
    this.log.debug('WorkerPool', 'Destroyed');
  }
}
