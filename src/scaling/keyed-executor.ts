/**
 * Keyed Serial Executor
 *
 * One lane per key (a transaction root). Tasks in a lane run one at a time;
 * lanes run concurrently. Tasks waiting in a lane are kept sorted by
 * (createdAt, id), and a lane starts draining on the next macrotask so a
 * burst of deliveries is applied in timestamp order rather than arrival order.
 */

interface QueuedTask {
  createdAt: number;
  id: string;
  execute: () => Promise<void>;
}

interface Lane {
  queue: QueuedTask[];
  running: boolean;
}

export interface TaskOrder {
  createdAt: number;
  id: string;
}

function compareOrder(a: TaskOrder, b: TaskOrder): number {
  if (a.createdAt !== b.createdAt) return a.createdAt - b.createdAt;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class KeyedExecutor {
  private lanes: Map<string, Lane> = new Map();
  private pending = 0;
  private idleWaiters: Array<() => void> = [];

  submit<T>(key: string, order: TaskOrder, task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const queued: QueuedTask = {
        createdAt: order.createdAt,
        id: order.id,
        execute: () => Promise.resolve().then(task).then(resolve, reject),
      };

      let lane = this.lanes.get(key);
      if (!lane) {
        lane = { queue: [], running: false };
        this.lanes.set(key, lane);
      }

      const index = lane.queue.findIndex(existing => compareOrder(queued, existing) < 0);
      if (index === -1) lane.queue.push(queued);
      else lane.queue.splice(index, 0, queued);
      this.pending++;

      if (!lane.running) {
        lane.running = true;
        setImmediate(() => {
          void this.drain(key);
        });
      }
    });
  }

  private async drain(key: string): Promise<void> {
    const lane = this.lanes.get(key);
    if (!lane) return;

    let next = lane.queue.shift();
    while (next) {
      // execute() settles the caller's promise and never rejects itself
      await next.execute();
      this.pending--;
      next = lane.queue.shift();
    }

    lane.running = false;
    this.lanes.delete(key);
    if (this.pending === 0) {
      for (const waiter of this.idleWaiters.splice(0)) waiter();
    }
  }

  /**
   * Resolves once every lane has drained.
   */
  onIdle(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  getStats(): { lanes: number; pending: number } {
    return { lanes: this.lanes.size, pending: this.pending };
  }
}
