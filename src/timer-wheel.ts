/**
 * Timer Wheel for state timeouts
 *
 * One Node.js timer per engine instead of one per timeout state. Timeouts are
 * hashed into buckets by expiry tick; each tick runs the expired bucket.
 *
 * The wheel only ticks while tasks are pending. A pending timeout keeps the
 * process alive until it fires or the engine stops.
 */

import type winston from 'winston';

export interface TimeoutTask {
  id: string;
  expiresAt: number;
  bucket: number;
  callback: () => void;
}

export interface TimerWheelStats {
  pendingTasks: number;
  bucketsUsed: number;
  tickMs: number;
  wheelSize: number;
  currentTick: number;
}

export class TimerWheel {
  private tickMs: number;
  private wheelSize: number;
  private currentTick: number;
  private wheel: TimeoutTask[][];
  private taskMap: Map<string, TimeoutTask>;
  private timer: NodeJS.Timeout | null;
  private logger?: winston.Logger;

  /**
   * @param tickMs Tick interval (default: 10ms)
   * @param wheelSize Number of buckets (default: 6000, one minute per lap at 10ms)
   */
  constructor(tickMs: number = 10, wheelSize: number = 6000, logger?: winston.Logger) {
    this.tickMs = tickMs;
    this.wheelSize = wheelSize;
    this.currentTick = 0;
    this.wheel = Array.from({ length: wheelSize }, () => []);
    this.taskMap = new Map();
    this.timer = null;
    this.logger = logger;
  }

  /**
   * Schedule a one-shot callback, replacing any task with the same id
   */
  schedule(id: string, delayMs: number, callback: () => void): void {
    this.cancel(id);

    const ticksFromNow = Math.max(1, Math.ceil(delayMs / this.tickMs));
    const task: TimeoutTask = {
      id,
      expiresAt: Date.now() + delayMs,
      bucket: (this.currentTick + ticksFromNow) % this.wheelSize,
      callback,
    };

    this.wheel[task.bucket].push(task);
    this.taskMap.set(id, task);
    this.ensureTicking();
  }

  /**
   * @returns true if a pending task was removed
   */
  cancel(id: string): boolean {
    const task = this.taskMap.get(id);
    if (!task) return false;

    const bucket = this.wheel[task.bucket];
    const index = bucket.indexOf(task);
    if (index >= 0) {
      bucket.splice(index, 1);
    }
    this.taskMap.delete(id);

    if (this.taskMap.size === 0) {
      this.halt();
    }
    return true;
  }

  has(id: string): boolean {
    return this.taskMap.has(id);
  }

  getPendingCount(): number {
    return this.taskMap.size;
  }

  getStats(): TimerWheelStats {
    return {
      pendingTasks: this.taskMap.size,
      bucketsUsed: this.wheel.filter(tasks => tasks.length > 0).length,
      tickMs: this.tickMs,
      wheelSize: this.wheelSize,
      currentTick: this.currentTick,
    };
  }

  /**
   * Drop every pending task and stop ticking
   */
  clear(): void {
    for (const tasks of this.wheel) {
      tasks.length = 0;
    }
    this.taskMap.clear();
    this.halt();
  }

  private ensureTicking(): void {
    if (this.timer) return;
    this.timer = setTimeout(() => this.tick(), this.tickMs);
  }

  private halt(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private tick(): void {
    this.timer = null;
    this.currentTick = (this.currentTick + 1) % this.wheelSize;

    const now = Date.now();
    const bucket = this.wheel[this.currentTick];
    const due = bucket.splice(0, bucket.length);

    for (const task of due) {
      if (task.expiresAt <= now) {
        this.taskMap.delete(task.id);
        try {
          task.callback();
        } catch (error) {
          this.logger?.error('Timer wheel callback error', { task: task.id, error });
        }
      } else {
        // Multi-lap (or late-scheduled) task: re-hash by remaining time
        const ticksFromNow = Math.max(1, Math.ceil((task.expiresAt - now) / this.tickMs));
        task.bucket = (this.currentTick + ticksFromNow) % this.wheelSize;
        this.wheel[task.bucket].push(task);
      }
    }

    if (this.taskMap.size > 0) {
      this.ensureTicking();
    }
  }
}
