import Denque from "denque";
import type { MetricSnapshot } from "./scheduler.js";

/**
 * Receives every snapshot produced by a flush cycle.
 */
export interface Sink {
  write(snapshot: MetricSnapshot): void;
}

export interface QueueSinkOptions {
  maxSize?: number; // Oldest snapshots are dropped beyond this size. Unbounded by default.
}

/**
 * Buffers snapshots in memory until a consumer drains them.
 * @example
 * const sink = new QueueSink({ maxSize: 100 });
 * startPeriodicFlush(engine, { sink });
 * // later
 * for (const snapshot of sink.drain()) ship(snapshot);
 */
export class QueueSink implements Sink {
  private queue = new Denque<MetricSnapshot>();
  private readonly maxSize: number;
  private dropped = 0;

  constructor({ maxSize = Infinity }: QueueSinkOptions = {}) {
    if (!(maxSize > 0)) {
      throw new RangeError(`Queue size must be positive: ${maxSize}`);
    }
    this.maxSize = maxSize;
  }

  write(snapshot: MetricSnapshot): void {
    this.queue.push(snapshot);
    while (this.queue.length > this.maxSize) {
      this.queue.shift();
      this.dropped++;
    }
  }

  /**
   * Removes and returns every buffered snapshot, oldest first.
   */
  drain(): MetricSnapshot[] {
    const snapshots = this.queue.toArray();
    this.queue.clear();
    return snapshots;
  }

  peek(): MetricSnapshot | undefined {
    return this.queue.peekFront();
  }

  get size(): number {
    return this.queue.length;
  }

  /** Snapshots discarded because the queue was full. */
  get droppedCount(): number {
    return this.dropped;
  }
}

/**
 * Wraps a function as a {@link Sink}.
 */
export const callbackSink = (
  write: (snapshot: MetricSnapshot) => void
): Sink => ({ write });
