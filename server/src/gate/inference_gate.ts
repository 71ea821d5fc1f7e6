import { CancelledError, OverloadedError } from "../errors";
import { Logger } from "../logging/logger";
import type { AcquireOptions, GateOptions, GateSlot, GateStats } from "./types";

type Waiter = {
  enqueuedAt: number;
  grant(slot: GateSlot): void;
};

const log = new Logger("gate");

// strict FIFO: a free slot is taken directly only while nobody is queued
export class InferenceGate {
  readonly capacity: number;
  readonly admissionTimeoutMs: number;

  private held = new Set<number>();
  private queue: Waiter[] = [];
  private nextSlotId = 1;

  private peakInFlight = 0;
  private admitted = 0;
  private rejected = 0;
  private cancelled = 0;

  constructor(opts: GateOptions) {
    if (!Number.isInteger(opts.capacity) || opts.capacity < 1) {
      throw new RangeError(`gate capacity must be a positive integer, got ${opts.capacity}`);
    }
    if (!(opts.admissionTimeoutMs >= 0)) {
      throw new RangeError(`admission timeout must be >= 0, got ${opts.admissionTimeoutMs}`);
    }
    this.capacity = opts.capacity;
    this.admissionTimeoutMs = opts.admissionTimeoutMs;
  }

  acquire(opts: AcquireOptions = {}): Promise<GateSlot> {
    const { signal } = opts;
    if (signal?.aborted) {
      this.cancelled++;
      return Promise.reject(new CancelledError("request cancelled before admission"));
    }

    if (this.held.size < this.capacity && this.queue.length === 0) {
      return Promise.resolve(this.grantNew());
    }

    const timeoutMs = opts.timeoutMs ?? this.admissionTimeoutMs;

    return new Promise<GateSlot>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };

      const waiter: Waiter = {
        enqueuedAt: Date.now(),
        grant: (slot) => {
          cleanup();
          resolve(slot);
        },
      };

      const onTimeout = () => {
        this.dequeue(waiter);
        cleanup();
        this.rejected++;
        log.warn(`admission timed out after ${timeoutMs}ms (in flight ${this.held.size}/${this.capacity}, queued ${this.queue.length})`);
        reject(new OverloadedError(timeoutMs, Math.max(1, Math.ceil(timeoutMs / 1000))));
      };

      const onAbort = () => {
        this.dequeue(waiter);
        cleanup();
        this.cancelled++;
        reject(new CancelledError("request cancelled while waiting for an inference slot"));
      };

      const timer = setTimeout(onTimeout, timeoutMs);
      signal?.addEventListener("abort", onAbort, { once: true });
      this.queue.push(waiter);
      log.debug(`queued for admission (position ${this.queue.length})`);
    });
  }

  release(slot: GateSlot): boolean {
    if (!this.held.delete(slot.id)) return false;

    while (this.held.size < this.capacity) {
      const next = this.queue.shift();
      if (!next) break;
      const granted = this.grantNew();
      log.debug(`slot ${granted.id} handed over after ${granted.acquiredAt - next.enqueuedAt}ms in queue`);
      next.grant(granted);
    }
    return true;
  }

  async run<T>(fn: (slot: GateSlot) => Promise<T>, opts: AcquireOptions = {}): Promise<T> {
    const slot = await this.acquire(opts);
    try {
      return await fn(slot);
    } finally {
      this.release(slot);
    }
  }

  stats(): GateStats {
    return {
      capacity: this.capacity,
      inFlight: this.held.size,
      queued: this.queue.length,
      peakInFlight: this.peakInFlight,
      admitted: this.admitted,
      rejected: this.rejected,
      cancelled: this.cancelled,
    };
  }

  private grantNew(): GateSlot {
    const slot: GateSlot = { id: this.nextSlotId++, acquiredAt: Date.now() };
    this.held.add(slot.id);
    this.admitted++;
    this.peakInFlight = Math.max(this.peakInFlight, this.held.size);
    return slot;
  }

  private dequeue(waiter: Waiter) {
    const i = this.queue.indexOf(waiter);
    if (i >= 0) this.queue.splice(i, 1);
  }
}
