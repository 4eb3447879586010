import { Inject, Injectable } from '@nestjs/common';
import { IDENTITY_OPTIONS, IdentityOptions } from '../config/identity-options';

interface Waiter {
  grant: () => void;
  onAbort?: () => void;
}

/**
 * Counting semaphore in front of password hashing. bcrypt runs its rounds on
 * the libuv thread pool, which file and DNS work share; capping in-flight
 * hashes keeps a login burst from occupying every thread.
 *
 * Cancellation is only observed while waiting for a slot and after the task
 * settles. A task that has started always runs to completion.
 */
@Injectable()
export class HashingPool {
  private readonly size: number;
  private active = 0;
  private readonly queue: Waiter[] = [];

  constructor(@Inject(IDENTITY_OPTIONS) options: Pick<IdentityOptions, 'hashPoolSize'>) {
    this.size = Math.max(1, options.hashPoolSize);
  }

  get inFlight(): number {
    return this.active;
  }

  get waiting(): number {
    return this.queue.length;
  }

  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted();
    await this.acquire(signal);

    let result: T;
    try {
      signal?.throwIfAborted();
      result = await task();
    } finally {
      this.release();
    }

    // The caller went away while the hash was running; drop the result.
    signal?.throwIfAborted();
    return result;
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (this.active < this.size) {
      this.active += 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          if (waiter.onAbort) {
            signal?.removeEventListener('abort', waiter.onAbort);
          }
          resolve();
        },
      };

      if (signal) {
        waiter.onAbort = () => {
          const index = this.queue.indexOf(waiter);
          if (index !== -1) {
            this.queue.splice(index, 1);
          }
          reject(signal.reason);
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      this.queue.push(waiter);
    });
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // Slot passes straight to the next waiter; active count is unchanged.
      next.grant();
      return;
    }
    this.active -= 1;
  }
}
