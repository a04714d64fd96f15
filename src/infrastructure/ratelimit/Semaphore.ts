interface Waiter {
  grant: () => void;
  timer?: NodeJS.Timeout;
}

/**
 * Counting semaphore with FIFO waiters. A released slot is handed directly to
 * the oldest waiter so late arrivals cannot overtake it.
 */
export class Semaphore {
  private inFlight = 0;
  private waiters: Waiter[] = [];

  constructor(readonly capacity: number) {}

  get active(): number {
    return this.inFlight;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  tryAcquire(): boolean {
    if (this.inFlight < this.capacity && this.waiters.length === 0) {
      this.inFlight++;
      return true;
    }
    return false;
  }

  /**
   * Resolves true once a slot is held, or false when `timeoutMs` elapses first
   */
  acquire(timeoutMs: number): Promise<boolean> {
    if (this.tryAcquire()) return Promise.resolve(true);
    if (timeoutMs <= 0) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = {
        grant: () => {
          clearTimeout(waiter.timer);
          resolve(true);
        },
      };
      waiter.timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
          resolve(false);
        }
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // slot passes to the waiter; inFlight is unchanged
      next.grant();
      return;
    }
    if (this.inFlight > 0) {
      this.inFlight--;
    }
  }
}
