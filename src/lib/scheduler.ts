/**
 * Timer abstraction so every retry, debounce and poll is owned and disposable.
 */

export interface TimerHandle {
  cancel(): void;
}

export interface Scheduler {
  delay(callback: () => void, ms: number): TimerHandle;
  every(callback: () => void, ms: number): TimerHandle;
}

export class BrowserScheduler implements Scheduler {
  delay(callback: () => void, ms: number): TimerHandle {
    const id = setTimeout(callback, ms);
    return { cancel: () => clearTimeout(id) };
  }

  every(callback: () => void, ms: number): TimerHandle {
    const id = setInterval(callback, ms);
    return { cancel: () => clearInterval(id) };
  }
}

/**
 * Tracks handles it hands out so a whole component can be torn down at once.
 * A handle leaves the group when it fires (one-shot) or is cancelled.
 */
export class TimerGroup implements Scheduler {
  private scheduler: Scheduler;
  private handles: Set<TimerHandle> = new Set();

  constructor(scheduler: Scheduler) {
    this.scheduler = scheduler;
  }

  delay(callback: () => void, ms: number): TimerHandle {
    const inner = this.scheduler.delay(() => {
      this.handles.delete(handle);
      callback();
    }, ms);
    const handle = this.track(inner);
    return handle;
  }

  every(callback: () => void, ms: number): TimerHandle {
    return this.track(this.scheduler.every(callback, ms));
  }

  get size(): number {
    return this.handles.size;
  }

  cancelAll(): void {
    for (const handle of [...this.handles]) handle.cancel();
    this.handles.clear();
  }

  private track(inner: TimerHandle): TimerHandle {
    const handle: TimerHandle = {
      cancel: () => {
        inner.cancel();
        this.handles.delete(handle);
      }
    };
    this.handles.add(handle);
    return handle;
  }
}
