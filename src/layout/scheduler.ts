/**
 * One rendering tick. Work deferred through a scheduler runs after the
 * surface has applied the geometry changes queued before it.
 */
export interface Scheduler {
    defer(callback: () => void): void;
}

export function afterTicks(scheduler: Scheduler, ticks: number, callback: () => void): void {
    if (ticks <= 0) {
        callback();
        return;
    }
    scheduler.defer(() => afterTicks(scheduler, ticks - 1, callback));
}

export class ImmediateScheduler implements Scheduler {
    defer(callback: () => void): void {
        setImmediate(callback);
    }
}

/**
 * Queue drained on demand. Headless hosts call `flush()` after each
 * interaction to run the layout to completion.
 */
export class ManualScheduler implements Scheduler {
    private queue: (() => void)[] = [];

    defer(callback: () => void): void {
        this.queue.push(callback);
    }

    get pending(): number {
        return this.queue.length;
    }

    /** Run one tick: everything queued so far, but not what it queues. */
    tick(): number {
        const batch = this.queue;
        this.queue = [];
        for (const callback of batch) {
            callback();
        }
        return batch.length;
    }

    /** Tick until the queue is empty. Returns the number of ticks run. */
    flush(maxTicks: number = 10000): number {
        let ticks = 0;
        while (this.queue.length > 0) {
            if (ticks >= maxTicks) {
                throw new Error(`Scheduler did not drain within ${maxTicks} ticks`);
            }
            this.tick();
            ticks++;
        }
        return ticks;
    }
}
