/**
 * Minimum-interval pacing between bridge frames.
 * @module core/pacing
 */
import {performance} from 'perf_hooks';
import {setTimeout as delay} from 'timers/promises';

/** Time source used for pacing, in milliseconds. */
export type Clock = {
    now(): number;
    sleep(ms: number): Promise<void>;
};

/** Monotonic clock backed by `performance.now()`. */
export const systemClock: Clock = {
    now: () => performance.now(),
    sleep: async (ms) => {
        await delay(ms);
    },
};

/**
 * Timestamp of the last transmitted frame, shareable between controllers.
 *
 * Sends are queued: a send starts only after the previous one settled, so
 * un-awaited calls still keep the pause between frames.
 */
export class PacingState {
    private lastSentAt: number | undefined;
    private tail: Promise<void> = Promise.resolve();

    /** Time of the last send, or `undefined` before the first one. */
    public get lastSent(): number | undefined {
        return this.lastSentAt;
    }

    /**
     * Wait until `pauseMs` has passed since the previous frame, then run `send`.
     * The timestamp is updated whether `send` resolves or rejects.
     */
    public run<T>(pauseMs: number, clock: Clock, send: () => Promise<T>): Promise<T> {
        const result = this.tail.then(() => this.throttled(pauseMs, clock, send));
        // The caller observes the rejection through `result`; the queue only needs to keep going.
        this.tail = result.then(
            () => undefined,
            () => undefined,
        );
        return result;
    }

    private async throttled<T>(pauseMs: number, clock: Clock, send: () => Promise<T>): Promise<T> {
        if (this.lastSentAt !== undefined) {
            const elapsed = clock.now() - this.lastSentAt;
            if (elapsed < pauseMs) {
                await clock.sleep(pauseMs - elapsed);
            }
        }
        try {
            return await send();
        } finally {
            this.lastSentAt = clock.now();
        }
    }
}
