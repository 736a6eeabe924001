import {describe, expect, it} from 'vitest';

import {PacingState, systemClock} from '../src';
import {createFakeClock} from './helpers';

describe('PacingState', () => {
    it('does not wait before the first frame', async () => {
        const clock = createFakeClock();
        const state = new PacingState();
        expect(state.lastSent).toBeUndefined();

        await state.run(500, clock, async () => undefined);

        expect(clock.sleep).not.toHaveBeenCalled();
        expect(state.lastSent).toBe(1_000);
    });

    it('waits only for the remaining part of the pause', async () => {
        const clock = createFakeClock();
        const state = new PacingState();
        await state.run(500, clock, async () => undefined);
        clock.advance(200);

        await state.run(500, clock, async () => undefined);

        expect(clock.sleep).toHaveBeenCalledTimes(1);
        expect(clock.sleep).toHaveBeenCalledWith(300);
        expect(state.lastSent).toBe(1_500);
    });

    it('does not wait once the pause has passed', async () => {
        const clock = createFakeClock();
        const state = new PacingState();
        await state.run(100, clock, async () => undefined);
        clock.advance(250);

        await state.run(100, clock, async () => undefined);

        expect(clock.sleep).not.toHaveBeenCalled();
    });

    it('never sleeps with a zero pause', async () => {
        const clock = createFakeClock();
        const state = new PacingState();
        for (let i = 0; i < 3; i++) {
            await state.run(0, clock, async () => undefined);
        }
        expect(clock.sleep).not.toHaveBeenCalled();
    });

    it('queues calls that are not awaited', async () => {
        const clock = createFakeClock();
        const state = new PacingState();
        const sentAt: number[] = [];
        const send = async (): Promise<void> => {
            sentAt.push(clock.now());
        };

        await Promise.all([state.run(500, clock, send), state.run(500, clock, send), state.run(500, clock, send)]);

        expect(sentAt).toEqual([1_000, 1_500, 2_000]);
    });

    it('records the send time of failed sends and keeps the queue going', async () => {
        const clock = createFakeClock();
        const state = new PacingState();

        await expect(state.run(500, clock, () => Promise.reject(new Error('socket closed')))).rejects.toThrow(
            'socket closed',
        );
        expect(state.lastSent).toBe(1_000);

        const value = await state.run(500, clock, async () => 'sent');
        expect(value).toBe('sent');
        expect(clock.sleep).toHaveBeenCalledWith(500);
    });
});

describe('systemClock', () => {
    it('sleeps for roughly the requested time', async () => {
        const start = systemClock.now();
        await systemClock.sleep(20);
        expect(systemClock.now() - start).toBeGreaterThanOrEqual(15);
    });
});
