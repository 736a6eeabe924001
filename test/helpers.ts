import {vi} from 'vitest';
import type {Mock} from 'vitest';

import type {Clock, DatagramTransport} from '../src';

export type FakeClock = Clock & {
    sleep: Mock<[ms: number], Promise<void>>;
    advance(ms: number): void;
};

/** Clock whose `sleep` advances time instantly. */
export const createFakeClock = (start = 1_000): FakeClock => {
    let time = start;
    return {
        now: () => time,
        sleep: vi.fn(async (ms: number) => {
            time += ms;
        }),
        advance: (ms: number) => {
            time += ms;
        },
    };
};

export type SentFrame = {
    bytes: number[];
    host: string;
    port: number;
    at: number;
};

export type MockTransport = DatagramTransport & {
    send: Mock<[frame: Buffer, host: string, port: number], Promise<void>>;
    sent: SentFrame[];
    /** Sent frames as plain byte arrays. */
    frames(): number[][];
};

export const createMockTransport = (clock?: Clock): MockTransport => {
    const sent: SentFrame[] = [];
    return {
        sent,
        send: vi.fn(async (frame: Buffer, host: string, port: number) => {
            sent.push({bytes: [...frame], host, port, at: clock ? clock.now() : 0});
        }),
        frames: () => sent.map((entry) => entry.bytes),
    };
};

/** Repeat a list of frames `times` times. */
export const repeated = (frames: number[][], times: number): number[][] =>
    Array.from({length: times}, () => frames).flat();

/** The value thrown by `fn`; fails when nothing is thrown. */
export const thrownBy = (fn: () => unknown): unknown => {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error('Expected function to throw');
};
