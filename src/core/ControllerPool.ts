/**
 * Pool of controllers for several bridges sharing one pacing state.
 * @module core/ControllerPool
 */
import {LimitlessError, type DatagramTransport} from '../protocols/limitless';
import type {ControllerOptions} from './config';
import {LedController, type OperationCall} from './LedController';
import {PacingState, type Clock} from './pacing';

/** Per-bridge settings of a pool member. */
export type PoolMember = ControllerOptions & {
    host: string;
};

export type ControllerPoolOptions = {
    /** Datagram sender shared by every member. */
    transport?: DatagramTransport;
    clock?: Clock;
};

/**
 * Controllers for several bridges. Frames are paced as one stream, so
 * alternating between bridges never sends faster than the pause allows.
 */
export class ControllerPool {
    private readonly controllers: LedController[];
    private readonly pacing = new PacingState();

    constructor(members: readonly PoolMember[], options: ControllerPoolOptions = {}) {
        this.controllers = members.map(
            ({host, ...config}) =>
                new LedController(host, {
                    ...config,
                    transport: options.transport,
                    clock: options.clock,
                    pacing: this.pacing,
                }),
        );
    }

    public get size(): number {
        return this.controllers.length;
    }

    /** Pacing state shared by all members. */
    public get pacingState(): PacingState {
        return this.pacing;
    }

    /**
     * Controller at `index` (0-based).
     * @throws LimitlessError `INDEX_OUT_OF_RANGE`.
     */
    public controller(index: number): LedController {
        const controller = Number.isInteger(index) ? this.controllers[index] : undefined;
        if (!controller) {
            throw new LimitlessError({
                message: `Controller index must be 0-${this.controllers.length - 1}, got ${index}`,
                code: 'INDEX_OUT_OF_RANGE',
                details: {index, size: this.controllers.length},
            });
        }
        return controller;
    }

    /**
     * Run one call on the controller at `index`.
     * @example pool.execute(1, 'setColor', 'red', 2)
     */
    public async execute(index: number, ...call: OperationCall): Promise<void> {
        await this.controller(index).execute(...call);
    }
}
