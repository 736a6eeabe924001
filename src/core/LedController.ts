/**
 * High-level controller for one LimitlessLED / MiLight bridge.
 * @module core/LedController
 */
import {EventEmitter} from 'events';
import {
    buildFrame,
    GROUP_COUNT,
    invalidGroup,
    LimitlessError,
    UdpTransport,
    type BulbType,
    type DatagramTransport,
} from '../protocols/limitless';
import {runBatch} from './batch';
import {
    normalizeRepeatCommands,
    parseBulbType,
    resolveControllerConfig,
    validatePause,
    type ControllerOptions,
} from './config';
import {PacingState, systemClock, type Clock} from './pacing';
import {
    brightnessDeviceValue,
    brightnessPercent,
    route,
    toColorSpec,
    type BrightnessLevel,
    type ColorInput,
    type GroupTarget,
    type Operation,
    type StepCommand,
} from './router';

export type LedControllerOptions = ControllerOptions & {
    /** Datagram sender. Defaults to a {@link UdpTransport}. */
    transport?: DatagramTransport;
    /** Time source for pacing. Defaults to {@link systemClock}. */
    clock?: Clock;
    /** Pacing state shared with other controllers; a private one is created otherwise. */
    pacing?: PacingState;
};

export interface LedControllerEvents {
    /** A frame was handed to the transport. */
    frame: [frame: Buffer, target: {host: string; port: number}];
}

/** One controller call as `[operation, ...arguments]`, used by batches and pools. */
export type OperationCall =
    | [operation: 'on', group?: GroupTarget]
    | [operation: 'off', group?: GroupTarget]
    | [operation: 'white', group?: GroupTarget]
    | [operation: 'setColor', color: ColorInput, group?: GroupTarget]
    | [operation: 'setBrightness', level: BrightnessLevel, group?: GroupTarget]
    | [operation: 'disco', group?: GroupTarget]
    | [operation: 'discoFaster', group?: GroupTarget]
    | [operation: 'discoSlower', group?: GroupTarget]
    | [operation: 'nightmode', group?: GroupTarget]
    | [operation: 'warmer', group?: GroupTarget, steps?: number]
    | [operation: 'cooler', group?: GroupTarget, steps?: number]
    | [operation: 'brightnessUp', group?: GroupTarget, steps?: number]
    | [operation: 'brightnessDown', group?: GroupTarget, steps?: number];

/**
 * Sends commands to the groups of one bridge.
 *
 * Usage:
 * ```ts
 * const led = new LedController('192.168.1.6', {groups: {2: 'white'}});
 * await led.setColor('red', 1);
 * await led.setBrightness(50, 1);
 * await led.warmer(2);
 * ```
 */
export class LedController {
    public readonly host: string;
    public readonly port: number;
    /** Emits a `frame` event for every datagram sent. */
    public readonly events = new EventEmitter<LedControllerEvents>();
    private repeat: number;
    private pauseMs: number;
    private readonly groups: BulbType[];
    private readonly transport: DatagramTransport;
    private readonly clock: Clock;
    private readonly pacing: PacingState;

    /**
     * @param host Bridge IP address or hostname.
     * @throws LimitlessError `INVALID_CONFIG` for invalid options.
     */
    constructor(host: string, options: LedControllerOptions = {}) {
        const config = resolveControllerConfig(host, options);
        this.host = config.host;
        this.port = config.port;
        this.repeat = config.repeatCommands;
        this.pauseMs = config.pauseBetweenCommandsMs;
        this.groups = [...config.groups];
        this.transport = options.transport ?? new UdpTransport();
        this.clock = options.clock ?? systemClock;
        this.pacing = options.pacing ?? new PacingState();
    }

    /** How many times idempotent commands are sent. */
    public get repeatCommands(): number {
        return this.repeat;
    }

    /** Change the repeat count; 0 is read as 1. */
    public setRepeatCommands(value: number): void {
        this.repeat = normalizeRepeatCommands(value);
    }

    public get pauseBetweenCommandsMs(): number {
        return this.pauseMs;
    }

    public setPauseBetweenCommands(ms: number): void {
        this.pauseMs = validatePause(ms);
    }

    /** Pacing state used by this controller. */
    public get pacingState(): PacingState {
        return this.pacing;
    }

    /** Bulb family of groups 1-4. */
    public get groupTypes(): readonly BulbType[] {
        return [...this.groups];
    }

    public getGroupType(group: number): BulbType {
        return this.groups[this.groupIndex(group)];
    }

    /**
     * Change the bulb family of a group; applies to the next command.
     * @param type `'rgbw'` or `'white'`.
     * @throws LimitlessError `INVALID_GROUP` or `INVALID_BULB_TYPE`.
     */
    public setGroupType(group: number, type: string): void {
        const index = this.groupIndex(group);
        const parsed = parseBulbType(type);
        if (!parsed) {
            throw new LimitlessError({
                message: `Bulb type must be "rgbw" or "white", got "${type}"`,
                code: 'INVALID_BULB_TYPE',
                details: {group, bulbType: type},
            });
        }
        this.groups[index] = parsed;
    }

    /** Switch lights on. Without a group all four groups are switched on. */
    public async on(group?: GroupTarget): Promise<void> {
        await this.perform({type: 'on'}, group);
    }

    public async off(group?: GroupTarget): Promise<void> {
        await this.perform({type: 'off'}, group);
    }

    /** Switch on and change to white (full brightness on white bulbs). */
    public async white(group?: GroupTarget): Promise<void> {
        await this.perform({type: 'white'}, group);
    }

    /**
     * Switch on and change color. RGBW bulbs only; white groups get
     * nothing unless the color is white.
     * @param color A palette name (`'red'`, `'royal_blue'`, ... or `'white'`),
     * a hue byte 0-255, or an RGB triple. `[0, 0, 0]` switches off and
     * other greys switch to white.
     */
    public async setColor(color: ColorInput, group?: GroupTarget): Promise<void> {
        await this.perform({type: 'color', color: toColorSpec(color)}, group);
    }

    /**
     * Switch on and set brightness.
     * White bulbs have no absolute brightness command and ignore it; use
     * {@link brightnessUp} / {@link brightnessDown} for them.
     * @returns The applied percent.
     */
    public async setBrightness(level: BrightnessLevel, group?: GroupTarget): Promise<number> {
        const percent = brightnessPercent(level);
        await this.perform({type: 'brightness', value: brightnessDeviceValue(percent)}, group);
        return percent;
    }

    /**
     * Start disco mode, or advance to the next of its 20 programs when it is
     * already running. Sent once: repeating would skip programs.
     */
    public async disco(group?: GroupTarget): Promise<void> {
        await this.perform({type: 'disco'}, group);
    }

    /** Speed up the running disco program (does not start disco mode). */
    public async discoFaster(group?: GroupTarget): Promise<void> {
        await this.perform({type: 'disco_faster'}, group);
    }

    public async discoSlower(group?: GroupTarget): Promise<void> {
        await this.perform({type: 'disco_slower'}, group);
    }

    /**
     * Switch to nightmode (very dim white). The lights are switched off first;
     * the nightmode frame itself is sent once, as repeats make the lights blink.
     */
    public async nightmode(group?: GroupTarget): Promise<void> {
        await this.perform({type: 'nightmode'}, group);
    }

    /** Warmer color temperature on white bulbs, one frame per step. */
    public async warmer(group?: GroupTarget, steps = 1): Promise<void> {
        await this.step('warmer', group, steps);
    }

    public async cooler(group?: GroupTarget, steps = 1): Promise<void> {
        await this.step('cooler', group, steps);
    }

    public async brightnessUp(group?: GroupTarget, steps = 1): Promise<void> {
        await this.step('brightness_up', group, steps);
    }

    public async brightnessDown(group?: GroupTarget, steps = 1): Promise<void> {
        await this.step('brightness_down', group, steps);
    }

    /** Run one `[operation, ...arguments]` call. */
    public async execute(...call: OperationCall): Promise<void> {
        switch (call[0]) {
            case 'on':
                return this.on(call[1]);
            case 'off':
                return this.off(call[1]);
            case 'white':
                return this.white(call[1]);
            case 'setColor':
                return this.setColor(call[1], call[2]);
            case 'setBrightness':
                await this.setBrightness(call[1], call[2]);
                return;
            case 'disco':
                return this.disco(call[1]);
            case 'discoFaster':
                return this.discoFaster(call[1]);
            case 'discoSlower':
                return this.discoSlower(call[1]);
            case 'nightmode':
                return this.nightmode(call[1]);
            case 'warmer':
                return this.warmer(call[1], call[2]);
            case 'cooler':
                return this.cooler(call[1], call[2]);
            case 'brightnessUp':
                return this.brightnessUp(call[1], call[2]);
            case 'brightnessDown':
                return this.brightnessDown(call[1], call[2]);
        }
    }

    /**
     * Run every call once, then the whole list again, `repeatCommands` times in
     * total. See {@link runBatch}.
     */
    public async batchRun(...calls: OperationCall[]): Promise<void> {
        await runBatch(this, calls);
    }

    private async step(command: StepCommand, group: GroupTarget, steps: number): Promise<void> {
        if (!Number.isInteger(steps) || steps < 1) {
            throw new RangeError(`Steps must be a positive integer, got ${steps}`);
        }
        await this.perform({type: 'step', command, steps}, group);
    }

    private async perform(operation: Operation, group: GroupTarget): Promise<void> {
        const routes = route(operation, group, {groupTypes: this.groups, repeatCommands: this.repeat});
        for (const {commands, retries} of routes) {
            for (let attempt = 0; attempt < retries; attempt++) {
                for (const command of commands) {
                    await this.sendFrame(buildFrame(command));
                }
            }
        }
    }

    private async sendFrame(frame: Buffer): Promise<void> {
        await this.pacing.run(this.pauseMs, this.clock, () => this.transport.send(frame, this.host, this.port));
        this.events.emit('frame', frame, {host: this.host, port: this.port});
    }

    private groupIndex(group: number): number {
        if (!Number.isInteger(group) || group < 1 || group > GROUP_COUNT) {
            throw invalidGroup(group);
        }
        return group - 1;
    }
}
