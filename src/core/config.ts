/**
 * Controller configuration and its validation.
 * @module core/config
 */
import {BulbType, LIMITLESS_PORT, LimitlessError} from '../protocols/limitless';

export type GroupId = 1 | 2 | 3 | 4;

export const GROUP_IDS: readonly GroupId[] = [1, 2, 3, 4];

/** Bulb family per group; omitted groups are RGBW. Accepts `'rgbw'` or `'white'`. */
export type GroupTypeOptions = Partial<Record<GroupId, string>>;

export type ControllerOptions = {
    /** Bridge UDP port (1-65535). Defaults to 8899. */
    port?: number;
    /** How many times idempotent commands are sent. Defaults to 3; 0 is read as 1. */
    repeatCommands?: number;
    /** Minimum pause between two frames in milliseconds. Defaults to 100. */
    pauseBetweenCommandsMs?: number;
    /** Bulb family of each group. */
    groups?: GroupTypeOptions;
};

/** Validated, immutable controller settings. */
export type ControllerConfig = Readonly<{
    host: string;
    port: number;
    repeatCommands: number;
    pauseBetweenCommandsMs: number;
    groups: readonly BulbType[];
}>;

export const DEFAULT_REPEAT_COMMANDS = 3;
export const DEFAULT_PAUSE_BETWEEN_COMMANDS_MS = 100;

const invalidConfig = (message: string, details: Record<string, unknown>): LimitlessError =>
    new LimitlessError({message, code: 'INVALID_CONFIG', details});

/** Parse a bulb family name, or `undefined` when it is not one. */
export const parseBulbType = (value: string): BulbType | undefined =>
    Object.values(BulbType).find((type) => type === value);

/** Validate a repeat count; 0 becomes 1. */
export const normalizeRepeatCommands = (value: number): number => {
    if (!Number.isInteger(value) || value < 0) {
        throw invalidConfig(`repeatCommands must be a non-negative integer, got ${value}`, {repeatCommands: value});
    }
    return Math.max(1, value);
};

export const validatePause = (value: number): number => {
    if (!Number.isFinite(value) || value < 0) {
        throw invalidConfig(`pauseBetweenCommandsMs must be >= 0, got ${value}`, {pauseBetweenCommandsMs: value});
    }
    return value;
};

/**
 * Apply defaults and validate controller options.
 * @param host Bridge IP address or hostname.
 * @throws LimitlessError `INVALID_CONFIG`.
 */
export const resolveControllerConfig = (host: string, options: ControllerOptions = {}): ControllerConfig => {
    if (host.trim() === '') {
        throw invalidConfig('Bridge host must not be empty', {host});
    }
    const port = options.port ?? LIMITLESS_PORT;
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw invalidConfig(`Port must be 1-65535, got ${port}`, {port});
    }

    const groups: BulbType[] = [];
    for (const group of GROUP_IDS) {
        const raw = options.groups?.[group];
        const type = raw === undefined ? BulbType.Rgbw : parseBulbType(raw);
        if (!type) {
            throw invalidConfig(`Group ${group} bulb type must be "rgbw" or "white", got "${raw}"`, {group, bulbType: raw});
        }
        groups.push(type);
    }

    return Object.freeze({
        host,
        port,
        repeatCommands: normalizeRepeatCommands(options.repeatCommands ?? DEFAULT_REPEAT_COMMANDS),
        pauseBetweenCommandsMs: validatePause(options.pauseBetweenCommandsMs ?? DEFAULT_PAUSE_BETWEEN_COMMANDS_MS),
        groups: Object.freeze(groups),
    });
};
