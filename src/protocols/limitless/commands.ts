/**
 * Command table for RGBW and white bulbs.
 * @module limitless/commands
 *
 * Flat entries address every group of one bulb family at once; group entries
 * hold four variants indexed by `group - 1`.
 */
import {BulbType, COLOR_PALETTE, GROUP_COUNT, Opcode} from './constants';
import {invalidGroup, LimitlessError} from './errors';

/** Raw command bytes before framing (1-3 bytes). */
export type CommandSpec =
    | readonly [number]
    | readonly [number, number]
    | readonly [number, number, number];

/** One command variant per group, group 1 first. */
export type GroupCommandSet = readonly [CommandSpec, CommandSpec, CommandSpec, CommandSpec];

export type CommandTable = {
    flat: ReadonlyMap<string, CommandSpec>;
    groups: ReadonlyMap<string, GroupCommandSet>;
};

const paletteCommands = (): [string, CommandSpec][] =>
    Object.entries(COLOR_PALETTE).map(([name, hue]): [string, CommandSpec] => [
        `color_to_${name}`,
        [Opcode.ColorByInt, hue],
    ]);

const RGBW_COMMANDS: CommandTable = {
    flat: new Map<string, CommandSpec>([
        ['all_on', [0x42]],
        ['all_off', [0x41]],
        ['all_white', [0xc2]],
        ['all_nightmode', [0xc1]],
        ['disco', [0x4d]],
        ['disco_faster', [0x44]],
        ['disco_slower', [0x43]],
        ['brightness', [Opcode.Brightness]],
        ['color_by_int', [Opcode.ColorByInt]],
        ...paletteCommands(),
    ]),
    groups: new Map<string, GroupCommandSet>([
        ['on', [[0x45], [0x47], [0x49], [0x4b]]],
        ['off', [[0x46], [0x48], [0x4a], [0x4c]]],
        ['white', [[0xc5], [0xc7], [0xc9], [0xcb]]],
        ['nightmode', [[0xc6], [0xc8], [0xca], [0xcc]]],
    ]),
};

const WHITE_COMMANDS: CommandTable = {
    flat: new Map<string, CommandSpec>([
        ['all_on', [0x35]],
        ['all_off', [0x39]],
        // Full brightness is the white bulbs' "white".
        ['all_white', [0xb5]],
        ['all_nightmode', [0xb9]],
        ['warmer', [0x3e]],
        ['cooler', [0x3f]],
        ['brightness_up', [0x3c]],
        ['brightness_down', [0x34]],
    ]),
    groups: new Map<string, GroupCommandSet>([
        ['on', [[0x38], [0x3d], [0x37], [0x32]]],
        ['off', [[0x3b], [0x33], [0x3a], [0x36]]],
        ['white', [[0xb8], [0xbd], [0xb7], [0xb2]]],
        ['nightmode', [[0xbb], [0xb3], [0xba], [0xb6]]],
    ]),
};

const TABLES: Record<BulbType, CommandTable> = {
    [BulbType.Rgbw]: RGBW_COMMANDS,
    [BulbType.White]: WHITE_COMMANDS,
};

/** Command table of one bulb family. */
export const commandTable = (type: BulbType): CommandTable => TABLES[type];

export const hasCommand = (type: BulbType, name: string): boolean => TABLES[type].flat.has(name);

export const hasGroupCommand = (type: BulbType, name: string): boolean => TABLES[type].groups.has(name);

/**
 * Look up a flat (all groups) command.
 * @throws LimitlessError `UNKNOWN_COMMAND` when the family has no such command.
 */
export const lookupCommand = (type: BulbType, name: string): CommandSpec => {
    const spec = TABLES[type].flat.get(name);
    if (!spec) {
        throw new LimitlessError({
            message: `Unknown ${type} command "${name}"`,
            code: 'UNKNOWN_COMMAND',
            details: {bulbType: type, command: name},
        });
    }
    return spec;
};

/**
 * Look up the variant of a per-group command for group 1-4.
 * @throws LimitlessError `UNKNOWN_COMMAND` or `INVALID_GROUP`.
 */
export const lookupGroupCommand = (type: BulbType, name: string, group: number): CommandSpec => {
    const variants = TABLES[type].groups.get(name);
    if (!variants) {
        throw new LimitlessError({
            message: `Unknown ${type} group command "${name}"`,
            code: 'UNKNOWN_COMMAND',
            details: {bulbType: type, command: name, group},
        });
    }
    if (!Number.isInteger(group) || group < 1 || group > GROUP_COUNT) {
        throw invalidGroup(group);
    }
    return variants[group - 1];
};

/** Replace the operand byte of a command template, e.g. `color_by_int` with a hue. */
export const withOperand = (template: CommandSpec, operand: number): CommandSpec => {
    if (!Number.isInteger(operand) || operand < 0 || operand > 0xff) {
        throw new RangeError(`Operand must be 0-255, got ${operand}`);
    }
    return [template[0], operand];
};
