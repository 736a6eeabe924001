/**
 * Resolves controller operations to the frames each group needs.
 * @module core/router
 *
 * A route is a list of {@link RoutedCommand}s. The controller sends the
 * commands of one routed entry in order, repeats that `retries` times, then
 * moves on to the next entry.
 */
import {
    BRIGHTNESS_MAX,
    BRIGHTNESS_MIN,
    BulbType,
    GROUP_COUNT,
    hasCommand,
    hasGroupCommand,
    invalidGroup,
    isAchromatic,
    LimitlessError,
    lookupCommand,
    lookupGroupCommand,
    rgbToHue,
    withOperand,
    type CommandSpec,
} from '../protocols/limitless';
import type {GroupId} from './config';

/** Group 1-4; `undefined`, `null` and `0` address all groups. */
export type GroupTarget = number | null | undefined;

export type RgbTriple = readonly [red: number, green: number, blue: number];

export type ColorSpec =
    | {kind: 'named'; name: string}
    | {kind: 'indexed'; value: number}
    | {kind: 'rgb'; red: number; green: number; blue: number};

/** Anything `setColor` accepts: a palette name, a hue byte, an RGB triple or a tagged {@link ColorSpec}. */
export type ColorInput = string | number | RgbTriple | ColorSpec;

/**
 * Brightness as given by callers. Integers are percent; non-integers and
 * `{fraction}` values of at most 1 are fractions of 100, larger ones are
 * truncated to an integer percent.
 */
export type BrightnessLevel = number | {fraction: number};

export type StepCommand = 'warmer' | 'cooler' | 'brightness_up' | 'brightness_down';

export type Operation =
    | {type: 'on'}
    | {type: 'off'}
    | {type: 'white'}
    | {type: 'color'; color: ColorSpec}
    | {type: 'brightness'; value: number}
    | {type: 'disco'}
    | {type: 'disco_faster'}
    | {type: 'disco_slower'}
    | {type: 'nightmode'}
    | {type: 'step'; command: StepCommand; steps: number};

export type RoutedCommand = {
    commands: readonly CommandSpec[];
    retries: number;
};

export type RouteContext = {
    /** Bulb family of groups 1-4. */
    groupTypes: readonly BulbType[];
    repeatCommands: number;
};

type Target = 'all' | GroupId;

const BULB_TYPE_ORDER = [BulbType.Rgbw, BulbType.White] as const;

const isGroupId = (value: number): value is GroupId =>
    Number.isInteger(value) && value >= 1 && value <= GROUP_COUNT;

const resolveTarget = (group: GroupTarget): Target => {
    if (group === undefined || group === null || group === 0) return 'all';
    if (!isGroupId(group)) throw invalidGroup(group);
    return group;
};

/** Bulb families configured on at least one group, RGBW first. */
export const presentBulbTypes = (groupTypes: readonly BulbType[]): BulbType[] =>
    BULB_TYPE_ORDER.filter((type) => groupTypes.includes(type));

const groupType = (ctx: RouteContext, group: GroupId): BulbType => ctx.groupTypes[group - 1] ?? BulbType.Rgbw;

const onCommand = (type: BulbType, target: Target): CommandSpec =>
    target === 'all' ? lookupCommand(type, 'all_on') : lookupGroupCommand(type, 'on', target);

/**
 * Table entries for one command, paired with the bulb family they belong to.
 * Families without the command are skipped.
 */
const resolveEntries = (
    target: Target,
    ctx: RouteContext,
    flatName: string,
    groupName?: string,
): {type: BulbType; spec: CommandSpec}[] => {
    if (target === 'all') {
        return presentBulbTypes(ctx.groupTypes)
            .filter((type) => hasCommand(type, flatName))
            .map((type) => ({type, spec: lookupCommand(type, flatName)}));
    }
    const type = groupType(ctx, target);
    if (groupName && hasGroupCommand(type, groupName)) {
        return [{type, spec: lookupGroupCommand(type, groupName, target)}];
    }
    if (hasCommand(type, flatName)) {
        return [{type, spec: lookupCommand(type, flatName)}];
    }
    return [];
};

const buildCommands = (
    target: Target,
    ctx: RouteContext,
    names: {flat: string; group?: string; operand?: number},
    sendOn: boolean,
): CommandSpec[] => {
    const entries = resolveEntries(target, ctx, names.flat, names.group);
    if (entries.length === 0) {
        const where = target === 'all' ? 'any configured group' : `group ${target}`;
        console.warn(`Ignoring "${names.flat}": not supported by the bulbs of ${where}`);
    }
    const commands: CommandSpec[] = [];
    for (const {type, spec} of entries) {
        if (sendOn) commands.push(onCommand(type, target));
        commands.push(names.operand === undefined ? spec : withOperand(spec, names.operand));
    }
    return commands;
};

const routed = (commands: CommandSpec[], retries: number): RoutedCommand[] =>
    commands.length === 0 ? [] : [{commands, retries}];

/** Normalize the accepted color inputs into a tagged {@link ColorSpec}. */
export const toColorSpec = (input: ColorInput): ColorSpec => {
    if (typeof input === 'string') return {kind: 'named', name: input};
    if (typeof input === 'number') return {kind: 'indexed', value: input};
    if ('kind' in input) return input;
    const [red, green, blue] = input;
    return {kind: 'rgb', red, green, blue};
};

/**
 * Convert a caller brightness level to percent (0-100).
 * Values are truncated, then clamped.
 */
export const brightnessPercent = (level: BrightnessLevel): number => {
    const value = typeof level === 'number' ? level : level.fraction;
    if (!Number.isFinite(value)) {
        throw new RangeError(`Brightness must be a finite number, got ${value}`);
    }
    let percent: number;
    if (typeof level === 'number' && Number.isInteger(level)) {
        percent = level;
    } else {
        percent = value > 1 ? Math.trunc(value) : Math.trunc(value * 100);
    }
    return Math.min(100, Math.max(0, percent));
};

/** Map a percent (clamped to 0-100) onto the bridge brightness range 2-27. */
export const brightnessDeviceValue = (percent: number): number => {
    const clamped = Math.min(100, Math.max(0, percent));
    return Math.floor(BRIGHTNESS_MIN + (clamped / 100) * (BRIGHTNESS_MAX - BRIGHTNESS_MIN));
};

const isByte = (value: number): boolean => Number.isInteger(value) && value >= 0 && value <= 255;

const invalidColor = (message: string, details: Record<string, unknown>): LimitlessError =>
    new LimitlessError({message, code: 'UNKNOWN_COLOR', details});

const routeColor = (target: Target, ctx: RouteContext, color: ColorSpec): RoutedCommand[] => {
    const send = (names: {flat: string; group?: string; operand?: number}): RoutedCommand[] =>
        routed(buildCommands(target, ctx, names, true), ctx.repeatCommands);

    switch (color.kind) {
        case 'named': {
            if (color.name === 'white') return send({flat: 'all_white', group: 'white'});
            const flat = `color_to_${color.name}`;
            if (!hasCommand(BulbType.Rgbw, flat)) {
                throw new LimitlessError({
                    message: `Unknown color "${color.name}"`,
                    code: 'UNKNOWN_COLOR',
                    details: {color: color.name},
                });
            }
            return send({flat});
        }
        case 'indexed':
            if (!isByte(color.value)) {
                throw invalidColor(`Color value must be 0-255, got ${color.value}`, {value: color.value});
            }
            return send({flat: 'color_by_int', operand: color.value});
        case 'rgb': {
            const {red, green, blue} = color;
            if (![red, green, blue].every(isByte)) {
                throw invalidColor(`RGB channels must be integers 0-255, got rgb(${red}, ${green}, ${blue})`, {
                    red,
                    green,
                    blue,
                });
            }
            if (isAchromatic(red, green, blue)) {
                if (red === 0) {
                    return routed(buildCommands(target, ctx, {flat: 'all_off', group: 'off'}, false), ctx.repeatCommands);
                }
                return send({flat: 'all_white', group: 'white'});
            }
            return send({flat: 'color_by_int', operand: rgbToHue(red, green, blue)});
        }
    }
};

const routeBrightness = (target: Target, ctx: RouteContext, value: number): RoutedCommand[] => {
    const types = target === 'all' ? presentBulbTypes(ctx.groupTypes) : [groupType(ctx, target)];
    const commands = types.map((type) => onCommand(type, target));
    commands.push(withOperand(lookupCommand(BulbType.Rgbw, 'brightness'), value));
    return routed(commands, ctx.repeatCommands);
};

/**
 * Resolve an operation for a group (or all groups) into routed commands.
 * @throws LimitlessError `INVALID_GROUP` or `UNKNOWN_COLOR` (unknown name, hue byte or RGB channel
 * outside 0-255) before anything is sent.
 */
export const route = (operation: Operation, group: GroupTarget, ctx: RouteContext): RoutedCommand[] => {
    const target = resolveTarget(group);
    const repeat = ctx.repeatCommands;

    switch (operation.type) {
        case 'on':
            return routed(buildCommands(target, ctx, {flat: 'all_on', group: 'on'}, false), repeat);
        case 'off':
            return routed(buildCommands(target, ctx, {flat: 'all_off', group: 'off'}, false), repeat);
        case 'white':
            return routed(buildCommands(target, ctx, {flat: 'all_white', group: 'white'}, true), repeat);
        case 'color':
            return routeColor(target, ctx, operation.color);
        case 'brightness':
            return routeBrightness(target, ctx, operation.value);
        case 'disco':
        case 'disco_faster':
        case 'disco_slower':
            return routed(buildCommands(target, ctx, {flat: operation.type}, true), 1);
        case 'nightmode':
            // Bulbs only enter nightmode from off.
            return [
                ...routed(buildCommands(target, ctx, {flat: 'all_off', group: 'off'}, false), repeat),
                ...routed(buildCommands(target, ctx, {flat: 'all_nightmode', group: 'nightmode'}, false), 1),
            ];
        case 'step':
            return routed(buildCommands(target, ctx, {flat: operation.command}, true), operation.steps);
    }
};
