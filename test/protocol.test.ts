import {describe, expect, it} from 'vitest';

import {
    BulbType,
    buildFrame,
    commandTable,
    FRAME_TERMINATOR,
    hasCommand,
    hasGroupCommand,
    LIMITLESS_PORT,
    LimitlessError,
    lookupCommand,
    lookupGroupCommand,
    rgbToHlsHue,
    rgbToHue,
    withOperand,
} from '../src';

import {thrownBy} from './helpers';

describe('buildFrame', () => {
    it('pads one-byte commands with a zero operand and the terminator', () => {
        expect([...buildFrame([0x42])]).toEqual([0x42, 0x00, 0x55]);
    });

    it('appends the terminator to two-byte commands', () => {
        expect([...buildFrame([0x40, 0xb0])]).toEqual([0x40, 0xb0, FRAME_TERMINATOR]);
    });

    it('passes three-byte commands through unchanged', () => {
        expect([...buildFrame([0x4e, 0x1b, 0x00])]).toEqual([0x4e, 0x1b, 0x00]);
    });

    it('rejects empty, oversized and non-byte commands', () => {
        expect(() => buildFrame([])).toThrow(RangeError);
        expect(() => buildFrame([1, 2, 3, 4])).toThrow(RangeError);
        expect(() => buildFrame([0x100])).toThrow(RangeError);
        expect(() => buildFrame([1.5])).toThrow(RangeError);
    });
});

describe('command table', () => {
    it('uses the documented default port', () => {
        expect(LIMITLESS_PORT).toBe(8899);
    });

    it('holds the RGBW flat commands and palette', () => {
        expect(lookupCommand(BulbType.Rgbw, 'all_on')).toEqual([0x42]);
        expect(lookupCommand(BulbType.Rgbw, 'all_off')).toEqual([0x41]);
        expect(lookupCommand(BulbType.Rgbw, 'disco')).toEqual([0x4d]);
        expect(lookupCommand(BulbType.Rgbw, 'color_to_violet')).toEqual([0x40, 0x00]);
        expect(lookupCommand(BulbType.Rgbw, 'color_to_red')).toEqual([0x40, 0xb0]);
        expect(lookupCommand(BulbType.Rgbw, 'color_to_lavendar')).toEqual([0x40, 0xf0]);
        const colors = [...commandTable(BulbType.Rgbw).flat.keys()].filter((name) => name.startsWith('color_to_'));
        expect(colors).toHaveLength(16);
    });

    it('holds the white flat commands', () => {
        expect(lookupCommand(BulbType.White, 'all_on')).toEqual([0x35]);
        expect(lookupCommand(BulbType.White, 'all_white')).toEqual([0xb5]);
        expect(lookupCommand(BulbType.White, 'warmer')).toEqual([0x3e]);
        expect(lookupCommand(BulbType.White, 'cooler')).toEqual([0x3f]);
        expect(lookupCommand(BulbType.White, 'brightness_up')).toEqual([0x3c]);
        expect(lookupCommand(BulbType.White, 'brightness_down')).toEqual([0x34]);
    });

    it('indexes group variants by group - 1', () => {
        expect(lookupGroupCommand(BulbType.Rgbw, 'on', 1)).toEqual([0x45]);
        expect(lookupGroupCommand(BulbType.Rgbw, 'off', 4)).toEqual([0x4c]);
        expect(lookupGroupCommand(BulbType.Rgbw, 'nightmode', 2)).toEqual([0xc8]);
        expect(lookupGroupCommand(BulbType.White, 'on', 4)).toEqual([0x32]);
        expect(lookupGroupCommand(BulbType.White, 'white', 2)).toEqual([0xbd]);
    });

    it('reports which commands a bulb family has', () => {
        expect(hasCommand(BulbType.Rgbw, 'warmer')).toBe(false);
        expect(hasCommand(BulbType.White, 'disco')).toBe(false);
        expect(hasGroupCommand(BulbType.White, 'nightmode')).toBe(true);
    });

    it('fails on unknown commands and groups', () => {
        expect(() => lookupCommand(BulbType.Rgbw, 'warmer')).toThrow(LimitlessError);
        expect(thrownBy(() => lookupCommand(BulbType.White, 'explode'))).toMatchObject({code: 'UNKNOWN_COMMAND'});
        expect(thrownBy(() => lookupGroupCommand(BulbType.Rgbw, 'disco', 1))).toMatchObject({code: 'UNKNOWN_COMMAND'});
        expect(thrownBy(() => lookupGroupCommand(BulbType.Rgbw, 'on', 5))).toMatchObject({code: 'INVALID_GROUP'});
    });

    it('fills the operand of a template', () => {
        expect(withOperand([0x40], 0xaa)).toEqual([0x40, 0xaa]);
        expect(() => withOperand([0x40], 256)).toThrow(RangeError);
    });
});

describe('rgbToHue', () => {
    it('computes HLS hue', () => {
        expect(rgbToHlsHue(255, 0, 0)).toBe(0);
        expect(rgbToHlsHue(0, 255, 255)).toBe(0.5);
    });

    it('maps named colors onto the blue-first wheel', () => {
        const table: [string, [number, number, number], number][] = [
            ['red', [255, 0, 0], 170],
            ['green', [0, 255, 0], 85],
            ['blue', [0, 0, 255], 0],
            ['yellow', [255, 255, 0], 128],
            ['cyan', [0, 255, 255], 42],
            ['magenta', [255, 0, 255], 213],
            ['orange', [255, 128, 0], 149],
            ['purple', [128, 0, 255], 234],
        ];
        for (const [, [red, green, blue], expected] of table) {
            expect(rgbToHue(red, green, blue)).toBe(expected);
        }
    });

    it('rejects colors without a hue and out-of-range channels', () => {
        expect(() => rgbToHue(0, 0, 0)).toThrow(RangeError);
        expect(() => rgbToHue(255, 255, 255)).toThrow(RangeError);
        expect(() => rgbToHue(256, 0, 0)).toThrow(RangeError);
        expect(() => rgbToHue(-1, 0, 0)).toThrow(RangeError);
    });
});

describe('LimitlessError', () => {
    it('carries a code and details', () => {
        const err = new LimitlessError({message: 'bad group', code: 'INVALID_GROUP', details: {group: 7}});
        expect(err).toBeInstanceOf(Error);
        expect(err.name).toBe('LimitlessError');
        expect(err).toMatchObject({code: 'INVALID_GROUP', message: 'bad group'});
        expect(err.details).toEqual({group: 7});
    });
});
