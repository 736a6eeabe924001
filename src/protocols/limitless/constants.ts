/**
 * LimitlessLED / MiLight wire protocol constants.
 * @module limitless/constants
 *
 * Protocol reference:
 * - LimitlessLED developer notes (v3-v5 WiFi bridge UDP command set)
 */
export const LIMITLESS_PORT = 8899;
/** Port used by the first WiFi bridge hardware revisions. */
export const LIMITLESS_LEGACY_PORT = 50000;
/** Last byte of every frame built from a 1-2 byte command. */
export const FRAME_TERMINATOR = 0x55;
export const FRAME_LENGTH = 3;

/** Number of addressable groups per gateway. */
export const GROUP_COUNT = 4;

/** Opcodes shared by commands that take an operand byte. */
export enum Opcode {
    ColorByInt = 0x40,
    Brightness = 0x4e,
}

/** Supported bulb families. */
export enum BulbType {
    Rgbw = 'rgbw',
    White = 'white',
}

/** Device brightness range accepted by the {@link Opcode.Brightness} operand. */
export const BRIGHTNESS_MIN = 2;
export const BRIGHTNESS_MAX = 27;

/** Wheel positions of the built-in color palette. */
export const COLOR_PALETTE = {
    violet: 0x00,
    royal_blue: 0x10,
    baby_blue: 0x20,
    aqua: 0x30,
    royal_mint: 0x40,
    seafoam_green: 0x50,
    green: 0x60,
    lime_green: 0x70,
    yellow: 0x80,
    yellow_orange: 0x90,
    orange: 0xa0,
    red: 0xb0,
    pink: 0xc0,
    fusia: 0xd0,
    lilac: 0xe0,
    lavendar: 0xf0,
} as const;

