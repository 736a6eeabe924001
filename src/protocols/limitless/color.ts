/**
 * RGB to protocol hue conversion.
 * @module limitless/color
 */

const assertChannel = (name: string, value: number): void => {
    if (!Number.isInteger(value) || value < 0 || value > 255) {
        throw new RangeError(`${name} must be an integer 0-255, got ${value}`);
    }
};

/** `true` when all channels are equal, i.e. the color has no hue. */
export const isAchromatic = (red: number, green: number, blue: number): boolean =>
    red === green && green === blue;

/**
 * Hue of an RGB color in the HLS model, normalized to [0, 1).
 * Red is 0, green 1/3, blue 2/3.
 */
export const rgbToHlsHue = (red: number, green: number, blue: number): number => {
    const max = Math.max(red, green, blue);
    const min = Math.min(red, green, blue);
    const span = max - min;
    if (span === 0) return 0;

    const rc = (max - red) / span;
    const gc = (max - green) / span;
    const bc = (max - blue) / span;
    let hue: number;
    if (red === max) {
        hue = bc - gc;
    } else if (green === max) {
        hue = 2 + rc - bc;
    } else {
        hue = 4 + gc - rc;
    }
    return (((hue / 6) % 1) + 1) % 1;
};

/**
 * Convert an RGB color to the operand of the color-by-value command.
 *
 * The bridge's color wheel starts at blue and runs the other way round, so the
 * HLS hue is mirrored and shifted by 2/3 before scaling to a byte.
 *
 * @throws RangeError for channels outside 0-255 and for achromatic colors,
 * which callers must map to "off" or "white" instead.
 */
export const rgbToHue = (red: number, green: number, blue: number): number => {
    assertChannel('red', red);
    assertChannel('green', green);
    assertChannel('blue', blue);
    if (isAchromatic(red, green, blue)) {
        throw new RangeError(`rgb(${red}, ${green}, ${blue}) has no hue`);
    }
    const hue = rgbToHlsHue(red, green, blue);
    return Math.floor(((1 - hue + 2 / 3) % 1) * 256);
};
