/**
 * Frame builder for bridge commands.
 * @module limitless/packet
 *
 * Every datagram is exactly three bytes: opcode, operand (0x00 when the
 * command has none) and the 0x55 terminator.
 */
import {FRAME_LENGTH, FRAME_TERMINATOR} from './constants';

/**
 * Pad a 1-3 byte command into a wire frame.
 * @param command Raw command bytes.
 */
export const buildFrame = (command: readonly number[]): Buffer => {
    if (command.length < 1 || command.length > FRAME_LENGTH) {
        throw new RangeError(`Command must be 1-${FRAME_LENGTH} bytes, got ${command.length}`);
    }
    for (const value of command) {
        if (!Number.isInteger(value) || value < 0 || value > 0xff) {
            throw new RangeError(`Command byte must be 0-255, got ${value}`);
        }
    }
    const bytes = [...command];
    if (bytes.length === 1) bytes.push(0x00);
    if (bytes.length === 2) bytes.push(FRAME_TERMINATOR);
    return Buffer.from(bytes);
};
