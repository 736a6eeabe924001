/**
 * Structured controller error taxonomy.
 * @module limitless/errors
 */
export type LimitlessErrorCode =
    | 'INVALID_CONFIG'
    | 'INVALID_GROUP'
    | 'INVALID_BULB_TYPE'
    | 'UNKNOWN_COMMAND'
    | 'UNKNOWN_COLOR'
    | 'INDEX_OUT_OF_RANGE';

export class LimitlessError extends Error {
    public readonly code: LimitlessErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(params: {message: string; code: LimitlessErrorCode; details?: Record<string, unknown>}) {
        super(params.message);
        this.name = 'LimitlessError';
        this.code = params.code;
        this.details = params.details;
    }
}

export const invalidGroup = (group: unknown): LimitlessError =>
    new LimitlessError({
        message: `Group must be between 1 and 4 (was ${String(group)})`,
        code: 'INVALID_GROUP',
        details: {group},
    });
