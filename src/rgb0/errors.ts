/**
 * Structured RGB0 codec error taxonomy.
 * @module rgb0/errors
 */

export type Rgb0ErrorCode =
    | 'MALFORMED_HEADER'
    | 'TRUNCATED_HEADER'
    | 'TRUNCATED_PORT_TABLE'
    | 'TRUNCATED_GAMMA_TABLE'
    | 'SHAPE_MISMATCH'
    | 'INVALID_GAMMA_TABLE'
    | 'UNKNOWN_PORT'
    | 'FRAME_SIZE_MISMATCH'
    | 'DUPLICATE_PORT';

export class Rgb0Error extends Error {
    public readonly code: Rgb0ErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(params: {message: string; code: Rgb0ErrorCode; details?: Record<string, unknown>}) {
        super(params.message);
        this.name = 'Rgb0Error';
        this.code = params.code;
        this.details = params.details;
    }
}

/** Build the error raised when a fixed region ends before its declared size. */
export const truncated = (
    code: Extract<Rgb0ErrorCode, `TRUNCATED_${string}`>,
    region: string,
    expected: number,
    actual: number,
): Rgb0Error =>
    new Rgb0Error({
        message: `${region} truncated: expected ${expected} bytes, got ${actual}.`,
        code,
        details: {expected, actual},
    });
