/**
 * Gamma lookup table codec (256 x u16, big-endian).
 * @module rgb0/gamma
 */
import {GAMMA_ENTRIES, GAMMA_SIZE} from './constants';
import {Rgb0Error, truncated} from './errors';

/** Identity table `[0, 1, ..., 255]`. */
export const identityGamma = (): number[] => Array.from({length: GAMMA_ENTRIES}, (_, i) => i);

/**
 * Decode the 512-byte gamma table.
 * @throws Rgb0Error `TRUNCATED_GAMMA_TABLE` when `buf` is short.
 */
export function decodeGammaTable(buf: Buffer): number[] {
    if (buf.length < GAMMA_SIZE) {
        throw truncated('TRUNCATED_GAMMA_TABLE', 'Gamma table', GAMMA_SIZE, buf.length);
    }
    const lut: number[] = [];
    for (let i = 0; i < GAMMA_ENTRIES; i++) {
        lut.push(buf.readUInt16BE(i * 2));
    }
    return lut;
}

/**
 * Encode a gamma table.
 * @param values 256 entries in `[0, 65535]`; identity when omitted.
 * @throws Rgb0Error `INVALID_GAMMA_TABLE` on a wrong length or out-of-range entry.
 */
export function encodeGammaTable(values?: readonly number[]): Buffer {
    const lut = values ?? identityGamma();
    if (lut.length !== GAMMA_ENTRIES) {
        throw new Rgb0Error({
            message: `Gamma table must contain exactly ${GAMMA_ENTRIES} entries, got ${lut.length}`,
            code: 'INVALID_GAMMA_TABLE',
            details: {length: lut.length},
        });
    }

    const buf = Buffer.alloc(GAMMA_SIZE);
    lut.forEach((value, entry) => {
        if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
            throw new Rgb0Error({
                message: `Gamma entry ${entry} must be 0-65535, got ${value}`,
                code: 'INVALID_GAMMA_TABLE',
                details: {entry, value},
            });
        }
        buf.writeUInt16BE(value, entry * 2);
    });
    return buf;
}
