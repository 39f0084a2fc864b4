/**
 * Small helpers shared by the RGB0 codecs.
 * @module rgb0/util
 */

const FIELD_MAX = {8: 0xff, 16: 0xffff, 32: 0xffffffff} as const;

/**
 * Throw a `RangeError` unless `value` fits an unsigned field of `bits` width.
 * @param value Candidate value.
 * @param bits Field width.
 * @param label Field name used in the error message.
 */
export const assertUInt = (value: number, bits: keyof typeof FIELD_MAX, label: string): number => {
    const max = FIELD_MAX[bits];
    if (!Number.isInteger(value) || value < 0 || value > max) {
        throw new RangeError(`${label} must be an integer 0-${max}, got ${value}`);
    }
    return value;
};

/**
 * Format a byte as `0x..` with a fixed number of hex digits.
 * @param value Value to format.
 * @param digits Minimum digit count.
 */
export const hex = (value: number, digits = 2): string => `0x${value.toString(16).padStart(digits, '0')}`;
