/**
 * Public API: RGB0 capture decoding and encoding.
 * @module rgb0-capture
 */
export * from './rgb0';
