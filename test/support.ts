import type {FramePixels, PortDescriptor, RgbTriplet} from '../src';

/** Deterministic LED colors: red = frame*16 + port*4 + led, green/blue follow. */
export const makeFrames = (frameCount: number, portCount: number, ledsPerPort: number): FramePixels[] =>
    Array.from({length: frameCount}, (_, f) =>
        Array.from({length: portCount}, (_, p) =>
            Array.from({length: ledsPerPort}, (_, l): RgbTriplet => {
                const r = f * 16 + p * 4 + l;
                return {r, g: r + 1, b: r + 2};
            }),
        ),
    );

/** Raw bytes a port block should hold for a list of LEDs. */
export const ledBytes = (leds: readonly RgbTriplet[]): Buffer =>
    Buffer.from(leds.flatMap((c) => [c.r & 0xff, c.g & 0xff, c.b & 0xff]));

export const port = (index: number, length: number): PortDescriptor => ({
    index,
    length,
    mode: 0x06,
    flags: 0,
    loopFlag: false,
    loopByte: 0,
});

/** Capture the error thrown by `fn`. */
export const catchError = (fn: () => unknown): unknown => {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error('expected function to throw');
};
