import {DEFAULT_WRITER_OPTIONS, type FramePixels, type RgbTriplet, writeRgb0File} from '../src';

type CliOptions = {
    out: string;
    run: number;
    leds: number;
    frames: number;
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {
        out: 'out',
        run: 1,
        leds: DEFAULT_WRITER_OPTIONS.ledsPerPort,
        frames: 120,
    };

    for (const arg of argv) {
        if (arg.startsWith('--out=')) {
            options.out = arg.substring('--out='.length);
        } else if (arg.startsWith('--run=')) {
            const run = Number(arg.substring('--run='.length));
            if (Number.isInteger(run) && run >= 1 && run <= 99) options.run = run;
        } else if (arg.startsWith('--leds=')) {
            const leds = Number(arg.substring('--leds='.length));
            if (Number.isInteger(leds) && leds >= 1 && leds <= 21845) options.leds = leds;
        } else if (arg.startsWith('--frames=')) {
            const frames = Number(arg.substring('--frames='.length));
            if (Number.isInteger(frames) && frames >= 1 && frames <= 65535) options.frames = frames;
        }
    }
    return options;
}

const hueToRgb = (hue: number): RgbTriplet => {
    const x = 1 - Math.abs(((hue / 60) % 2) - 1);
    let rgb: [number, number, number];
    if (hue < 60) rgb = [1, x, 0];
    else if (hue < 120) rgb = [x, 1, 0];
    else if (hue < 180) rgb = [0, 1, x];
    else if (hue < 240) rgb = [0, x, 1];
    else if (hue < 300) rgb = [x, 0, 1];
    else rgb = [1, 0, x];
    return {r: Math.round(rgb[0] * 255), g: Math.round(rgb[1] * 255), b: Math.round(rgb[2] * 255)};
};

const options = parseArgs(process.argv.slice(2));
const portCount = DEFAULT_WRITER_OPTIONS.portCount;
const portHueOffset = 360 / portCount;

const frames: FramePixels[] = Array.from({length: options.frames}, (_, frame) =>
    Array.from({length: portCount}, (_, port) =>
        Array.from({length: options.leds}, (_, led) =>
            hueToRgb((frame * 3 + port * portHueOffset + (led * 360) / options.leds) % 360),
        ),
    ),
);

const path = writeRgb0File(options.out, frames, {ledsPerPort: options.leds, runNumber: options.run});
console.log(`Wrote ${options.frames} frames x ${portCount} ports x ${options.leds} LEDs to ${path}`);
