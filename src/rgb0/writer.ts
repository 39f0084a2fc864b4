/**
 * RGB0 file writer.
 * @module rgb0/writer
 */
import {mkdirSync, writeFileSync} from 'fs';
import {join} from 'path';

import {BYTES_PER_LED, DEFAULT_WRITER_OPTIONS} from './constants';
import {Rgb0Error} from './errors';
import {encodeGammaTable} from './gamma';
import {dataOffsetFor, encodeHeader} from './header';
import {writeFrame} from './layout';
import {encodePortDescriptors, uniformPorts} from './ports';
import type {FramePixels, WriteFileOptions, WriterOptions} from './types';
import {assertUInt} from './util';

/** Writer options with every default applied. */
export type ResolvedWriterOptions = Required<Omit<WriterOptions, 'gamma'>> & Pick<WriterOptions, 'gamma'>;

/** Fill unset writer options from `DEFAULT_WRITER_OPTIONS`. */
export const resolveWriterOptions = (options: WriterOptions = {}): ResolvedWriterOptions => ({
    ledsPerPort: options.ledsPerPort ?? DEFAULT_WRITER_OPTIONS.ledsPerPort,
    portCount: options.portCount ?? DEFAULT_WRITER_OPTIONS.portCount,
    loopByte: options.loopByte ?? DEFAULT_WRITER_OPTIONS.loopByte,
    mode: options.mode ?? DEFAULT_WRITER_OPTIONS.mode,
    flags: options.flags ?? DEFAULT_WRITER_OPTIONS.flags,
    gamma: options.gamma,
});

/**
 * Check that every frame has `portCount` ports of `ledsPerPort` LEDs.
 * @throws Rgb0Error `SHAPE_MISMATCH` naming the first offending frame/port.
 */
export function validateFrames(frames: readonly FramePixels[], portCount: number, ledsPerPort: number): void {
    if (frames.length === 0) {
        throw new Rgb0Error({
            message: 'At least one frame is required',
            code: 'SHAPE_MISMATCH',
            details: {expected: 1, actual: 0},
        });
    }
    frames.forEach((frame, frameIndex) => {
        if (frame.length !== portCount) {
            throw new Rgb0Error({
                message: `Frame ${frameIndex} contains ${frame.length} ports; expected ${portCount}`,
                code: 'SHAPE_MISMATCH',
                details: {frame: frameIndex, expected: portCount, actual: frame.length},
            });
        }
        frame.forEach((leds, portIndex) => {
            if (leds.length !== ledsPerPort) {
                throw new Rgb0Error({
                    message: `Frame ${frameIndex} port ${portIndex} has ${leds.length} LEDs; expected ${ledsPerPort}`,
                    code: 'SHAPE_MISMATCH',
                    details: {frame: frameIndex, port: portIndex, expected: ledsPerPort, actual: leds.length},
                });
            }
        });
    });
}

/**
 * Encode frames of LED triplets into a complete capture.
 * @param frames Frames, each a list of ports, each a list of LED colors.
 * @param options Layout and per-port settings; see `WriterOptions`.
 * @throws Rgb0Error `SHAPE_MISMATCH` or `INVALID_GAMMA_TABLE`.
 * @throws RangeError when a setting does not fit its field.
 */
export function encodeRgb0(frames: readonly FramePixels[], options: WriterOptions = {}): Buffer {
    const resolved = resolveWriterOptions(options);
    const portCount = assertUInt(resolved.portCount, 16, 'portCount');
    const ledsPerPort = assertUInt(resolved.ledsPerPort, 16, 'ledsPerPort');
    validateFrames(frames, portCount, ledsPerPort);

    const bytesPerPort = assertUInt(ledsPerPort * BYTES_PER_LED, 16, 'bytesPerPort');
    const frameSize = portCount * bytesPerPort;
    const ports = uniformPorts({
        portCount,
        bytesPerPort,
        mode: resolved.mode,
        flags: resolved.flags,
        loopByte: resolved.loopByte,
    });

    const header = encodeHeader({frameSize, frameCount: frames.length, portCount});
    const portTable = encodePortDescriptors(ports);
    const gamma = encodeGammaTable(resolved.gamma);

    const dataOffset = dataOffsetFor(portCount);
    const out = Buffer.alloc(dataOffset + frameSize * frames.length);
    header.copy(out, 0);
    portTable.copy(out, header.length);
    gamma.copy(out, header.length + portTable.length);

    let offset = dataOffset;
    for (const frame of frames) {
        offset += writeFrame(out, offset, ports, frame);
    }
    return out;
}

/**
 * File name the SD controller expects for a run.
 * @param runNumber Positive run number, zero-padded to two digits.
 */
export const captureFileName = (runNumber: number): string => {
    if (!Number.isInteger(runNumber) || runNumber < 1) {
        throw new RangeError(`Run number must be a positive integer, got ${runNumber}`);
    }
    return `Sc-${String(runNumber).padStart(2, '0')}-01.rgb`;
};

/**
 * Encode frames and write them to `<outputDir>/Sc-<run>-01.rgb`.
 * The directory is created when missing.
 * @returns Path of the written file.
 */
export function writeRgb0File(outputDir: string, frames: readonly FramePixels[], options: WriteFileOptions = {}): string {
    const {runNumber = 1, ...writerOptions} = options;
    const outputPath = join(outputDir, captureFileName(runNumber));
    const data = encodeRgb0(frames, writerOptions);
    mkdirSync(outputDir, {recursive: true});
    writeFileSync(outputPath, data);
    return outputPath;
}
