/**
 * RGB0 file reader.
 * @module rgb0/reader
 */
import {GAMMA_SIZE, HEADER_SIZE, PORT_ENTRY_SIZE} from './constants';
import {decodeGammaTable} from './gamma';
import {decodeHeader} from './header';
import {checkLayout, locatePort} from './layout';
import {decodePortTable} from './ports';
import {BufferSource, FileSource, type ByteSource} from './source';
import type {ReadOptions, Rgb0File, Rgb0Header} from './types';

/**
 * Decode header, port table and gamma table from the front of a source.
 * Any failure here is fatal.
 */
function readHeader(source: ByteSource): Rgb0Header {
    const fixed = decodeHeader(source.read(HEADER_SIZE));
    const ports = decodePortTable(source.read(fixed.portCount * PORT_ENTRY_SIZE), fixed.portCount);
    const gammaLut = decodeGammaTable(source.read(GAMMA_SIZE));
    return Object.freeze({...fixed, ports: Object.freeze(ports), gammaLut: Object.freeze(gammaLut)});
}

/** Frame limit for a header: `maxFrames` wins, a declared count of 0 means "until end of input". */
function frameLimit(header: Rgb0Header, options: ReadOptions): number | undefined {
    if (options.maxFrames !== undefined) {
        if (!Number.isInteger(options.maxFrames) || options.maxFrames < 0) {
            throw new RangeError(`maxFrames must be a non-negative integer, got ${options.maxFrames}`);
        }
        return options.maxFrames;
    }
    return header.frameCount === 0 ? undefined : header.frameCount;
}

/**
 * Run the full decode over a source. A trailing partial frame ends the read
 * without an error and is dropped.
 * @param source Forward-only byte source.
 * @param options Frame limit and strictness.
 */
export function decodeRgb0(source: ByteSource, options: ReadOptions = {}): Rgb0File {
    const header = readHeader(source);
    if (options.strict) checkLayout(header);

    const limit = frameLimit(header, options);
    const frames: Buffer[] = [];
    if (header.frameSize > 0) {
        while (limit === undefined || frames.length < limit) {
            const frame = source.read(header.frameSize);
            if (frame.length < header.frameSize) break;
            frames.push(frame);
        }
    }
    return {header, frames};
}

/**
 * Parse a capture held in memory.
 * @param input Complete file contents.
 * @param options Frame limit and strictness.
 * @throws Rgb0Error for any failure before the first frame byte.
 */
export function parseRgb0(input: Uint8Array, options: ReadOptions = {}): Rgb0File {
    const source = new BufferSource(input);
    try {
        return decodeRgb0(source, options);
    } finally {
        source.close();
    }
}

/**
 * Read a capture from disk. The file descriptor is closed on every exit path.
 * @param path Capture file path.
 * @param options Frame limit and strictness.
 */
export function readRgb0File(path: string, options: ReadOptions = {}): Rgb0File {
    const source = new FileSource(path);
    try {
        return decodeRgb0(source, options);
    } finally {
        source.close();
    }
}

/** Yield every frame of a decoded capture. */
export function* iterFrames(file: Rgb0File): Generator<Buffer> {
    yield* file.frames;
}

/**
 * Yield one port's block from every frame.
 * @param file Decoded capture.
 * @param portIndex Port identifier.
 * @throws Rgb0Error `UNKNOWN_PORT` immediately, before iteration starts.
 */
export function iterPortFrames(file: Rgb0File, portIndex: number): Generator<Buffer> {
    const {offset, length} = locatePort(file.header.ports, portIndex);
    return (function* () {
        for (const frame of file.frames) {
            yield frame.subarray(offset, offset + length);
        }
    })();
}
