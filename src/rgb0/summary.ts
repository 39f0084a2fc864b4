/**
 * Human-readable layout summary of a decoded capture.
 * @module rgb0/summary
 */
import {computePortOffsets} from './layout';
import type {Rgb0File} from './types';
import {hex} from './util';

const GAMMA_PREVIEW = 4;
const FRAME_PREVIEW = 16;

/**
 * Describe frame size, frame counts, gamma preview, port layout and the
 * first bytes of frame 0.
 * @param name Label for the first line, usually the file name.
 * @param file Decoded capture.
 */
export function formatSummary(name: string, file: Rgb0File): string[] {
    const {header, frames} = file;
    const claim = header.frameCount ? ` (header claims ${header.frameCount})` : '';
    const lines = [
        `${name}: frame_size=${header.frameSize} bytes, frames=${frames.length}${claim}`,
        `  gamma sample: [${header.gammaLut.slice(0, GAMMA_PREVIEW).join(', ')}]`,
    ];

    const offsets = computePortOffsets(header.ports);
    for (const port of header.ports) {
        lines.push(
            `    Port ${port.index}: len=${port.length}, mode=${hex(port.mode)}, ` +
                `flags=${hex(port.flags, 4)}, loop=${port.loopFlag}, offset=${offsets.get(port.index) ?? 0}`,
        );
    }

    const first = frames[0];
    if (first) {
        lines.push(`  first frame preview (${FRAME_PREVIEW} bytes): ${first.subarray(0, FRAME_PREVIEW).toString('hex')}`);
    }
    return lines;
}
