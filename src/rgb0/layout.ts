/**
 * Frame layout engine: where each port's block lives inside a frame.
 * @module rgb0/layout
 *
 * Offsets are derived from the port list passed in on every call and are
 * never cached, so a changed table always yields fresh offsets.
 */
import {BYTES_PER_LED} from './constants';
import {Rgb0Error} from './errors';
import type {FramePixels, PortDescriptor, PortSpan, Rgb0Header} from './types';

/** Sum of all port lengths, i.e. the frame size the table implies. */
export const frameSizeOf = (ports: readonly PortDescriptor[]): number =>
    ports.reduce((total, port) => total + port.length, 0);

/**
 * Map each port index to its byte offset within a frame.
 * When an index repeats, the first occurrence wins.
 * @param ports Port table in layout order.
 */
export function computePortOffsets(ports: readonly PortDescriptor[]): Map<number, number> {
    const offsets = new Map<number, number>();
    let offset = 0;
    for (const port of ports) {
        if (!offsets.has(port.index)) offsets.set(port.index, offset);
        offset += port.length;
    }
    return offsets;
}

/**
 * Locate a port's block.
 * @param ports Port table in layout order.
 * @param portIndex Port identifier (not the table position).
 * @throws Rgb0Error `UNKNOWN_PORT` when no record has this index.
 */
export function locatePort(ports: readonly PortDescriptor[], portIndex: number): PortSpan {
    let offset = 0;
    for (const port of ports) {
        if (port.index === portIndex) return {offset, length: port.length};
        offset += port.length;
    }
    throw new Rgb0Error({
        message: `Port ${portIndex} is not present in the port table`,
        code: 'UNKNOWN_PORT',
        details: {port: portIndex},
    });
}

/**
 * Slice one port's bytes out of a frame. The result shares memory with `frame`.
 * @param frame Full frame buffer.
 * @param ports Port table in layout order.
 * @param portIndex Port identifier.
 */
export function extractPort(frame: Buffer, ports: readonly PortDescriptor[], portIndex: number): Buffer {
    const {offset, length} = locatePort(ports, portIndex);
    return frame.subarray(offset, offset + length);
}

/**
 * Write one frame's LED triplets into `target`, port blocks in table order.
 * LEDs past a port's length are dropped; unfilled bytes keep their value.
 * @param target Destination buffer.
 * @param start Offset of the frame inside `target`.
 * @param ports Port table in layout order.
 * @param blocks LED colors per port, same order as `ports`.
 * @returns Number of bytes the frame occupies.
 */
export function writeFrame(
    target: Buffer,
    start: number,
    ports: readonly PortDescriptor[],
    blocks: FramePixels,
): number {
    let offset = start;
    ports.forEach((port, i) => {
        const leds = blocks[i] ?? [];
        const capacity = Math.min(leds.length, Math.floor(port.length / BYTES_PER_LED));
        for (let led = 0; led < capacity; led++) {
            const color = leds[led];
            if (!color) continue;
            const pos = offset + led * BYTES_PER_LED;
            target[pos] = color.r & 0xff;
            target[pos + 1] = color.g & 0xff;
            target[pos + 2] = color.b & 0xff;
        }
        offset += port.length;
    });
    return offset - start;
}

/**
 * Build a standalone frame buffer from per-port LED triplets.
 * @param ports Port table in layout order.
 * @param blocks LED colors per port.
 */
export function assembleFrame(ports: readonly PortDescriptor[], blocks: FramePixels): Buffer {
    const frame = Buffer.alloc(frameSizeOf(ports));
    writeFrame(frame, 0, ports, blocks);
    return frame;
}

/**
 * Verify the structural invariants of a header's port table.
 * @throws Rgb0Error `DUPLICATE_PORT` or `FRAME_SIZE_MISMATCH`.
 */
export function checkLayout(header: Pick<Rgb0Header, 'ports' | 'frameSize'>): void {
    const seen = new Set<number>();
    for (const port of header.ports) {
        if (seen.has(port.index)) {
            throw new Rgb0Error({
                message: `Port ${port.index} appears more than once in the port table`,
                code: 'DUPLICATE_PORT',
                details: {port: port.index},
            });
        }
        seen.add(port.index);
    }

    const portTotal = frameSizeOf(header.ports);
    if (portTotal !== header.frameSize) {
        throw new Rgb0Error({
            message: `Frame size ${header.frameSize} does not match port lengths total ${portTotal}`,
            code: 'FRAME_SIZE_MISMATCH',
            details: {frameSize: header.frameSize, portTotal},
        });
    }
}
