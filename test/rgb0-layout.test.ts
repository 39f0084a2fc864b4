import {describe, expect, it} from 'vitest';

import {
    assembleFrame,
    checkLayout,
    computePortOffsets,
    extractPort,
    frameSizeOf,
    locatePort,
    PortMode,
    Rgb0Error,
    uniformPorts,
    writeFrame,
} from '../src';
import {catchError, port} from './support';

const twoLongPorts = uniformPorts({portCount: 2, bytesPerPort: 3000, mode: PortMode.SpiTtl, flags: 0x80fa, loopByte: 0x50});

describe('Frame layout', () => {
    it('offsets each port by the lengths of the ports before it', () => {
        const offsets = computePortOffsets(twoLongPorts);

        expect(offsets.get(0)).toBe(0);
        expect(offsets.get(1)).toBe(3000);
        expect(frameSizeOf(twoLongPorts)).toBe(6000);
    });

    it('extracts one port block from a frame unmodified', () => {
        const frame = Buffer.from(Array.from({length: 6000}, (_, i) => i % 251));

        const first = extractPort(frame, twoLongPorts, 0);
        expect(first.equals(frame.subarray(0, 3000))).toBe(true);

        const second = extractPort(frame, twoLongPorts, 1);
        expect(second.length).toBe(3000);
        expect(second[0]).toBe(3000 % 251);
    });

    it('follows table order rather than port index', () => {
        const ports = [port(5, 6), port(2, 3)];
        expect([...computePortOffsets(ports)]).toEqual([
            [5, 0],
            [2, 6],
        ]);
        expect(locatePort(ports, 2)).toEqual({offset: 6, length: 3});

        const reordered = [port(2, 3), port(5, 6)];
        expect([...computePortOffsets(reordered)]).toEqual([
            [2, 0],
            [5, 3],
        ]);
        expect(locatePort(reordered, 5)).toEqual({offset: 3, length: 6});
    });

    it('uses the first record when a port index repeats', () => {
        const ports = [port(4, 3), port(4, 6)];

        expect([...computePortOffsets(ports)]).toEqual([[4, 0]]);
        expect(locatePort(ports, 4)).toEqual({offset: 0, length: 3});
        expect([...extractPort(Buffer.from([1, 2, 3, 4, 5, 6, 7, 8, 9]), ports, 4)]).toEqual([1, 2, 3]);
    });

    it('fails for a port index missing from the table', () => {
        const err = catchError(() => extractPort(Buffer.alloc(6000), twoLongPorts, 7));
        expect(err).toBeInstanceOf(Rgb0Error);
        expect(err).toMatchObject({code: 'UNKNOWN_PORT', details: {port: 7}});
    });

    it('assembles LED triplets into port blocks in table order', () => {
        const frame = assembleFrame(
            [port(0, 6), port(1, 3)],
            [
                [
                    {r: 1, g: 2, b: 3},
                    {r: 4, g: 5, b: 6},
                ],
                [{r: 256 + 7, g: 8, b: 9}],
            ],
        );

        expect([...frame]).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });

    it('writes a frame at an offset inside a larger buffer', () => {
        const target = Buffer.alloc(8, 0xee);
        const written = writeFrame(target, 2, [port(0, 3), port(1, 3)], [[{r: 1, g: 2, b: 3}], [{r: 4, g: 5, b: 6}]]);

        expect(written).toBe(6);
        expect(target.toString('hex')).toBe('eeee010203040506');
    });

    it('accepts a consistent table', () => {
        expect(() => checkLayout({ports: [port(3, 6), port(1, 3)], frameSize: 9})).not.toThrow();
    });

    it('detects a frame size that differs from the port total', () => {
        const err = catchError(() => checkLayout({ports: [port(0, 6), port(1, 3)], frameSize: 10}));
        expect(err).toMatchObject({code: 'FRAME_SIZE_MISMATCH', details: {frameSize: 10, portTotal: 9}});
    });

    it('detects a repeated port index', () => {
        const err = catchError(() => checkLayout({ports: [port(4, 3), port(4, 3)], frameSize: 6}));
        expect(err).toMatchObject({code: 'DUPLICATE_PORT', details: {port: 4}});
    });
});
