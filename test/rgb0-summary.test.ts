import {describe, expect, it} from 'vitest';

import {encodeRgb0, formatSummary, hex, parseRgb0} from '../src';
import {makeFrames, port} from './support';

describe('formatSummary', () => {
    it('describes sizes, gamma preview, port layout and the first frame', () => {
        const file = parseRgb0(encodeRgb0(makeFrames(2, 2, 2), {portCount: 2, ledsPerPort: 2}));

        expect(formatSummary('cap.rgb', file)).toEqual([
            'cap.rgb: frame_size=12 bytes, frames=2 (header claims 2)',
            '  gamma sample: [0, 1, 2, 3]',
            '    Port 0: len=6, mode=0x06, flags=0x80fa, loop=false, offset=0',
            '    Port 1: len=6, mode=0x06, flags=0x80fa, loop=false, offset=6',
            '  first frame preview (16 bytes): 000102010203040506050607',
        ]);
    });

    it('omits the header claim when the frame count is unknown', () => {
        const buf = encodeRgb0(makeFrames(1, 1, 1), {portCount: 1, ledsPerPort: 1, loopByte: 0x80});
        buf.writeUInt16BE(0, 14);

        const lines = formatSummary('a.rgb', parseRgb0(buf));
        expect(lines[0]).toBe('a.rgb: frame_size=3 bytes, frames=1');
        expect(lines[2]).toBe('    Port 0: len=3, mode=0x06, flags=0x80fa, loop=true, offset=0');
    });

    it('reports the first offset for every record of a repeated port index', () => {
        const file = parseRgb0(encodeRgb0(makeFrames(1, 2, 1), {portCount: 2, ledsPerPort: 1}));
        const lines = formatSummary('dup.rgb', {header: {...file.header, ports: [port(4, 3), port(4, 6)]}, frames: []});

        expect(lines.slice(2)).toEqual([
            '    Port 4: len=3, mode=0x06, flags=0x0000, loop=false, offset=0',
            '    Port 4: len=6, mode=0x06, flags=0x0000, loop=false, offset=0',
        ]);
    });

    it('skips the preview when no frame is present', () => {
        const buf = encodeRgb0(makeFrames(1, 1, 1), {portCount: 1, ledsPerPort: 1});
        expect(formatSummary('empty.rgb', parseRgb0(buf.subarray(0, buf.length - 1)))).toHaveLength(3);
    });
});

describe('hex', () => {
    it('pads to the requested width', () => {
        expect(hex(6)).toBe('0x06');
        expect(hex(0x80fa, 4)).toBe('0x80fa');
        expect(hex(0x1b)).toBe('0x1b');
    });
});
