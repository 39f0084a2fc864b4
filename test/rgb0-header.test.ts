import {describe, expect, it} from 'vitest';

import {decodeHeader, encodeHeader, headerEndOffsetFor, dataOffsetFor, Rgb0Error} from '../src';
import {catchError} from './support';

describe('RGB0 header codec', () => {
    it('encodes the fixed header big-endian with derived end offset', () => {
        const buf = encodeHeader({frameSize: 96, frameCount: 3, portCount: 16});

        expect(buf.length).toBe(23);
        expect(buf.toString('hex')).toBe('52474230' + '31303031' + 'ffffffff' + '02e6' + '0003' + '00000060' + '0010' + '01');
    });

    it('derives end and data offsets from the port count', () => {
        expect(headerEndOffsetFor(16)).toBe(742);
        expect(dataOffsetFor(16)).toBe(743);
        expect(headerEndOffsetFor(0)).toBe(534);
    });

    it('decodes every field of an encoded header', () => {
        const header = decodeHeader(encodeHeader({frameSize: 96, frameCount: 3, portCount: 16}));

        expect(header).toEqual({
            magic: 'RGB0',
            version: '1001',
            sentinel: 0xffffffff,
            headerEndOffset: 742,
            frameCount: 3,
            frameSize: 96,
            portCount: 16,
            channelCount: 1,
        });
        expect(Object.isFrozen(header)).toBe(true);
    });

    it('does not validate the version tag', () => {
        const buf = encodeHeader({frameSize: 6, frameCount: 0, portCount: 1});
        buf.write('2002', 4, 'latin1');
        expect(decodeHeader(buf).version).toBe('2002');
    });

    it('rejects a wrong magic', () => {
        const buf = encodeHeader({frameSize: 6, frameCount: 1, portCount: 1});
        buf.write('RGB1', 0, 'latin1');

        const err = catchError(() => decodeHeader(buf));
        expect(err).toBeInstanceOf(Rgb0Error);
        expect(err).toMatchObject({code: 'MALFORMED_HEADER', details: {magic: 'RGB1'}});
    });

    it('rejects a short header', () => {
        const err = catchError(() => decodeHeader(Buffer.from('RGB0', 'latin1')));
        expect(err).toMatchObject({code: 'TRUNCATED_HEADER', details: {expected: 23, actual: 4}});
    });

    it('rejects values that do not fit their field', () => {
        expect(() => encodeHeader({frameSize: 6, frameCount: 70000, portCount: 1})).toThrow(RangeError);
        expect(() => encodeHeader({frameSize: -1, frameCount: 1, portCount: 1})).toThrow(RangeError);
        expect(() => encodeHeader({frameSize: 6, frameCount: 1, portCount: 5100})).toThrow(RangeError);
        expect(() => encodeHeader({frameSize: 6, frameCount: 1, portCount: 70000})).toThrow(RangeError);
    });
});
