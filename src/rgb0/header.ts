/**
 * Fixed 23-byte header codec.
 * @module rgb0/header
 *
 * Layout (big-endian):
 * magic(4) version(4) sentinel(u32) headerEnd(u16) frameCount(u16)
 * frameSize(u32) portCount(u16) channelCount(u8)
 */
import {
    GAMMA_SIZE,
    HEADER_SIZE,
    HeaderOffset,
    PORT_ENTRY_SIZE,
    RGB0_CHANNEL_COUNT,
    RGB0_MAGIC,
    RGB0_SENTINEL,
    RGB0_VERSION,
} from './constants';
import {Rgb0Error, truncated} from './errors';
import type {Rgb0FixedHeader} from './types';
import {assertUInt} from './util';

/** Derived fields the encoder needs from the caller. */
export type HeaderParams = {
    frameSize: number;
    frameCount: number;
    portCount: number;
};

/** Offset of the last byte before frame data for a given port count. */
export const headerEndOffsetFor = (portCount: number): number =>
    HEADER_SIZE + portCount * PORT_ENTRY_SIZE + GAMMA_SIZE - 1;

/** Offset of the first frame byte for a given port count. */
export const dataOffsetFor = (portCount: number): number => headerEndOffsetFor(portCount) + 1;

/**
 * Decode the fixed header.
 * @param buf At least 23 bytes; anything past the header is ignored.
 * @throws Rgb0Error `TRUNCATED_HEADER` or `MALFORMED_HEADER`.
 */
export function decodeHeader(buf: Buffer): Rgb0FixedHeader {
    if (buf.length < HEADER_SIZE) {
        throw truncated('TRUNCATED_HEADER', 'Header', HEADER_SIZE, buf.length);
    }
    const magic = buf.toString('latin1', HeaderOffset.Magic, HeaderOffset.Magic + 4);
    if (magic !== RGB0_MAGIC) {
        throw new Rgb0Error({
            message: `Not an RGB0 capture (magic=${JSON.stringify(magic)})`,
            code: 'MALFORMED_HEADER',
            details: {magic},
        });
    }

    return Object.freeze({
        magic,
        version: buf.toString('latin1', HeaderOffset.Version, HeaderOffset.Version + 4),
        sentinel: buf.readUInt32BE(HeaderOffset.Sentinel),
        headerEndOffset: buf.readUInt16BE(HeaderOffset.HeaderEnd),
        frameCount: buf.readUInt16BE(HeaderOffset.FrameCount),
        frameSize: buf.readUInt32BE(HeaderOffset.FrameSize),
        portCount: buf.readUInt16BE(HeaderOffset.PortCount),
        channelCount: buf.readUInt8(HeaderOffset.ChannelCount),
    });
}

/**
 * Encode the fixed header with the writer's constant fields.
 * @param params Frame size, frame count and port count.
 * @throws RangeError when a value does not fit its field.
 */
export function encodeHeader(params: HeaderParams): Buffer {
    const frameSize = assertUInt(params.frameSize, 32, 'frameSize');
    const frameCount = assertUInt(params.frameCount, 16, 'frameCount');
    const portCount = assertUInt(params.portCount, 16, 'portCount');
    const headerEnd = assertUInt(headerEndOffsetFor(portCount), 16, 'headerEndOffset');

    const buf = Buffer.alloc(HEADER_SIZE);
    buf.write(RGB0_MAGIC, HeaderOffset.Magic, 'latin1');
    buf.write(RGB0_VERSION, HeaderOffset.Version, 'latin1');
    buf.writeUInt32BE(RGB0_SENTINEL, HeaderOffset.Sentinel);
    buf.writeUInt16BE(headerEnd, HeaderOffset.HeaderEnd);
    buf.writeUInt16BE(frameCount, HeaderOffset.FrameCount);
    buf.writeUInt32BE(frameSize, HeaderOffset.FrameSize);
    buf.writeUInt16BE(portCount, HeaderOffset.PortCount);
    buf.writeUInt8(RGB0_CHANNEL_COUNT, HeaderOffset.ChannelCount);
    return buf;
}
