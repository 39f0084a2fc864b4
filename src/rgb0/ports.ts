/**
 * Port table codec. One 13-byte record per output port:
 * index(u16) length(u16) reserved(4) mode(u8) flags(u16) loopByte(u8) reserved(1)
 * @module rgb0/ports
 */
import {LOOP_FLAG_MASK, PORT_ENTRY_SIZE, PortEntryOffset} from './constants';
import {truncated} from './errors';
import type {PortDescriptor} from './types';
import {assertUInt} from './util';

/** Parameters for a table where every port shares the same settings. */
export type UniformPortTable = {
    portCount: number;
    bytesPerPort: number;
    mode: number;
    flags: number;
    loopByte: number;
};

/**
 * Decode `portCount` port records.
 * @param buf Port table bytes.
 * @param portCount Number of records declared by the header.
 * @throws Rgb0Error `TRUNCATED_PORT_TABLE` when `buf` is short.
 */
export function decodePortTable(buf: Buffer, portCount: number): PortDescriptor[] {
    const expected = portCount * PORT_ENTRY_SIZE;
    if (buf.length < expected) {
        throw truncated('TRUNCATED_PORT_TABLE', 'Port table', expected, buf.length);
    }

    const ports: PortDescriptor[] = [];
    for (let i = 0; i < portCount; i++) {
        const off = i * PORT_ENTRY_SIZE;
        const loopByte = buf.readUInt8(off + PortEntryOffset.LoopByte);
        ports.push(
            Object.freeze({
                index: buf.readUInt16BE(off + PortEntryOffset.Index),
                length: buf.readUInt16BE(off + PortEntryOffset.Length),
                mode: buf.readUInt8(off + PortEntryOffset.Mode),
                flags: buf.readUInt16BE(off + PortEntryOffset.Flags),
                loopFlag: (loopByte & LOOP_FLAG_MASK) !== 0,
                loopByte,
            }),
        );
    }
    return ports;
}

/**
 * Encode arbitrary port records in the given order. Reserved bytes are zero.
 * @param ports Records to write; `loopFlag` is ignored in favour of `loopByte`.
 */
export function encodePortDescriptors(ports: readonly PortDescriptor[]): Buffer {
    const buf = Buffer.alloc(ports.length * PORT_ENTRY_SIZE);
    ports.forEach((port, i) => {
        const off = i * PORT_ENTRY_SIZE;
        buf.writeUInt16BE(assertUInt(port.index, 16, 'port index'), off + PortEntryOffset.Index);
        buf.writeUInt16BE(assertUInt(port.length, 16, 'port length'), off + PortEntryOffset.Length);
        buf.writeUInt8(assertUInt(port.mode, 8, 'port mode'), off + PortEntryOffset.Mode);
        buf.writeUInt16BE(assertUInt(port.flags, 16, 'port flags'), off + PortEntryOffset.Flags);
        buf.writeUInt8(assertUInt(port.loopByte, 8, 'loop byte'), off + PortEntryOffset.LoopByte);
    });
    return buf;
}

/**
 * Build the descriptors of a uniform table with indices `0..portCount-1`.
 * @param table Shared per-port settings.
 */
export function uniformPorts(table: UniformPortTable): PortDescriptor[] {
    return Array.from({length: table.portCount}, (_, index) =>
        Object.freeze({
            index,
            length: table.bytesPerPort,
            mode: table.mode,
            flags: table.flags,
            loopFlag: (table.loopByte & LOOP_FLAG_MASK) !== 0,
            loopByte: table.loopByte,
        }),
    );
}

/**
 * Encode a uniform port table.
 * @param table Port count and shared per-port settings.
 */
export function encodePortTable(table: UniformPortTable): Buffer {
    assertUInt(table.portCount, 16, 'portCount');
    return encodePortDescriptors(uniformPorts(table));
}
