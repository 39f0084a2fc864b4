/**
 * RGB0 capture format constants.
 * @module rgb0/constants
 *
 * All multi-byte integers in the format are big-endian.
 */

/** File signature at offset 0. */
export const RGB0_MAGIC = 'RGB0';
/** Version tag written by the encoder. Not checked when decoding. */
export const RGB0_VERSION = '1001';
/** Fixed marker at offset 8. */
export const RGB0_SENTINEL = 0xffffffff;
/** Channel count observed in every known capture. */
export const RGB0_CHANNEL_COUNT = 1;

/** Size of the fixed header (0x17). */
export const HEADER_SIZE = 23;
/** Size of one port table record (0x0D). */
export const PORT_ENTRY_SIZE = 13;
/** Number of entries in the gamma lookup table. */
export const GAMMA_ENTRIES = 256;
/** Size of the gamma lookup table in bytes. */
export const GAMMA_SIZE = GAMMA_ENTRIES * 2;
/** Bytes per LED in RGB port blocks. */
export const BYTES_PER_LED = 3;

/** Bit of the per-port control byte that marks looped playback. */
export const LOOP_FLAG_MASK = 0x80;

/**
 * Output protocol tags seen in the port table `mode` byte.
 * The codec never branches on these; they are passed through as-is.
 */
export const PortMode = {
    Dmx512: 0x03,
    SpiTtl: 0x06,
    Tm1814: 0x1b,
} as const;

/** Field layout of the fixed header. */
export const HeaderOffset = {
    Magic: 0,
    Version: 4,
    Sentinel: 8,
    HeaderEnd: 12,
    FrameCount: 14,
    FrameSize: 16,
    PortCount: 20,
    ChannelCount: 22,
} as const;

/** Field layout of one port table record. */
export const PortEntryOffset = {
    Index: 0,
    Length: 2,
    Reserved: 4,
    Mode: 8,
    Flags: 9,
    LoopByte: 11,
    Trailer: 12,
} as const;

/** Writer defaults matching captures that play on the 16-port controller. */
export const DEFAULT_WRITER_OPTIONS = {
    ledsPerPort: 1000,
    portCount: 16,
    loopByte: 0x50,
    mode: PortMode.SpiTtl,
    flags: 0x80fa,
} as const;
