/**
 * RGB0 data model.
 * @module rgb0/types
 */

/** One output port record from the port table. */
export type PortDescriptor = {
    /** Port identifier (u16), unique within a file. */
    readonly index: number;
    /** Bytes this port contributes to every frame (u16). */
    readonly length: number;
    /** Output protocol tag (u8), see `PortMode`. */
    readonly mode: number;
    /** Opaque per-port flags word (u16). */
    readonly flags: number;
    /** `true` when bit 7 of the control byte is set. */
    readonly loopFlag: boolean;
    /** Raw control byte the loop flag was taken from. */
    readonly loopByte: number;
};

/** Decoded or constructed file header, including port and gamma tables. */
export type Rgb0Header = {
    readonly magic: string;
    readonly version: string;
    readonly sentinel: number;
    /** Offset of the last header/gamma byte; frame data starts one byte later. */
    readonly headerEndOffset: number;
    /** Declared frame count. `0` means unknown. */
    readonly frameCount: number;
    /** Bytes per frame. Equals the sum of all port lengths in a well-formed file. */
    readonly frameSize: number;
    readonly portCount: number;
    readonly channelCount: number;
    /** Port records; their order defines the byte layout of a frame. */
    readonly ports: readonly PortDescriptor[];
    /** 256 u16 entries. */
    readonly gammaLut: readonly number[];
};

/** Fields of the fixed 23-byte header without the tables that follow it. */
export type Rgb0FixedHeader = Omit<Rgb0Header, 'ports' | 'gammaLut'>;

/** A decoded capture: one header and the complete frames that were present. */
export type Rgb0File = {
    readonly header: Rgb0Header;
    readonly frames: readonly Buffer[];
};

/** One LED color. Components are truncated to 8 bits on write. */
export type RgbTriplet = {
    r: number;
    g: number;
    b: number;
};

/** LED colors for one port in one frame. */
export type PortPixels = readonly RgbTriplet[];
/** Port blocks for one frame, in port table order. */
export type FramePixels = readonly PortPixels[];

/** Location of a port's block inside a frame. */
export type PortSpan = {
    offset: number;
    length: number;
};

/** Options for `parseRgb0` and `readRgb0File`. */
export type ReadOptions = {
    /** Stop after this many frames, regardless of the declared frame count. */
    maxFrames?: number;
    /** Reject files whose port table breaks the layout invariants. */
    strict?: boolean;
};

/** Options for `encodeRgb0`. Missing fields fall back to `DEFAULT_WRITER_OPTIONS`. */
export type WriterOptions = {
    /** RGB LEDs per port. Defaults to `1000` (six DMX universes worth of pixels). */
    ledsPerPort?: number;
    /** Ports per frame. Defaults to `16`, the 16-port SD controller profile. */
    portCount?: number;
    /** Optional 256-entry gamma table. Defaults to identity. */
    gamma?: readonly number[];
    /** Per-port control byte. Defaults to `0x50`. */
    loopByte?: number;
    /** Per-port output mode. Defaults to SPI/TTL (`0x06`). */
    mode?: number;
    /** Per-port flags word. Defaults to `0x80FA`. */
    flags?: number;
};

/** Options for `writeRgb0File`. */
export type WriteFileOptions = WriterOptions & {
    /** Run number used in the output file name. Defaults to `1`. */
    runNumber?: number;
};
