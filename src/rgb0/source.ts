/**
 * Forward-only byte sources consumed by the reader.
 * @module rgb0/source
 */
import {closeSync, fstatSync, openSync, readSync} from 'fs';

/** Largest length a single `readSync` call accepts. */
const MAX_READ_CHUNK = 0x7fffffff;

/** Sequential reader. `read` never seeks backwards. */
export type ByteSource = {
    /**
     * Read up to `length` bytes.
     * @returns Fewer than `length` bytes only at end of input.
     */
    read(length: number): Buffer;
    /** Release the underlying resource. Safe to call more than once. */
    close(): void;
};

/** Byte source over an in-memory buffer. */
export class BufferSource implements ByteSource {
    private position = 0;

    constructor(private readonly buffer: Uint8Array) {}

    public read(length: number): Buffer {
        const end = Math.min(this.position + length, this.buffer.length);
        const chunk = Buffer.from(this.buffer.subarray(this.position, end));
        this.position = end;
        return chunk;
    }

    public close(): void {
        this.position = this.buffer.length;
    }
}

/** Byte source over a file descriptor opened for reading. */
export class FileSource implements ByteSource {
    private fd: number | null;
    private readonly size: number;
    private position = 0;

    /**
     * Open a file for sequential reading.
     * @param path File path.
     */
    constructor(path: string) {
        const fd = openSync(path, 'r');
        try {
            this.size = fstatSync(fd).size;
        } catch (err) {
            closeSync(fd);
            throw err;
        }
        this.fd = fd;
    }

    /** Reads never allocate more than what is left in the file. */
    public read(length: number): Buffer {
        if (this.fd === null) {
            throw new Error('FileSource is closed');
        }
        const wanted = Math.max(0, Math.min(length, this.size - this.position));
        const chunk = Buffer.alloc(wanted);
        let filled = 0;
        while (filled < wanted) {
            const step = Math.min(wanted - filled, MAX_READ_CHUNK);
            const bytesRead = readSync(this.fd, chunk, filled, step, null);
            if (bytesRead === 0) break;
            filled += bytesRead;
        }
        this.position += filled;
        return filled === wanted ? chunk : chunk.subarray(0, filled);
    }

    public close(): void {
        if (this.fd === null) return;
        const fd = this.fd;
        this.fd = null;
        closeSync(fd);
    }
}
