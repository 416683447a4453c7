/**
 * @file Line Source
 *
 * Incremental reader over an append-only log file that another process is
 * writing to. Only newline-terminated lines are ever returned; the byte
 * offset stops at the end of the last complete line, so a partial write is
 * simply re-read on a later poll once it has been terminated.
 *
 * @module source/LineSource
 */

import fs from 'fs';
import { ResourceError } from '../core/errors.js';

const NEWLINE: number = 0x0a;
const CARRIAGE_RETURN: number = 0x0d;

export interface LineSourceOptions {
    /** Read chunk size in bytes. */
    chunkBytes?: number;
}

/**
 * Tail-follower for a growing text file.
 */
export class LineSource {
    public readonly path: string;
    private readonly chunkBytes: number;
    private fd: number | null = null;
    private inode: number | null = null;
    private offset: number = 0;
    private resets: number = 0;

    constructor(path: string, options: LineSourceOptions = {}) {
        this.path = path;
        this.chunkBytes = options.chunkBytes ?? 64 * 1024;
    }

    /**
     * Return every line completed since the previous poll.
     *
     * A missing file or an unchanged file yields an empty list.
     *
     * @throws ResourceError when the file exists but cannot be read.
     */
    public poll(): string[] {
        if (!this.file_ensureOpen()) return [];
        this.rotation_check();
        if (this.fd === null) return [];

        const size: number = this.fd_stat(this.fd).size;
        if (size < this.offset) {
            this.offset = 0;
            this.resets += 1;
        }
        if (size === this.offset) return [];

        const pending: Buffer = this.bytes_read(this.fd, this.offset, size - this.offset);
        const lastNewline: number = pending.lastIndexOf(NEWLINE);
        if (lastNewline < 0) return [];

        const complete: Buffer = pending.subarray(0, lastNewline + 1);
        this.offset += complete.length;
        return lines_split(complete);
    }

    public isOpen(): boolean {
        return this.fd !== null;
    }

    /** Byte offset just past the last consumed newline. */
    public offset_get(): number {
        return this.offset;
    }

    /** Number of truncations or rotations observed. */
    public resets_get(): number {
        return this.resets;
    }

    /**
     * Release the file handle. Safe to call repeatedly.
     */
    public close(): void {
        if (this.fd === null) return;
        const fd: number = this.fd;
        this.fd = null;
        this.inode = null;
        fs.closeSync(fd);
    }

    /**
     * Open the file if it exists.
     *
     * @returns False while the file has not appeared yet.
     */
    private file_ensureOpen(): boolean {
        if (this.fd !== null) return true;
        try {
            this.fd = fs.openSync(this.path, 'r');
        } catch (e: unknown) {
            if (errno_is(e, 'ENOENT')) return false;
            throw new ResourceError(this.path, `Cannot open log file ${this.path}: ${error_message(e)}`);
        }
        this.inode = this.fd_stat(this.fd).ino;
        this.offset = 0;
        return true;
    }

    /**
     * Re-open from the start when the path now names a different file.
     */
    private rotation_check(): void {
        let current: fs.Stats;
        try {
            current = fs.statSync(this.path);
        } catch (e: unknown) {
            if (errno_is(e, 'ENOENT')) return;
            throw new ResourceError(this.path, `Cannot stat log file ${this.path}: ${error_message(e)}`);
        }
        if (this.inode === null || current.ino === this.inode) return;

        this.close();
        this.resets += 1;
        this.file_ensureOpen();
    }

    private fd_stat(fd: number): fs.Stats {
        try {
            return fs.fstatSync(fd);
        } catch (e: unknown) {
            throw new ResourceError(this.path, `Cannot stat log file ${this.path}: ${error_message(e)}`);
        }
    }

    private bytes_read(fd: number, position: number, length: number): Buffer {
        const target: Buffer = Buffer.alloc(length);
        let filled: number = 0;
        while (filled < length) {
            const want: number = Math.min(this.chunkBytes, length - filled);
            let got: number;
            try {
                got = fs.readSync(fd, target, filled, want, position + filled);
            } catch (e: unknown) {
                throw new ResourceError(this.path, `Cannot read log file ${this.path}: ${error_message(e)}`);
            }
            if (got === 0) break;
            filled += got;
        }
        return target.subarray(0, filled);
    }
}

/**
 * Split newline-terminated bytes into decoded lines (CRLF tolerated).
 */
export function lines_split(bytes: Buffer): string[] {
    const lines: string[] = [];
    let start: number = 0;
    for (let i = 0; i < bytes.length; i++) {
        if (bytes[i] !== NEWLINE) continue;
        const end: number = i > start && bytes[i - 1] === CARRIAGE_RETURN ? i - 1 : i;
        lines.push(bytes.subarray(start, end).toString('utf-8'));
        start = i + 1;
    }
    return lines;
}

function errno_is(e: unknown, code: string): boolean {
    return e instanceof Error && 'code' in e && e.code === code;
}

function error_message(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
