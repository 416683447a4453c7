/**
 * @file Terminal Surface
 *
 * Render target for chart frames. The terminal implementation owns the
 * alternate screen buffer and cursor visibility; anything that can show
 * lines of text can implement ChartSurface.
 *
 * @module render/TerminalSurface
 */

import { ResourceError } from '../core/errors.js';

export interface SurfaceSize {
    width: number;
    height: number;
}

/**
 * Redraw contract used by the render loop.
 */
export interface ChartSurface {
    open(): void;
    size_get(): SurfaceSize;
    draw(lines: readonly string[]): void;
    close(): void;
}

/** Escape sequences the surface emits. */
export const ESCAPES = {
    altScreenEnter: '\x1b[?1049h',
    altScreenLeave: '\x1b[?1049l',
    hideCursor: '\x1b[?25l',
    showCursor: '\x1b[?25h',
    home: '\x1b[H',
    clearLineEnd: '\x1b[K',
    clearScreenEnd: '\x1b[J',
} as const;

export const MIN_SURFACE_SIZE: SurfaceSize = { width: 30, height: 10 };

/**
 * Minimal writable terminal stream (process.stdout in production).
 */
export interface TerminalStream {
    write(chunk: string): boolean;
    isTTY?: boolean;
    columns?: number;
    rows?: number;
}

export class TerminalSurface implements ChartSurface {
    private readonly stream: TerminalStream;
    private readonly fallbackSize: SurfaceSize;
    private opened: boolean = false;
    private lastPlainFrame: string | null = null;

    constructor(stream: TerminalStream = process.stdout, fallbackSize: SurfaceSize = { width: 80, height: 24 }) {
        this.stream = stream;
        this.fallbackSize = fallbackSize;
    }

    /**
     * Enter the alternate screen.
     *
     * @throws ResourceError when the terminal is too small for a chart.
     */
    public open(): void {
        if (this.opened) return;
        const size: SurfaceSize = this.size_get();
        if (size.width < MIN_SURFACE_SIZE.width || size.height < MIN_SURFACE_SIZE.height) {
            throw new ResourceError(
                'terminal',
                `Terminal is ${size.width}x${size.height}; at least ${MIN_SURFACE_SIZE.width}x${MIN_SURFACE_SIZE.height} is needed to draw the chart`,
            );
        }
        if (this.isInteractive()) {
            this.stream.write(`${ESCAPES.altScreenEnter}${ESCAPES.hideCursor}`);
        }
        this.opened = true;
    }

    public size_get(): SurfaceSize {
        return {
            width: this.stream.columns ?? this.fallbackSize.width,
            height: this.stream.rows ?? this.fallbackSize.height,
        };
    }

    /**
     * Replace the visible frame. Non-interactive output gets plain frames
     * separated by a blank line, written only when the frame changed.
     */
    public draw(lines: readonly string[]): void {
        if (!this.opened) return;
        if (!this.isInteractive()) {
            const frame: string = `${lines.join('\n')}\n\n`;
            if (frame === this.lastPlainFrame) return;
            this.lastPlainFrame = frame;
            this.stream.write(frame);
            return;
        }
        const body: string = lines.map((line: string): string => `${line}${ESCAPES.clearLineEnd}`).join('\n');
        this.stream.write(`${ESCAPES.home}${body}${ESCAPES.clearScreenEnd}`);
    }

    /**
     * Restore the terminal. Safe to call repeatedly.
     */
    public close(): void {
        if (!this.opened) return;
        this.opened = false;
        this.lastPlainFrame = null;
        if (this.isInteractive()) {
            this.stream.write(`${ESCAPES.showCursor}${ESCAPES.altScreenLeave}`);
        }
    }

    private isInteractive(): boolean {
        return this.stream.isTTY === true;
    }
}
