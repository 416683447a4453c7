/**
 * @file LineSource Property Tests
 *
 * Invariants under test, for any content appended in arbitrary chunks:
 *   1. Every poll returns exactly the lines completed since the last poll.
 *   2. No complete line is ever returned twice or skipped.
 *   3. A line split across writes is returned once, fully reconstructed.
 */

import { afterAll, beforeAll, describe, it } from 'vitest';
import * as fc from 'fast-check';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { LineSource } from './LineSource.js';

// ─── Arbitraries ──────────────────────────────────────────────────────────────

const lineText = fc.stringOf(fc.constantFrom('a', 'Z', '1', '9', ',', '.', '-', ' ', 'é'), { maxLength: 10 });
const lineList = fc.array(lineText, { maxLength: 12 });
const cutList = fc.array(fc.nat({ max: 400 }), { maxLength: 8 });

// ─── Properties ──────────────────────────────────────────────────────────────

describe('LineSource — property invariants', (): void => {
    let dir: string;
    let run: number = 0;

    beforeAll((): void => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'logplot-prop-'));
    });

    afterAll((): void => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('returns each complete line exactly once, in order, whatever the write chunking', (): void => {
        fc.assert(fc.property(lineList, cutList, (lines: string[], cuts: number[]): boolean => {
            run += 1;
            const file: string = path.join(dir, `log-${run}.txt`);
            const content: Buffer = Buffer.from(lines.map((line: string): string => `${line}\n`).join(''), 'utf-8');
            const boundaries: number[] = Array.from(new Set(cuts.map((cut: number): number => cut % (content.length + 1))))
                .sort((a: number, b: number): number => a - b);
            boundaries.push(content.length);

            const source: LineSource = new LineSource(file);
            const collected: string[] = [];
            let written: number = 0;
            let ok: boolean = true;
            fs.writeFileSync(file, '');

            for (const boundary of boundaries) {
                fs.appendFileSync(file, content.subarray(written, boundary));
                written = boundary;
                collected.push(...source.poll());

                const completeInPrefix: number = content.subarray(0, written).filter((byte: number): boolean => byte === 0x0a).length;
                if (collected.length !== completeInPrefix) ok = false;
            }
            source.close();

            return ok && JSON.stringify(collected) === JSON.stringify(lines);
        }), { numRuns: 60 });
    });
});
