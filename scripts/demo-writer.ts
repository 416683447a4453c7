#!/usr/bin/env npx tsx
/**
 * @file Demo Log Writer
 *
 * Stand-in for a device capture: appends a header and one CSV row every
 * period to a log file, tracing a noisy heart curve together with its
 * exponentially smoothed copy. Run it next to the plotter:
 *
 *   npx tsx scripts/demo-writer.ts logging/log_demo.txt
 *   npx tsx src/cli/logplot.ts logging/log_demo.txt -x 0 2 -y 1 3
 *
 * Options: --period <ms> (default 20), --noise <amplitude> (default 1.5).
 *
 * @module
 */

import fs from 'fs';
import path from 'path';

interface CurvePoint {
    x: number;
    y: number;
}

const ALPHA: number = 0.1;

/**
 * Heart curve at parameter t, with uniform noise on both axes.
 */
function heart_sample(t: number, noise: number): CurvePoint {
    const x: number = 16 * Math.sin(t) ** 3;
    const y: number = 13 * Math.cos(t) - 5 * Math.cos(2 * t) - 2 * Math.cos(3 * t) - Math.cos(4 * t);
    const jitter = (): number => (noise === 0 ? 0 : (Math.random() * 2 - 1) * noise);
    return { x: x + jitter(), y: y + jitter() };
}

function args_parse(argv: string[]): { file: string; periodMs: number; noise: number } {
    let file: string = 'logging/log_demo.txt';
    let periodMs: number = 20;
    let noise: number = 1.5;
    for (let i = 0; i < argv.length; i++) {
        if (argv[i] === '--period' && argv[i + 1]) {
            periodMs = Number.parseInt(argv[++i], 10);
        } else if (argv[i] === '--noise' && argv[i + 1]) {
            noise = Number.parseFloat(argv[++i]);
        } else {
            file = argv[i];
        }
    }
    return { file, periodMs, noise };
}

const options = args_parse(process.argv.slice(2));
fs.mkdirSync(path.dirname(path.resolve(options.file)), { recursive: true });
fs.writeFileSync(options.file, 'x(t), y(t), x_s(t), y_s(t)\n', 'utf-8');
console.log(`Writing demo rows to ${options.file} every ${options.periodMs} ms. Ctrl+C to stop.`);

const startedAt: number = Date.now();
let smoothed: CurvePoint | null = null;

const timer: NodeJS.Timeout = setInterval((): void => {
    const t: number = (Date.now() - startedAt) / 1000;
    const raw: CurvePoint = heart_sample(t, options.noise);
    smoothed = smoothed === null
        ? raw
        : { x: ALPHA * raw.x + (1 - ALPHA) * smoothed.x, y: ALPHA * raw.y + (1 - ALPHA) * smoothed.y };
    const row: string = [raw.x, raw.y, smoothed.x, smoothed.y].map((v: number): string => v.toFixed(3)).join(',');
    fs.appendFileSync(options.file, `${row}\n`, 'utf-8');
}, options.periodMs);

process.on('SIGINT', (): void => {
    clearInterval(timer);
    console.log('\nDemo writer stopped.');
    process.exit(0);
});
