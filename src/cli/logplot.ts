#!/usr/bin/env node
/**
 * @file logplot Entry Point
 *
 * Thin entry point: turns SIGINT/SIGTERM and the `q` key into one abort
 * signal, then runs the visualizer.
 *
 * Usage:
 *   npx tsx src/cli/logplot.ts logging/log.txt
 *   npx tsx src/cli/logplot.ts -f logging/log.txt -x 0 -y 1 2 -n 200
 *
 * @module
 */

import * as readline from 'readline';
import { app_run } from './app.js';

interface KeypressInfo {
    name?: string;
    ctrl?: boolean;
}

const controller: AbortController = new AbortController();
const abort = (): void => controller.abort();

process.once('SIGINT', abort);
process.once('SIGTERM', abort);

const keyboardEnabled: boolean = process.stdin.isTTY === true && process.stdout.isTTY === true;
const onKeypress = (_input: string | undefined, key: KeypressInfo | undefined): void => {
    if (key?.name === 'q' || (key?.ctrl === true && key.name === 'c')) abort();
};

if (keyboardEnabled) {
    readline.emitKeypressEvents(process.stdin);
    process.stdin.setRawMode(true);
    process.stdin.on('keypress', onKeypress);
}

/**
 * Restore stdin so the process can exit.
 */
function keyboard_release(): void {
    if (!keyboardEnabled) return;
    process.stdin.off('keypress', onKeypress);
    process.stdin.setRawMode(false);
    process.stdin.pause();
}

app_run(process.argv.slice(2), { signal: controller.signal })
    .then((code: number): void => {
        keyboard_release();
        process.exit(code);
    })
    .catch((e: unknown): void => {
        keyboard_release();
        console.error(`Fatal error: ${e instanceof Error ? e.message : String(e)}`);
        process.exit(1);
    });
