/**
 * @file Visualizer Application
 *
 * Wires configuration, line source, pipeline, buffer, surface and render
 * loop together, runs until cancelled or failed, and maps the outcome to
 * an exit code. Signal and keyboard handling live in the entry point.
 *
 * @module cli/app
 */

import fs from 'fs';
import { WindowBuffer } from '../buffer/WindowBuffer.js';
import { config_load } from '../config/settings.js';
import type { VisualizerConfig } from '../config/schema.js';
import { EXIT_CODES, visualizerError_is } from '../core/errors.js';
import { Diagnostics } from '../core/logging/Diagnostics.js';
import { logger_create, type Logger } from '../core/logging/logger.js';
import { RenderLoop, type LoopOutcome } from '../loop/RenderLoop.js';
import { SamplePipeline } from '../pipeline/SamplePipeline.js';
import { TerminalSurface, type ChartSurface } from '../render/TerminalSurface.js';
import { seriesSpec_build, type SeriesSpec } from '../series/selectors.js';
import { LineSource } from '../source/LineSource.js';
import { argv_parse, USAGE, type CliArguments } from './args.js';
import type { EnvSource } from '../config/settings.js';

export interface AppDeps {
    env?: EnvSource;
    logger?: Logger;
    surface?: ChartSurface;
    signal?: AbortSignal;
    /** Receives the usage text for --help. */
    out?: (text: string) => void;
    clock?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

export interface Visualizer {
    loop: RenderLoop;
    diagnostics: Diagnostics;
    buffer: WindowBuffer;
}

/**
 * Build every component for one run. Selector pairing and capacity are
 * validated here, before anything touches the file.
 *
 * @throws ConfigurationError
 */
export function visualizer_build(config: VisualizerConfig, deps: AppDeps = {}): Visualizer {
    const spec: SeriesSpec = seriesSpec_build(config.xColumns, config.yColumns);
    const buffer: WindowBuffer = new WindowBuffer(config.maxSamples);
    const diagnostics: Diagnostics = new Diagnostics({ enabled: config.diagnostics });
    const loop: RenderLoop = new RenderLoop(
        {
            source: new LineSource(config.file),
            pipeline: new SamplePipeline(spec, buffer),
            buffer,
            surface: deps.surface ?? new TerminalSurface(),
            diagnostics,
            clock: deps.clock,
            sleep: deps.sleep,
        },
        {
            intervalMs: config.intervalMs,
            fileTimeoutMs: config.fileTimeoutMs,
            stallTicks: config.stallTicks,
            title: config.title,
            palette: config.palette,
            margin: config.margin,
            rescaleSpeed: config.rescaleSpeed,
        },
    );
    return { loop, diagnostics, buffer };
}

/**
 * Run the visualizer for the given argv.
 *
 * @returns Process exit code.
 */
export async function app_run(argv: readonly string[], deps: AppDeps = {}): Promise<number> {
    const log: Logger = deps.logger ?? logger_create();
    const out: (text: string) => void = deps.out ?? ((text: string): void => { process.stdout.write(text); });

    let config: VisualizerConfig;
    let visualizer: Visualizer;
    try {
        const args: CliArguments = argv_parse(argv);
        if (args.help) {
            out(USAGE);
            return EXIT_CODES.ok;
        }
        config = config_load(args.layer, args.configPath, deps.env ?? process.env);
        visualizer = visualizer_build(config, deps);
    } catch (e: unknown) {
        if (visualizerError_is(e)) {
            log.error(`Invalid configuration, ${e.message}`);
            return EXIT_CODES[e.kind];
        }
        throw e;
    }

    log.info(`Log file: ${config.file}`);
    if (!fs.existsSync(config.file)) {
        log.info('Waiting for log file...');
    }

    const outcome: LoopOutcome = await visualizer.loop.run(deps.signal);
    if (outcome.kind === 'failed') {
        log.error(outcome.error.message);
        return EXIT_CODES[outcome.error.kind];
    }

    if (config.diagnostics) {
        const summary = visualizer.diagnostics.summary_get();
        if (summary.skipped > 0) {
            const reasons: string = Object.entries(summary.byReason)
                .map(([reason, count]): string => `${reason}=${count}`)
                .join(', ');
            log.warn(`Skipped ${summary.skipped} line(s): ${reasons}`);
        }
    }
    log.success(`Stopped after ${outcome.ticks} tick(s), ${visualizer.buffer.total_get()} sample(s) plotted.`);
    return EXIT_CODES.ok;
}
