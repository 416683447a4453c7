/**
 * @file Visualizer Settings
 *
 * Layered configuration with deterministic precedence
 * (CLI flags > YAML config file > environment > defaults) and central
 * validation. Every violation becomes a ConfigurationError naming the
 * operator-facing option.
 *
 * @module config/settings
 */

import fs from 'fs';
import yaml from 'js-yaml';
import type { ZodError, ZodIssue } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import {
    ConfigLayerSchema,
    OPTION_NAMES,
    VisualizerConfigSchema,
    type ConfigKey,
    type ConfigLayer,
    type VisualizerConfig,
} from './schema.js';

export type EnvSource = Record<string, string | undefined>;

/** Environment variables recognised per setting. */
export const ENV_KEYS = {
    file: 'LOGPLOT_FILE',
    maxSamples: 'LOGPLOT_MAX_SAMPLES',
    intervalMs: 'LOGPLOT_INTERVAL_MS',
    fileTimeoutMs: 'LOGPLOT_TIMEOUT_MS',
    diagnostics: 'LOGPLOT_DIAGNOSTICS',
    config: 'LOGPLOT_CONFIG',
} as const;

/**
 * Read the environment layer. Numeric values that do not parse are kept
 * as NaN so validation reports them.
 */
export function envLayer_read(env: EnvSource): ConfigLayer {
    const layer: ConfigLayer = {};
    const file: string | undefined = env[ENV_KEYS.file];
    if (file) layer.file = file;

    const maxSamples: number | undefined = envNumeric_resolve(env, ENV_KEYS.maxSamples);
    if (maxSamples !== undefined) layer.maxSamples = maxSamples;

    const intervalMs: number | undefined = envNumeric_resolve(env, ENV_KEYS.intervalMs);
    if (intervalMs !== undefined) layer.intervalMs = intervalMs;

    const fileTimeoutMs: number | undefined = envNumeric_resolve(env, ENV_KEYS.fileTimeoutMs);
    if (fileTimeoutMs !== undefined) layer.fileTimeoutMs = fileTimeoutMs;

    const diagnostics: string | undefined = env[ENV_KEYS.diagnostics];
    if (diagnostics) layer.diagnostics = ['1', 'true', 'yes', 'on'].includes(diagnostics.trim().toLowerCase());

    return layer;
}

/**
 * Parse a YAML configuration document into a validated layer.
 */
export function configYaml_parse(content: string, source: string = 'config'): ConfigLayer {
    let raw: unknown;
    try {
        raw = yaml.load(content);
    } catch (e: unknown) {
        throw new ConfigurationError('config', `${source} is not valid YAML: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (raw === undefined || raw === null) return {};

    const result = ConfigLayerSchema.safeParse(raw);
    if (!result.success) {
        throw zodError_convert(result.error, source);
    }
    return result.data;
}

/**
 * Load a YAML configuration file.
 */
export function configFile_load(filePath: string): ConfigLayer {
    let content: string;
    try {
        content = fs.readFileSync(filePath, 'utf-8');
    } catch (e: unknown) {
        throw new ConfigurationError('config', `cannot read ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
    }
    return configYaml_parse(content, filePath);
}

/**
 * Merge layers (lowest precedence first) and validate the result.
 */
export function config_resolve(layers: readonly ConfigLayer[]): VisualizerConfig {
    const merged: Record<string, unknown> = {};
    for (const layer of layers) {
        for (const [key, value] of Object.entries(layer)) {
            if (value !== undefined) merged[key] = value;
        }
    }

    const result = VisualizerConfigSchema.safeParse(merged);
    if (!result.success) {
        throw zodError_convert(result.error);
    }
    return result.data;
}

/**
 * Resolve the effective configuration from every source.
 *
 * @param cli - Layer parsed from command-line flags.
 * @param configPath - YAML file given on the command line, if any.
 * @param env - Process environment.
 */
export function config_load(cli: ConfigLayer, configPath: string | undefined, env: EnvSource): VisualizerConfig {
    const layers: ConfigLayer[] = [envLayer_read(env)];
    const filePath: string | undefined = configPath ?? env[ENV_KEYS.config];
    if (filePath) {
        layers.push(configFile_load(filePath));
    }
    layers.push(cli);
    return config_resolve(layers);
}

function envNumeric_resolve(env: EnvSource, key: string): number | undefined {
    const raw: string | undefined = env[key];
    if (raw === undefined || raw.trim() === '') return undefined;
    return Number(raw);
}

/**
 * Report the first zod issue as a ConfigurationError on its option.
 */
function zodError_convert(error: ZodError, source?: string): ConfigurationError {
    const issue: ZodIssue | undefined = error.issues[0];
    if (issue === undefined) {
        return new ConfigurationError('config', 'invalid configuration');
    }
    const head: string | number | undefined = issue.path[0];
    const option: string = typeof head === 'string' && configKey_is(head)
        ? OPTION_NAMES[head]
        : String(head ?? 'config');
    const where: string = source ? ` (in ${source})` : '';
    return new ConfigurationError(option, `${issue.message}${where}`);
}

function configKey_is(key: string): key is ConfigKey {
    return Object.prototype.hasOwnProperty.call(OPTION_NAMES, key);
}
