/**
 * @file Visualizer Configuration Schemas
 *
 * Zod schemas for one configuration layer (CLI flags, YAML file, env) and
 * for the fully resolved configuration. Layers are partial and strict;
 * the resolved schema fills defaults.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { DEFAULT_MAX_SAMPLES } from '../buffer/WindowBuffer.js';
import { DEFAULT_PALETTE } from '../render/palette.js';

// ─── Fields ──────────────────────────────────────────────────────────────────

const SelectorSchema = z.union([z.string().min(1), z.number().int().nonnegative()]);

const FIELDS = {
    file:          z.string().min(1, 'log file path is required'),
    xColumns:      z.array(SelectorSchema),
    yColumns:      z.array(SelectorSchema),
    maxSamples:    z.number().int().positive(),
    intervalMs:    z.number().positive(),
    fileTimeoutMs: z.number().nonnegative(),
    stallTicks:    z.number().int().positive(),
    margin:        z.number().min(0).max(1),
    rescaleSpeed:  z.number().gt(0).max(1),
    palette:       z.array(z.string().regex(/^#[0-9a-fA-F]{6}$/, 'palette entries must be #rrggbb')).min(1),
    title:         z.string(),
    diagnostics:   z.boolean(),
};

// ─── Layer & Resolved ────────────────────────────────────────────────────────

/** One source of settings; every key optional, unknown keys rejected. */
export const ConfigLayerSchema = z.object(FIELDS).partial().strict();

export const VisualizerConfigSchema = z.object({
    file:          FIELDS.file,
    xColumns:      FIELDS.xColumns.default([]),
    yColumns:      FIELDS.yColumns.default([]),
    maxSamples:    FIELDS.maxSamples.default(DEFAULT_MAX_SAMPLES),
    intervalMs:    FIELDS.intervalMs.default(50),
    fileTimeoutMs: FIELDS.fileTimeoutMs.default(10_000),
    stallTicks:    FIELDS.stallTicks.default(20),
    margin:        FIELDS.margin.default(0.05),
    rescaleSpeed:  FIELDS.rescaleSpeed.default(0.9),
    palette:       FIELDS.palette.default([...DEFAULT_PALETTE]),
    title:         FIELDS.title.default('Log Visualizer'),
    diagnostics:   FIELDS.diagnostics.default(false),
});

export type ConfigLayer = z.infer<typeof ConfigLayerSchema>;
export type VisualizerConfig = z.infer<typeof VisualizerConfigSchema>;
export type ConfigKey = keyof VisualizerConfig;

/** Operator-facing option names, used in error messages. */
export const OPTION_NAMES: Record<ConfigKey, string> = {
    file:          'file',
    xColumns:      'x-cols',
    yColumns:      'y-cols',
    maxSamples:    'max-samples',
    intervalMs:    'sleep',
    fileTimeoutMs: 'timeout',
    stallTicks:    'stall-ticks',
    margin:        'margin',
    rescaleSpeed:  'rescale-speed',
    palette:       'palette',
    title:         'title',
    diagnostics:   'verbose',
};
