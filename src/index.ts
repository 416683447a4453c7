/**
 * @file logplot Library Surface
 *
 * Building blocks for embedding the live plotter or driving it from
 * another tool.
 *
 * @module
 */

export { LineSource, lines_split, type LineSourceOptions } from './source/LineSource.js';
export {
    RowParser,
    fields_split,
    field_parse,
    type DataRecord,
    type ParseResult,
    type SkipReason,
    type TableSchema,
} from './parse/RowParser.js';
export {
    selector_parse,
    seriesSpec_build,
    type ColumnSelector,
    type SeriesSpec,
} from './series/selectors.js';
export {
    SeriesRouter,
    layout_default,
    type ResolvedSeries,
    type RoutedSample,
} from './series/SeriesRouter.js';
export { SlidingWindow } from './buffer/SlidingWindow.js';
export { WindowBuffer, DEFAULT_MAX_SAMPLES, type Sample } from './buffer/WindowBuffer.js';
export { SamplePipeline, type BatchReport } from './pipeline/SamplePipeline.js';
export {
    RenderLoop,
    type LineFeed,
    type LoopOutcome,
    type LoopState,
    type RenderLoopOptions,
    type TickReport,
} from './loop/RenderLoop.js';
export { AxisScaler, extents_compute, type AxisExtents } from './render/AxisScaler.js';
export { chart_render, type ChartModel } from './render/ChartRenderer.js';
export { TerminalSurface, type ChartSurface, type SurfaceSize } from './render/TerminalSurface.js';
export { config_load, config_resolve, configYaml_parse } from './config/settings.js';
export type { VisualizerConfig, ConfigLayer } from './config/schema.js';
export { ConfigurationError, ResourceError, VisualizerError, EXIT_CODES } from './core/errors.js';
export { Diagnostics } from './core/logging/Diagnostics.js';
export { app_run, visualizer_build } from './cli/app.js';
