/**
 * @file Visualizer Error Taxonomy
 *
 * Fatal conditions raised by the pipeline. Transient data problems
 * (malformed lines, schema mismatches) are NOT errors: they surface as
 * parser skip results and never leave the tick that produced them.
 *
 * @module core/errors
 */

export type VisualizerErrorKind = 'configuration' | 'resource';

/**
 * Base class for every fatal visualizer condition.
 */
export abstract class VisualizerError extends Error {
    public abstract readonly kind: VisualizerErrorKind;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * A configured option cannot be honoured (bad selector, invalid capacity,
 * mismatched selector lists). Raised before streaming begins.
 */
export class ConfigurationError extends VisualizerError {
    public readonly kind = 'configuration' as const;
    public readonly option: string;

    constructor(option: string, message: string) {
        super(`${option}: ${message}`);
        this.option = option;
    }
}

/**
 * The log file never appeared, could not be read, or the render surface
 * could not be created.
 */
export class ResourceError extends VisualizerError {
    public readonly kind = 'resource' as const;
    public readonly resource: string;

    constructor(resource: string, message: string) {
        super(message);
        this.resource = resource;
    }
}

/**
 * Narrow an unknown thrown value to a fatal visualizer error.
 */
export function visualizerError_is(value: unknown): value is VisualizerError {
    return value instanceof VisualizerError;
}

/** Process exit codes per outcome. */
export const EXIT_CODES = {
    ok: 0,
    resource: 1,
    configuration: 2,
} as const;
