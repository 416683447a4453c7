import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigurationError } from '../core/errors.js';
import { DEFAULT_PALETTE } from '../render/palette.js';
import { configFile_load, configYaml_parse, config_load, config_resolve, envLayer_read } from './settings.js';

function configError_capture(fn: () => unknown): ConfigurationError {
    try {
        fn();
    } catch (e: unknown) {
        if (e instanceof ConfigurationError) return e;
        throw e;
    }
    throw new Error('expected a ConfigurationError');
}

describe('config_resolve', (): void => {
    it('fills every default around the required file', (): void => {
        expect(config_resolve([{ file: 'log.txt' }])).toEqual({
            file: 'log.txt',
            xColumns: [],
            yColumns: [],
            maxSamples: 100,
            intervalMs: 50,
            fileTimeoutMs: 10000,
            stallTicks: 20,
            margin: 0.05,
            rescaleSpeed: 0.9,
            palette: [...DEFAULT_PALETTE],
            title: 'Log Visualizer',
            diagnostics: false,
        });
    });

    it('lets later layers win and ignores undefined values', (): void => {
        const config = config_resolve([
            { file: 'a.txt', maxSamples: 10 },
            { maxSamples: 20, title: undefined },
        ]);
        expect(config.maxSamples).toBe(20);
        expect(config.file).toBe('a.txt');
        expect(config.title).toBe('Log Visualizer');
    });

    it('requires a log file', (): void => {
        expect(configError_capture((): unknown => config_resolve([{}])).option).toBe('file');
    });

    it('names the operator-facing option of an invalid value', (): void => {
        expect(configError_capture((): unknown => config_resolve([{ file: 'a', maxSamples: 0 }])).option).toBe('max-samples');
        expect(configError_capture((): unknown => config_resolve([{ file: 'a', intervalMs: -5 }])).option).toBe('sleep');
        expect(configError_capture((): unknown => config_resolve([{ file: 'a', rescaleSpeed: 0 }])).option).toBe('rescale-speed');
    });
});

describe('envLayer_read', (): void => {
    it('reads the recognised variables', (): void => {
        expect(envLayer_read({
            LOGPLOT_FILE: 'env.txt',
            LOGPLOT_MAX_SAMPLES: '250',
            LOGPLOT_INTERVAL_MS: '20',
            LOGPLOT_TIMEOUT_MS: '0',
            LOGPLOT_DIAGNOSTICS: 'Yes',
            UNRELATED: 'x',
        })).toEqual({ file: 'env.txt', maxSamples: 250, intervalMs: 20, fileTimeoutMs: 0, diagnostics: true });
    });

    it('treats unrecognised flag values as false and blank numbers as unset', (): void => {
        expect(envLayer_read({ LOGPLOT_DIAGNOSTICS: 'off', LOGPLOT_MAX_SAMPLES: ' ' })).toEqual({ diagnostics: false });
    });

    it('keeps unparsable numbers so validation rejects them', (): void => {
        const layer = envLayer_read({ LOGPLOT_MAX_SAMPLES: 'lots' });
        expect(Number.isNaN(layer.maxSamples)).toBe(true);
        expect(configError_capture((): unknown => config_resolve([{ file: 'a' }, layer])).option).toBe('max-samples');
    });
});

describe('configYaml_parse', (): void => {
    it('reads a YAML layer', (): void => {
        const layer = configYaml_parse('file: run.txt\nyColumns: [1, voltage]\ndiagnostics: true\n', 'test.yaml');
        expect(layer).toEqual({ file: 'run.txt', yColumns: [1, 'voltage'], diagnostics: true });
    });

    it('treats an empty document as an empty layer', (): void => {
        expect(configYaml_parse('', 'test.yaml')).toEqual({});
    });

    it('rejects unknown keys', (): void => {
        expect(configError_capture((): unknown => configYaml_parse('bogus: 1\n', 'test.yaml')).option).toBe('config');
    });

    it('reports invalid values with their source', (): void => {
        const error: ConfigurationError = configError_capture((): unknown => configYaml_parse('palette: [red]\n', 'test.yaml'));
        expect(error.message).toBe('palette: palette entries must be #rrggbb (in test.yaml)');
    });

    it('reports malformed YAML', (): void => {
        const error: ConfigurationError = configError_capture((): unknown => configYaml_parse('file: [unclosed\n', 'test.yaml'));
        expect(error.option).toBe('config');
        expect(error.message.startsWith('config: test.yaml is not valid YAML')).toBe(true);
    });
});

describe('config_load', (): void => {
    let dir: string;
    let configPath: string;

    beforeEach((): void => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'logplot-config-'));
        configPath = path.join(dir, 'logplot.yaml');
        fs.writeFileSync(configPath, 'file: from-yaml.txt\nmaxSamples: 20\n');
    });

    afterEach((): void => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('applies CLI over file over environment', (): void => {
        const env = { LOGPLOT_MAX_SAMPLES: '10', LOGPLOT_FILE: 'from-env.txt' };

        expect(config_load({ maxSamples: 30 }, configPath, env).maxSamples).toBe(30);
        expect(config_load({}, configPath, env).maxSamples).toBe(20);
        expect(config_load({}, undefined, env).maxSamples).toBe(10);
        expect(config_load({}, configPath, env).file).toBe('from-yaml.txt');
        expect(config_load({ file: 'cli.txt' }, configPath, env).file).toBe('cli.txt');
    });

    it('finds the config file through the environment', (): void => {
        expect(config_load({}, undefined, { LOGPLOT_CONFIG: configPath }).file).toBe('from-yaml.txt');
    });

    it('reports an unreadable config file', (): void => {
        const error: ConfigurationError = configError_capture((): unknown => configFile_load(path.join(dir, 'missing.yaml')));
        expect(error.option).toBe('config');
        expect(error.message.startsWith(`config: cannot read ${path.join(dir, 'missing.yaml')}`)).toBe(true);
    });
});
