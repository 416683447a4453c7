/**
 * @file Command-Line Arguments
 *
 * Hand-rolled flag parser producing the CLI configuration layer. Selector
 * flags consume every following token up to the next flag; `--flag=value`
 * is accepted everywhere. A bare positional argument is the log file.
 *
 * @module cli/args
 */

import { ConfigurationError } from '../core/errors.js';
import type { ConfigLayer } from '../config/schema.js';

export interface CliArguments {
    layer: ConfigLayer;
    configPath?: string;
    help: boolean;
}

export const USAGE: string = `Usage: logplot [options] [file]

Plot CSV rows from a growing log file in real time.

Options:
  -f, --file <path>              Path to the log file
  -x, --x-cols <col...>          Names or indices of the x-value columns.
                                 One column is shared by every y-column;
                                 several must match the number of y-columns.
                                 Default: the sample index.
  -y, --y-cols <col...>          Names or indices of the y-value columns
  -n, --max-samples <n>          Samples kept per series (default: 100)
  -s, --sleep <seconds>          Time between redraws (default: 0.05)
      --timeout <seconds>        Wait for the log file to appear (default: 10)
      --stall-ticks <n>          Quiet ticks before the chart reports STALLED (default: 20)
      --title <text>             Chart title
  -c, --config <path>            YAML configuration file
  -v, --verbose                  Show skipped-line diagnostics
  -h, --help                     Show this help

Press q or Ctrl+C to quit.
`;

/**
 * Parse argv (without the node and script entries).
 *
 * @throws ConfigurationError on unknown flags or missing values.
 */
export function argv_parse(argv: readonly string[]): CliArguments {
    const layer: ConfigLayer = {};
    const result: CliArguments = { layer, help: false };
    const tokens: string[] = argv_expand(argv);

    for (let i = 0; i < tokens.length; i++) {
        const token: string = tokens[i];
        const value_take = (): string => {
            const next: string | undefined = tokens[i + 1];
            if (next === undefined || flag_is(next)) {
                throw new ConfigurationError(token.replace(/^-+/, ''), 'missing value');
            }
            i += 1;
            return next;
        };
        const list_take = (): string[] => {
            const values: string[] = [];
            while (i + 1 < tokens.length && !flag_is(tokens[i + 1])) {
                i += 1;
                values.push(tokens[i]);
            }
            if (values.length === 0) {
                throw new ConfigurationError(token.replace(/^-+/, ''), 'expects at least one column');
            }
            return values;
        };

        switch (token) {
            case '-f':
            case '--file':
                layer.file = value_take();
                break;
            case '-x':
            case '--x-cols':
            case '--x-col':
                layer.xColumns = list_take();
                break;
            case '-y':
            case '--y-cols':
            case '--y-col':
                layer.yColumns = list_take();
                break;
            case '-n':
            case '--max-samples':
                layer.maxSamples = Number(value_take());
                break;
            case '-s':
            case '--sleep':
                layer.intervalMs = Number(value_take()) * 1000;
                break;
            case '--timeout':
                layer.fileTimeoutMs = Number(value_take()) * 1000;
                break;
            case '--stall-ticks':
                layer.stallTicks = Number(value_take());
                break;
            case '--title':
                layer.title = value_take();
                break;
            case '-c':
            case '--config':
                result.configPath = value_take();
                break;
            case '-v':
            case '--verbose':
                layer.diagnostics = true;
                break;
            case '-h':
            case '--help':
                result.help = true;
                break;
            default:
                if (flag_is(token)) {
                    throw new ConfigurationError(token.replace(/^-+/, ''), 'unknown option');
                }
                if (layer.file !== undefined) {
                    throw new ConfigurationError('file', `unexpected argument "${token}"`);
                }
                layer.file = token;
        }
    }
    return result;
}

/**
 * Split `--flag=value` into two tokens.
 */
function argv_expand(argv: readonly string[]): string[] {
    const tokens: string[] = [];
    for (const arg of argv) {
        const eq: number = arg.indexOf('=');
        if (arg.startsWith('--') && eq > 2) {
            tokens.push(arg.slice(0, eq), arg.slice(eq + 1));
        } else {
            tokens.push(arg);
        }
    }
    return tokens;
}

function flag_is(token: string): boolean {
    return /^-{1,2}[A-Za-z]/.test(token);
}
