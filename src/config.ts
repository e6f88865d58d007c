/**
 * Configuration
 *
 * Command-line flags take precedence over SLG_* environment variables
 * (the CLI loads a .env file first); the merged values are validated with
 * a zod schema.
 */

import { z } from 'zod';
import { createConfigurationError, DEFAULTS } from './types/index.js';

const positiveInt = z.coerce.number().int().positive();

export const ConfigSchema = z.object({
    help: z.boolean().default(false),
    version: z.boolean().default(false),
    demo: z.boolean().default(false),
    input: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    print: z.boolean().default(false),
    minLength: positiveInt.default(DEFAULTS.minLength),
    maxLength: positiveInt.optional(),
    contextWidth: positiveInt.optional(),
    granularity: z.enum(['word', 'char']).default(DEFAULTS.granularity),
    segmentation: z.enum(['sentence', 'line']).default(DEFAULTS.segmentation),
    lowercase: z.boolean().default(false),
    visualize: z.boolean().default(false),
    lite: z.boolean().default(false),
    graphFormat: z.enum(['svg', 'dot']).default(DEFAULTS.graphFormat),
    graphOutput: z.string().min(1).optional(),
    format: z.enum(['text', 'json']).default(DEFAULTS.reportFormat),
    verbosity: z.enum(['minimal', 'standard', 'detailed']).default(DEFAULTS.verbosity),
    logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default(DEFAULTS.logLevel),
}).refine(
    c => c.maxLength === undefined || c.minLength <= c.maxLength,
    { message: 'minimum substring length exceeds the maximum', path: ['minLength'] }
);

export type LearnerConfig = z.infer<typeof ConfigSchema>;

type ConfigKey = keyof LearnerConfig;

interface FlagSpec {
    key: ConfigKey;
    takesValue: boolean;
}

const FLAGS: Record<string, FlagSpec> = {
    '--help': { key: 'help', takesValue: false },
    '-h': { key: 'help', takesValue: false },
    '--version': { key: 'version', takesValue: false },
    '--demo': { key: 'demo', takesValue: false },
    '--input': { key: 'input', takesValue: true },
    '-i': { key: 'input', takesValue: true },
    '--output': { key: 'output', takesValue: true },
    '-o': { key: 'output', takesValue: true },
    '--print': { key: 'print', takesValue: false },
    '-p': { key: 'print', takesValue: false },
    '--min-length': { key: 'minLength', takesValue: true },
    '--max-length': { key: 'maxLength', takesValue: true },
    '--context-width': { key: 'contextWidth', takesValue: true },
    '--granularity': { key: 'granularity', takesValue: true },
    '-g': { key: 'granularity', takesValue: true },
    '--segment': { key: 'segmentation', takesValue: true },
    '--lowercase': { key: 'lowercase', takesValue: false },
    '--visualize': { key: 'visualize', takesValue: false },
    '-v': { key: 'visualize', takesValue: false },
    '--lite': { key: 'lite', takesValue: false },
    '--graph-format': { key: 'graphFormat', takesValue: true },
    '--graph-output': { key: 'graphOutput', takesValue: true },
    '--format': { key: 'format', takesValue: true },
    '--verbosity': { key: 'verbosity', takesValue: true },
    '--log-level': { key: 'logLevel', takesValue: true },
};

/** Shorthand for character granularity, one toy string per line */
const TOY_FLAGS = ['--toy', '-t'];

const ENV_KEYS: Array<[ConfigKey, string]> = [
    ['input', 'SLG_INPUT'],
    ['output', 'SLG_OUTPUT'],
    ['minLength', 'SLG_MIN_LENGTH'],
    ['maxLength', 'SLG_MAX_LENGTH'],
    ['contextWidth', 'SLG_CONTEXT_WIDTH'],
    ['granularity', 'SLG_GRANULARITY'],
    ['segmentation', 'SLG_SEGMENT'],
    ['graphFormat', 'SLG_GRAPH_FORMAT'],
    ['format', 'SLG_REPORT_FORMAT'],
    ['verbosity', 'SLG_VERBOSITY'],
    ['logLevel', 'SLG_LOG_LEVEL'],
];

export type RawConfig = Partial<Record<ConfigKey, string | boolean>>;

/**
 * Turn argv (without node and script) into raw option values.
 * A single positional argument is taken as the input path.
 */
export function parseArgs(argv: readonly string[]): RawConfig {
    const raw: RawConfig = {};
    const positional: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (TOY_FLAGS.includes(arg)) {
            raw.granularity = 'char';
            continue;
        }

        if (!arg.startsWith('-') || arg === '-') {
            positional.push(arg);
            continue;
        }

        const eq = arg.indexOf('=');
        const name = eq > 0 ? arg.slice(0, eq) : arg;
        const spec = FLAGS[name];
        if (!spec) {
            throw createConfigurationError(`Unknown option '${name}'`, name);
        }

        if (!spec.takesValue) {
            if (eq > 0) {
                throw createConfigurationError(`Option '${name}' does not take a value`, name);
            }
            raw[spec.key] = true;
            continue;
        }

        if (eq > 0) {
            raw[spec.key] = arg.slice(eq + 1);
            continue;
        }
        // A following flag is never taken as the value; use --flag=value for one starting with '-'
        const next = argv[i + 1];
        if (next === undefined || (next.startsWith('-') && next !== '-')) {
            throw createConfigurationError(`Option '${name}' requires a value`, name);
        }
        raw[spec.key] = next;
        i++;
    }

    if (positional.length > 1) {
        throw createConfigurationError(
            `Expected at most one input file, got ${positional.length}: ${positional.join(', ')}`,
            'input'
        );
    }
    if (positional.length === 1) {
        if (raw.input !== undefined) {
            throw createConfigurationError('Input given both as --input and as a positional argument', 'input');
        }
        raw.input = positional[0];
    }

    return raw;
}

/**
 * Help or version requested anywhere in argv. Checked before anything is
 * validated, so neither fails on a bad flag or environment value.
 */
export function infoRequest(argv: readonly string[]): 'help' | 'version' | undefined {
    const keys = argv.map(arg => FLAGS[arg]?.key);
    if (keys.includes('help')) return 'help';
    if (keys.includes('version')) return 'version';
    return undefined;
}

function flagFor(key: string): string {
    const entry = Object.entries(FLAGS).find(([name, spec]) => spec.key === key && name.startsWith('--'));
    return entry ? entry[0] : key;
}

/**
 * Merge flags over environment and validate.
 * @throws LearnerException with code CONFIGURATION_ERROR
 */
export function resolveConfig(
    argv: readonly string[],
    env: NodeJS.ProcessEnv = process.env
): LearnerConfig {
    const fromEnv: RawConfig = {};
    for (const [key, variable] of ENV_KEYS) {
        const value = env[variable];
        if (value !== undefined && value !== '') {
            fromEnv[key] = value;
        }
    }

    const merged = { ...fromEnv, ...parseArgs(argv) };
    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const key = String(issue.path[0] ?? '');
        throw createConfigurationError(
            `Invalid ${flagFor(key)}: ${issue.message}`,
            key,
            { value: Object.entries(merged).find(([name]) => name === key)?.[1] }
        );
    }
    return parsed.data;
}
