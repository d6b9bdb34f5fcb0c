/**
 * Command-line configuration for the smoke runner
 */

import minimist from 'minimist';
import type { SmokeConfig, SmokePlan } from './types/index.js';
import { UsageError } from './core/errors.js';
import { DEFAULT_PLAN_PATH } from './core/plan-loader.js';

export const DEFAULT_BASE_URL = 'http://localhost:5001/api';

export const DEFAULT_TIMEOUT = 10000;

/** Largest delay a Node timer accepts */
export const MAX_TIMEOUT = 2_147_483_647;

/**
 * Options gathered from the command line and environment, before a plan is loaded
 */
export interface CLIOptions {
    /** Base URL from --base-url or SMOKE_BASE_URL */
    baseUrl?: string;
    echoJson: boolean;
    timeout: number;
    planPath: string;
    scenario?: string;
    output?: string;
    dryRun: boolean;
    verbose: boolean;
}

export type CLICommand =
    | { command: 'help' }
    | { command: 'run'; options: CLIOptions };

const STRING_OPTIONS = ['base-url', 'plan', 'scenario', 'output', 'timeout'];
const BOOLEAN_OPTIONS = ['echo-json', 'dry-run', 'verbose', 'help'];
const ALIASES: Record<string, string> = {
    u: 'base-url',
    p: 'plan',
    s: 'scenario',
    o: 'output',
    d: 'dry-run',
    v: 'verbose',
    h: 'help',
};

/**
 * Read a string option; repeated options keep the last value
 */
function stringOption(value: unknown, name: string): string | undefined {
    const last: unknown = Array.isArray(value) ? value[value.length - 1] : value;
    if (last === undefined) {
        return undefined;
    }
    if (typeof last !== 'string' || last === '') {
        throw new UsageError(`Option --${name} requires a value`);
    }
    return last;
}

function parseTimeout(raw: string | undefined): number {
    if (raw === undefined) {
        return DEFAULT_TIMEOUT;
    }
    const timeout = Number(raw);
    if (!Number.isInteger(timeout) || timeout <= 0 || timeout > MAX_TIMEOUT) {
        throw new UsageError(`Invalid --timeout '${raw}': expected a positive number of milliseconds up to ${MAX_TIMEOUT}`);
    }
    return timeout;
}

function checkUrl(url: string, source: string): string {
    try {
        new URL(url);
    } catch {
        throw new UsageError(`Invalid base URL from ${source}: '${url}'`);
    }
    return url;
}

/**
 * Parse command-line arguments
 * @param argv Arguments after the script name
 * @param env Environment; SMOKE_BASE_URL sets the base URL when --base-url is absent
 * @throws UsageError for unknown arguments or malformed values
 */
export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = {}): CLICommand {
    const unknown: string[] = [];
    const args = minimist(argv, {
        string: STRING_OPTIONS,
        boolean: BOOLEAN_OPTIONS,
        alias: ALIASES,
        unknown: (arg: string) => {
            unknown.push(arg);
            return false;
        },
    });

    // Arguments after "--" bypass the unknown hook
    const rejected = [...unknown, ...args._.map(String)];
    if (rejected.length > 0) {
        throw new UsageError(`Unknown parameter passed: ${rejected[0]}`);
    }

    if (args.help === true) {
        return { command: 'help' };
    }

    const cliBaseUrl = stringOption(args['base-url'], 'base-url');
    const envBaseUrl = env.SMOKE_BASE_URL !== undefined && env.SMOKE_BASE_URL !== '' ? env.SMOKE_BASE_URL : undefined;

    let baseUrl: string | undefined;
    if (cliBaseUrl !== undefined) {
        baseUrl = checkUrl(cliBaseUrl, '--base-url');
    } else if (envBaseUrl !== undefined) {
        baseUrl = checkUrl(envBaseUrl, 'SMOKE_BASE_URL');
    }

    return {
        command: 'run',
        options: {
            baseUrl,
            echoJson: args['echo-json'] === true,
            timeout: parseTimeout(stringOption(args.timeout, 'timeout')),
            planPath: stringOption(args.plan, 'plan') ?? DEFAULT_PLAN_PATH,
            scenario: stringOption(args.scenario, 'scenario'),
            output: stringOption(args.output, 'output'),
            dryRun: args['dry-run'] === true,
            verbose: args.verbose === true,
        },
    };
}

/**
 * Combine command-line options with the loaded plan
 * Base URL precedence: --base-url, SMOKE_BASE_URL, the plan's baseUrl, DEFAULT_BASE_URL
 */
export function resolveConfig(options: CLIOptions, plan: SmokePlan): SmokeConfig {
    return {
        baseUrl: options.baseUrl ?? plan.baseUrl ?? DEFAULT_BASE_URL,
        echoJson: options.echoJson,
        timeout: options.timeout,
        planPath: options.planPath,
        scenario: options.scenario,
        output: options.output,
        dryRun: options.dryRun,
        verbose: options.verbose,
    };
}
