/**
 * Meal Battle Smoke Runner - command handling
 * Parses arguments, loads the plan, runs it, and maps the outcome to an exit code
 */

import * as path from 'path';
import chalk from 'chalk';
import type { SmokeConfig, SmokePlan, SmokeRun } from './types/index.js';
import { parseArgs, resolveConfig, type CLICommand } from './config.js';
import { PlanError, UsageError } from './core/errors.js';
import { SmokeOrchestrator } from './core/orchestrator.js';
import { loadPlan } from './core/plan-loader.js';
import { ConsoleReporter } from './core/reporter.js';
import { planSteps } from './core/steps.js';

/**
 * Display help text
 */
export function displayHelp(): void {
    console.log(chalk.bold('\n🍽  Meal Battle Smoke Runner\n'));
    console.log('Usage: meal-smoke [options]\n');

    console.log(chalk.bold('Options:'));
    console.log('  --echo-json            Print full JSON bodies of successful query steps');
    console.log('  -u, --base-url <url>   API base URL (default: plan baseUrl, then http://localhost:5001/api)');
    console.log('  -p, --plan <file>      Smoke plan YAML (default: plans/leaderboard.yaml)');
    console.log('  -s, --scenario <name>  Run one scenario on its own, with its setup steps');
    console.log('  -o, --output <file>    Write run results as JSON');
    console.log('  --timeout <ms>         Per-request timeout in milliseconds (default: 10000)');
    console.log('  -d, --dry-run          Show the steps that would run without sending requests');
    console.log('  -v, --verbose          Show request details for each step');
    console.log('  -h, --help             Show this help\n');

    console.log(chalk.bold('Environment:'));
    console.log('  SMOKE_BASE_URL         Base URL when --base-url is not given\n');

    console.log(chalk.bold('Examples:'));
    console.log('  # Run the default plan against a local API');
    console.log(chalk.gray('  $ meal-smoke\n'));

    console.log('  # Echo response bodies');
    console.log(chalk.gray('  $ meal-smoke --echo-json\n'));

    console.log('  # Run only the battle scenario of the flat-list deployment');
    console.log(chalk.gray('  $ meal-smoke --plan plans/flat-list.yaml --scenario battle\n'));
}

/**
 * Display the steps a run would execute
 */
export function displayDryRun(plan: SmokePlan, config: SmokeConfig): void {
    const steps = planSteps(plan, config.scenario);

    console.log(chalk.yellow('\n🔍 Dry Run Mode - No requests will be sent\n'));
    console.log(`Plan: ${plan.name}${plan.description ? chalk.gray(` - ${plan.description}`) : ''}`);
    console.log(`Base URL: ${config.baseUrl}`);
    console.log(`Steps: ${steps.length}\n`);

    let currentScenario = '';
    for (const step of steps) {
        if (step.scenario !== currentScenario) {
            currentScenario = step.scenario;
            console.log(chalk.cyan(`Scenario: ${currentScenario}`));
        }
        const setup = step.setup ? chalk.gray(' (setup)') : '';
        console.log(`  ${step.index}. ${step.request.method} ${step.request.path}${setup}`);
        console.log(chalk.gray(`     ${step.messages.start}`));
    }

    console.log(chalk.yellow('\nRun without --dry-run to execute the smoke test.\n'));
}

function reportError(error: unknown, verbose: boolean): number {
    if (error instanceof UsageError) {
        console.error(chalk.red(`\n✗ ${error.message}\n`));
        console.error(chalk.gray('Run with --help for usage.\n'));
        return 1;
    }
    if (error instanceof PlanError) {
        console.error(chalk.red(`\n✗ ${error.message}\n`));
        return 1;
    }
    console.error(chalk.red(`\n✗ Smoke run failed: ${error}\n`));
    if (verbose && error instanceof Error) {
        console.error(chalk.gray(error.stack));
    }
    return 1;
}

/**
 * Run the smoke runner with the given arguments
 * @param argv Arguments after the script name
 * @returns Process exit code: 0 when every step passed, 1 otherwise
 */
export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
    let command: CLICommand;
    try {
        command = parseArgs(argv, env);
    } catch (error) {
        return reportError(error, false);
    }

    if (command.command === 'help') {
        displayHelp();
        return 0;
    }

    const options = command.options;

    try {
        const plan = await loadPlan(options.planPath);
        const config = resolveConfig(options, plan);

        if (config.verbose) {
            console.log(chalk.gray(`Plan path: ${config.planPath}`));
            console.log(chalk.gray(`Base URL: ${config.baseUrl}`));
            console.log(chalk.gray(`Timeout: ${config.timeout}ms`));
        }

        if (config.dryRun) {
            displayDryRun(plan, config);
            return 0;
        }

        const orchestrator = new SmokeOrchestrator({
            plan,
            config,
            reporter: new ConsoleReporter({ verbose: config.verbose }),
        });

        const run: SmokeRun = await orchestrator.run();

        if (config.output) {
            const outputPath = path.resolve(process.cwd(), config.output);
            await orchestrator.saveResults(run, outputPath);
            console.log(chalk.gray(`Results saved to: ${outputPath}\n`));
        }

        return run.passed ? 0 : 1;
    } catch (error) {
        return reportError(error, options.verbose);
    }
}
