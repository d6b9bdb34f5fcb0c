/**
 * Console reporting for smoke runs
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { PlannedStep, SmokeRun, StepResult } from '../types/index.js';

/**
 * Receives progress from the orchestrator
 */
export interface SmokeReporter {
    runStarted(planName: string, baseUrl: string, totalSteps: number): void;
    stepStarted(step: PlannedStep, totalSteps: number): void;
    stepPassed(step: PlannedStep, result: StepResult): void;
    stepFailed(step: PlannedStep, result: StepResult): void;

    /** Extra line tied to the current step, e.g. the battle winner */
    note(message: string): void;

    /** Full response body, printed under --echo-json */
    json(label: string, body: string): void;

    runFinished(run: SmokeRun): void;
}

/**
 * Pretty-print a JSON body, falling back to the raw text when it does not parse
 */
export function formatJson(body: string): string {
    try {
        return JSON.stringify(JSON.parse(body), null, 2);
    } catch {
        return body;
    }
}

export interface ConsoleReporterOptions {
    /** Show method, path, status and timing for each step */
    verbose?: boolean;
}

/**
 * Reporter writing coloured progress to stdout, one spinner per step
 */
export class ConsoleReporter implements SmokeReporter {
    private verbose: boolean;
    private spinner: Ora | null = null;

    constructor(options: ConsoleReporterOptions = {}) {
        this.verbose = options.verbose ?? false;
    }

    runStarted(planName: string, baseUrl: string, totalSteps: number): void {
        console.log(chalk.bold('\n🍽  Meal Battle Smoke Test\n'));
        console.log(`Plan: ${planName}`);
        console.log(`Base URL: ${baseUrl}`);
        console.log(`Steps: ${totalSteps}\n`);
    }

    stepStarted(step: PlannedStep, totalSteps: number): void {
        const prefix = chalk.gray(`[${step.index}/${totalSteps}]`);
        const setup = step.setup ? chalk.gray(' (setup)') : '';
        this.spinner = ora({
            text: `${prefix} ${step.messages.start}${setup}`,
            color: 'yellow',
            stream: process.stdout,
        }).start();
    }

    stepPassed(step: PlannedStep, result: StepResult): void {
        this.finish(true, chalk.green(step.messages.success));
        this.detail(result);
    }

    stepFailed(step: PlannedStep, result: StepResult): void {
        this.finish(false, chalk.red(step.messages.failure));
        this.detail(result);
        if (result.failure) {
            console.log(chalk.red(`    ${result.failure.kind}: ${result.failure.message}`));
        }
        if (result.body !== '') {
            console.log(chalk.gray(`    Response was: ${result.body.trim()}`));
        }
    }

    note(message: string): void {
        console.log(`    ${message}`);
    }

    json(label: string, body: string): void {
        console.log(chalk.cyan(`    ${label}:`));
        console.log(formatJson(body));
    }

    runFinished(run: SmokeRun): void {
        const seconds = (run.duration / 1000).toFixed(2);

        if (run.passed) {
            console.log(chalk.green(`\n✓ All ${run.totalSteps} steps passed (${seconds}s)\n`));
            return;
        }

        const failed = run.failedStep;
        const where = failed ? `step ${failed.index} (${failed.op}, scenario '${failed.scenario}')` : 'an unknown step';
        console.log(chalk.red(`\n✗ Smoke test failed at ${where}`));
        console.log(chalk.gray(`  ${run.executedSteps}/${run.totalSteps} steps executed (${seconds}s)\n`));
    }

    private finish(passed: boolean, text: string): void {
        if (!this.spinner) {
            console.log(text);
            return;
        }
        if (passed) {
            this.spinner.succeed(text);
        } else {
            this.spinner.fail(text);
        }
        this.spinner = null;
    }

    private detail(result: StepResult): void {
        if (!this.verbose) {
            return;
        }
        const status = result.httpStatus !== undefined ? String(result.httpStatus) : 'no response';
        console.log(chalk.gray(`    ${result.method} ${result.path} → ${status} in ${result.duration}ms`));
    }
}
