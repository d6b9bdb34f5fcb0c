/**
 * Smoke Orchestrator - Coordinates a complete smoke run
 * Plans the steps, executes them one at a time in order, and stops at the first failure
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { SmokeConfig, SmokePlan, SmokeRun, StepResult } from '../types/index.js';
import { createApiClient, type ApiClient } from './api-client.js';
import type { SmokeReporter } from './reporter.js';
import { StepRunner } from './step-runner.js';
import { planSteps } from './steps.js';

/**
 * Smoke Orchestrator Options
 */
export interface OrchestratorOptions {
    plan: SmokePlan;

    config: SmokeConfig;

    reporter: SmokeReporter;

    /** Client to use instead of one built from the config */
    client?: ApiClient;
}

/**
 * Smoke Orchestrator - Main workflow coordinator
 */
export class SmokeOrchestrator {
    private plan: SmokePlan;
    private config: SmokeConfig;
    private reporter: SmokeReporter;
    private stepRunner: StepRunner;

    constructor(options: OrchestratorOptions) {
        this.plan = options.plan;
        this.config = options.config;
        this.reporter = options.reporter;

        const client = options.client ?? createApiClient({
            baseUrl: this.config.baseUrl,
            timeout: this.config.timeout,
        });
        this.stepRunner = new StepRunner(client);
    }

    /**
     * Execute the planned steps strictly in order
     * The first failing step ends the run; no later step is sent
     * @returns Complete run results
     */
    async run(): Promise<SmokeRun> {
        const startTime = Date.now();
        const steps = planSteps(this.plan, this.config.scenario);

        this.reporter.runStarted(this.plan.name, this.config.baseUrl, steps.length);

        const results: StepResult[] = [];
        let failedStep: StepResult | undefined;

        for (const step of steps) {
            this.reporter.stepStarted(step, steps.length);

            const result = await this.stepRunner.runStep(step);
            results.push(result);

            if (!result.passed) {
                this.reporter.stepFailed(step, result);
                failedStep = result;
                break;
            }

            this.reporter.stepPassed(step, result);

            if (result.winner !== undefined) {
                this.reporter.note(`The winner is: ${result.winner}`);
            }
            if (this.config.echoJson && step.echo) {
                this.reporter.json(`${step.definition.op} JSON`, result.body);
            }
        }

        const run: SmokeRun = {
            timestamp: new Date().toISOString(),
            plan: this.plan.name,
            baseUrl: this.config.baseUrl,
            scenario: this.config.scenario,
            passed: failedStep === undefined,
            totalSteps: steps.length,
            executedSteps: results.length,
            results,
            failedStep,
            duration: Date.now() - startTime,
        };

        this.reporter.runFinished(run);

        return run;
    }

    /**
     * Save smoke run to JSON file
     */
    async saveResults(run: SmokeRun, outputPath: string): Promise<void> {
        await fs.mkdir(path.dirname(outputPath), { recursive: true });
        await fs.writeFile(outputPath, JSON.stringify(run, null, 2), 'utf-8');
    }
}
