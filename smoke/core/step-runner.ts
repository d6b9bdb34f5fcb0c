/**
 * Step Runner - Executes a single smoke step against the API
 * Sends the step's request, checks the response, and classifies failures
 */

import type { PlannedStep, StepFailure, StepResult } from '../types/index.js';
import type { ApiClient } from './api-client.js';
import { checkResponse, extractWinner } from './assertions.js';

/**
 * Step Runner class for executing planned steps
 */
export class StepRunner {
    private client: ApiClient;

    constructor(client: ApiClient) {
        this.client = client;
    }

    /**
     * Run one step
     * Never throws: transport errors become TRANSPORT failures
     */
    async runStep(step: PlannedStep): Promise<StepResult> {
        const startTime = Date.now();
        const base = {
            index: step.index,
            scenario: step.scenario,
            op: step.definition.op,
            method: step.request.method,
            path: step.request.path,
        };

        let status: number;
        let body: string;
        try {
            const response = await this.client.request(step.request.method, step.request.path, step.request.body);
            status = response.status;
            body = await response.text();
        } catch (error) {
            return {
                ...base,
                passed: false,
                duration: Date.now() - startTime,
                body: '',
                failure: { kind: 'TRANSPORT', message: `Request failed: ${describeTransportError(error)}` },
            };
        }

        const duration = Date.now() - startTime;
        const outcome = checkResponse(body, step.expect);
        if (!outcome.ok) {
            return {
                ...base,
                passed: false,
                httpStatus: status,
                duration,
                body,
                failure: { kind: 'VALIDATION', message: outcome.reason },
            };
        }

        if (step.definition.op !== 'battle') {
            return { ...base, passed: true, httpStatus: status, duration, body };
        }

        const winner = extractWinner(outcome.payload);
        const failure = this.checkWinner(winner, step.definition.expectWinner);
        return {
            ...base,
            passed: failure === undefined,
            httpStatus: status,
            duration,
            body,
            winner,
            failure,
        };
    }

    private checkWinner(winner: string | undefined, expected: string | undefined): StepFailure | undefined {
        if (winner === undefined) {
            return { kind: 'MISSING_FIELD', message: 'Battle response has no "winner" field' };
        }
        if (expected !== undefined && winner !== expected) {
            return { kind: 'UNEXPECTED_WINNER', message: `Expected winner "${expected}" but got "${winner}"` };
        }
        return undefined;
    }
}

/**
 * Name the underlying cause of a fetch rejection, e.g. ECONNREFUSED or a timeout
 */
export function describeTransportError(error: unknown): string {
    if (!(error instanceof Error)) {
        return String(error);
    }
    if (error.name === 'TimeoutError') {
        return 'request timed out';
    }
    const cause: unknown = error.cause;
    if (cause instanceof Error && cause.message !== '') {
        return `${error.message} (${cause.message})`;
    }
    return error.message;
}
