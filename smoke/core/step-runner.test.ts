import { describe, it, expect, vi } from 'vitest';
import type { ApiClient } from './api-client.js';
import type { PlannedStep, StepDefinition } from '../types/index.js';
import { StepRunner, describeTransportError } from './step-runner.js';

function clientReturning(request: ApiClient['request']): ApiClient {
  return {
    baseUrl: 'http://meals.test/api',
    request,
    get: path => request('GET', path),
    post: (path, body) => request('POST', path, body),
    delete: path => request('DELETE', path),
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function step(definition: StepDefinition, path: string): PlannedStep {
  return {
    index: 3,
    scenario: 'battle',
    setup: false,
    definition,
    request: { method: 'GET', path },
    messages: { start: 'start', success: 'success', failure: 'failure' },
    expect: { fields: { status: 'success' }, present: [] },
    echo: true,
  };
}

describe('Step runner', () => {
  it('passes a step whose response meets the expectation', async () => {
    const request = vi.fn(async () => jsonResponse({ status: 'success', combatants: [] }));
    const runner = new StepRunner(clientReturning(request));

    const result = await runner.runStep(step({ op: 'getCombatants' }, '/get-combatants'));

    expect(request).toHaveBeenCalledWith('GET', '/get-combatants', undefined);
    expect(result).toMatchObject({
      index: 3,
      scenario: 'battle',
      op: 'getCombatants',
      method: 'GET',
      path: '/get-combatants',
      passed: true,
      httpStatus: 200,
      body: '{"status":"success","combatants":[]}',
    });
    expect(result.failure).toBeUndefined();
  });

  it('passes the JSON body through to the client', async () => {
    const request = vi.fn(async () => jsonResponse({ status: 'success' }));
    const runner = new StepRunner(clientReturning(request));
    const prep = step({ op: 'prepCombatant', meal: 'Taco' }, '/prep-combatant');
    prep.request = { method: 'POST', path: '/prep-combatant', body: { meal: 'Taco' } };

    await runner.runStep(prep);

    expect(request).toHaveBeenCalledWith('POST', '/prep-combatant', { meal: 'Taco' });
  });

  it('classifies a rejected request as a transport failure', async () => {
    const refused = new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:5001') });
    const runner = new StepRunner(clientReturning(async () => {
      throw refused;
    }));

    const result = await runner.runStep(step({ op: 'health' }, '/health'));

    expect(result.passed).toBe(false);
    expect(result.httpStatus).toBeUndefined();
    expect(result.body).toBe('');
    expect(result.failure).toEqual({
      kind: 'TRANSPORT',
      message: 'Request failed: fetch failed (connect ECONNREFUSED 127.0.0.1:5001)',
    });
  });

  it('classifies a response without the marker as a validation failure', async () => {
    const runner = new StepRunner(clientReturning(async () => jsonResponse({ error: 'boom' }, 500)));

    const result = await runner.runStep(step({ op: 'clearCombatants' }, '/clear-combatants'));

    expect(result.passed).toBe(false);
    expect(result.httpStatus).toBe(500);
    expect(result.body).toBe('{"error":"boom"}');
    expect(result.failure).toEqual({
      kind: 'VALIDATION',
      message: 'Expected "status" to be "success" but it was missing',
    });
  });

  describe('battle steps', () => {
    it('extracts the winner', async () => {
      const runner = new StepRunner(clientReturning(async () => jsonResponse({ status: 'success', winner: 'Taco' })));

      const result = await runner.runStep(step({ op: 'battle' }, '/battle'));

      expect(result.passed).toBe(true);
      expect(result.winner).toBe('Taco');
    });

    it('reports a success response without a winner as a missing field', async () => {
      const runner = new StepRunner(clientReturning(async () => jsonResponse({ status: 'success' })));

      const result = await runner.runStep(step({ op: 'battle' }, '/battle'));

      expect(result.passed).toBe(false);
      expect(result.failure).toEqual({ kind: 'MISSING_FIELD', message: 'Battle response has no "winner" field' });
    });

    it('checks the declared winner', async () => {
      const runner = new StepRunner(clientReturning(async () => jsonResponse({ status: 'success', winner: 'Burger' })));

      const result = await runner.runStep(step({ op: 'battle', expectWinner: 'Taco' }, '/battle'));

      expect(result.passed).toBe(false);
      expect(result.winner).toBe('Burger');
      expect(result.failure).toEqual({
        kind: 'UNEXPECTED_WINNER',
        message: 'Expected winner "Taco" but got "Burger"',
      });
    });
  });

  describe('describeTransportError', () => {
    it('names timeouts', () => {
      const timeout = new Error('The operation was aborted due to timeout');
      timeout.name = 'TimeoutError';
      expect(describeTransportError(timeout)).toBe('request timed out');
    });

    it('falls back to the message or the value', () => {
      expect(describeTransportError(new Error('socket hang up'))).toBe('socket hang up');
      expect(describeTransportError('offline')).toBe('offline');
    });
  });
});
