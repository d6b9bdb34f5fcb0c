import { describe, it, expect } from 'vitest';
import type { Expectation } from '../types/index.js';
import { checkResponse, extractWinner, parseEnvelope } from './assertions.js';

const SUCCESS: Expectation = { fields: { status: 'success' }, present: [] };

describe('Response assertions', () => {
  describe('checkResponse', () => {
    it('passes when top-level fields match', () => {
      const outcome = checkResponse('{"status": "success", "meal": "Taco"}', SUCCESS);
      expect(outcome).toEqual({ ok: true, payload: { status: 'success', meal: 'Taco' } });
    });

    it('fails when a field has another value', () => {
      expect(checkResponse('{"status": "failure"}', SUCCESS)).toEqual({
        ok: false,
        reason: 'Expected "status" to be "success" but it was "failure"',
      });
    });

    it('fails when a field is missing', () => {
      expect(checkResponse('{"error": "Meal with ID 999 not found"}', SUCCESS)).toEqual({
        ok: false,
        reason: 'Expected "status" to be "success" but it was missing',
      });
    });

    it('is not fooled by a nested status field', () => {
      const body = '{"status": "failure", "previous": {"status": "success"}}';
      expect(checkResponse(body, SUCCESS).ok).toBe(false);
    });

    it('keeps the legacy substring check when asked for one', () => {
      const body = '{"status": "failure", "previous": {"status": "success"}}';
      const legacy: Expectation = { fields: {}, present: [], contains: '"status": "success"' };
      expect(checkResponse(body, legacy).ok).toBe(true);
    });

    it('reports a missing marker in substring mode', () => {
      const legacy: Expectation = { fields: {}, present: [], contains: '"status": "healthy"' };
      expect(checkResponse('{"status": "degraded"}', legacy)).toEqual({
        ok: false,
        reason: 'Response does not contain "\\"status\\": \\"healthy\\""',
      });
    });

    it('requires present fields to be non-null', () => {
      const winnerPresent: Expectation = { fields: {}, present: ['winner'] };
      expect(checkResponse('{"winner": "Ramen"}', winnerPresent).ok).toBe(true);
      expect(checkResponse('{"winner": null}', winnerPresent)).toEqual({
        ok: false,
        reason: 'Expected "winner" to be present',
      });
    });

    it('ignores inherited properties', () => {
      expect(checkResponse('{}', { fields: {}, present: ['constructor'] })).toEqual({
        ok: false,
        reason: 'Expected "constructor" to be present',
      });
      expect(checkResponse('{}', { fields: { toString: 'x' }, present: [] })).toEqual({
        ok: false,
        reason: 'Expected "toString" to be "x" but it was missing',
      });
    });

    it('fails on bodies that are not JSON objects', () => {
      expect(checkResponse('<html>Bad Gateway</html>', SUCCESS)).toEqual({
        ok: false,
        reason: 'Response is not a JSON object',
      });
      expect(checkResponse('["success"]', SUCCESS)).toEqual({
        ok: false,
        reason: 'Response is not a JSON object',
      });
      expect(checkResponse('', SUCCESS)).toEqual({ ok: false, reason: 'Response body is empty' });
    });

    it('compares numbers and booleans exactly', () => {
      const expectation: Expectation = { fields: { count: 2, ready: true }, present: [] };
      expect(checkResponse('{"count": 2, "ready": true}', expectation).ok).toBe(true);
      expect(checkResponse('{"count": "2", "ready": true}', expectation).ok).toBe(false);
    });
  });

  it('parses only JSON objects as envelopes', () => {
    expect(parseEnvelope('{"a": 1}')).toEqual({ a: 1 });
    expect(parseEnvelope('42')).toBeUndefined();
    expect(parseEnvelope('not json')).toBeUndefined();
  });

  describe('extractWinner', () => {
    it('reads the winner', () => {
      expect(extractWinner({ status: 'success', winner: 'Taco' })).toBe('Taco');
    });

    it('returns undefined when there is no usable winner', () => {
      expect(extractWinner({ status: 'success' })).toBeUndefined();
      expect(extractWinner({ winner: 3 })).toBeUndefined();
      expect(extractWinner({ winner: '' })).toBeUndefined();
      expect(extractWinner(undefined)).toBeUndefined();
    });
  });
});
