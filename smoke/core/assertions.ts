/**
 * Response assertions - decide whether a response body meets a step's expectation
 * Bodies are parsed and checked field by field; the raw substring check only
 * runs when an expectation asks for it explicitly
 */

import { z } from 'zod';
import type { Expectation } from '../types/index.js';

export type AssertionOutcome =
    | { ok: true; payload?: Record<string, unknown> }
    | { ok: false; reason: string };

const envelopeSchema = z.record(z.string(), z.unknown());

const battleResultSchema = z.object({
    winner: z.string().min(1),
});

/**
 * Parse a body as a top-level JSON object
 * @returns the object, or undefined when the body is not JSON or not an object
 */
export function parseEnvelope(body: string): Record<string, unknown> | undefined {
    let parsed: unknown;
    try {
        parsed = JSON.parse(body);
    } catch {
        return undefined;
    }
    const result = envelopeSchema.safeParse(parsed);
    return result.success ? result.data : undefined;
}

function describeValue(value: unknown): string {
    return value === undefined ? 'missing' : JSON.stringify(value);
}

/** Own properties only; inherited names such as "constructor" read as missing */
function ownField(payload: Record<string, unknown>, key: string): unknown {
    return Object.hasOwn(payload, key) ? payload[key] : undefined;
}

/**
 * Check a raw response body against an expectation
 */
export function checkResponse(body: string, expectation: Expectation): AssertionOutcome {
    if (expectation.contains !== undefined && !body.includes(expectation.contains)) {
        return { ok: false, reason: `Response does not contain ${JSON.stringify(expectation.contains)}` };
    }

    const fieldEntries = Object.entries(expectation.fields);
    if (fieldEntries.length === 0 && expectation.present.length === 0) {
        return { ok: true, payload: parseEnvelope(body) };
    }

    const payload = parseEnvelope(body);
    if (!payload) {
        return {
            ok: false,
            reason: body.trim() === '' ? 'Response body is empty' : 'Response is not a JSON object',
        };
    }

    for (const [key, expected] of fieldEntries) {
        const actual = ownField(payload, key);
        if (actual !== expected) {
            return {
                ok: false,
                reason: `Expected "${key}" to be ${JSON.stringify(expected)} but it was ${describeValue(actual)}`,
            };
        }
    }

    for (const key of expectation.present) {
        const value = ownField(payload, key);
        if (value === undefined || value === null) {
            return { ok: false, reason: `Expected "${key}" to be present` };
        }
    }

    return { ok: true, payload };
}

/**
 * Read the winner named in a battle response
 * @returns the winner, or undefined when the response does not name one
 */
export function extractWinner(payload: Record<string, unknown> | undefined): string | undefined {
    const result = battleResultSchema.safeParse(payload);
    return result.success ? result.data.winner : undefined;
}
