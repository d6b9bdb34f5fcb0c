/**
 * Plan Loader - Reads smoke plans from YAML and validates them
 * A plan holds one deployment's endpoint contract, its meal fixtures, and the scenarios to run
 */

import * as fs from 'fs/promises';
import { fileURLToPath } from 'url';
import * as yaml from 'yaml';
import { z } from 'zod';
import type { EndpointContract, Expectation, MealFixture, Scenario, SmokePlan, StepDefinition } from '../types/index.js';
import { PlanError } from './errors.js';
import { OPERATIONS, allowedPlaceholders, placeholders } from './steps.js';

/** Plan used when none is given on the command line */
export const DEFAULT_PLAN_PATH = fileURLToPath(new URL('../../plans/leaderboard.yaml', import.meta.url));

const expectationSchema: z.ZodType<Expectation, z.ZodTypeDef, unknown> = z.object({
    fields: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).default({}),
    present: z.array(z.string().min(1)).default([]),
    contains: z.string().min(1).optional(),
});

const endpointSchema: z.ZodType<EndpointContract, z.ZodTypeDef, unknown> = z.object({
    method: z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']),
    path: z.string().startsWith('/', 'must start with "/"'),
    expect: expectationSchema.default({ fields: { status: 'success' } }),
});

const endpointsSchema = z.object({
    health: endpointSchema,
    dbCheck: endpointSchema,
    clearMeals: endpointSchema,
    createMeal: endpointSchema,
    deleteMeal: endpointSchema,
    listMeals: endpointSchema,
    getMealById: endpointSchema,
    getMealByName: endpointSchema,
    clearCombatants: endpointSchema,
    prepCombatant: endpointSchema,
    getCombatants: endpointSchema,
    battle: endpointSchema,
});

const mealSchema: z.ZodType<MealFixture, z.ZodTypeDef, unknown> = z.object({
    meal: z.string().min(1),
    cuisine: z.string().min(1),
    price: z.number().positive(),
    difficulty: z.enum(['LOW', 'MED', 'HIGH']),
});

const plainOperationSchema = z.enum(['health', 'dbCheck', 'clearMeals', 'listMeals', 'clearCombatants', 'getCombatants']);

const stepSchema: z.ZodType<StepDefinition, z.ZodTypeDef, unknown> = z.union([
    plainOperationSchema.transform(op => ({ op })),
    z.literal('battle').transform(op => ({ op })),
    z.object({ op: plainOperationSchema }).strict(),
    z.object({ op: z.enum(['createMeal', 'getMealByName', 'prepCombatant']), meal: z.string().min(1) }).strict(),
    z.object({ op: z.enum(['deleteMeal', 'getMealById']), id: z.number().int().positive() }).strict(),
    z.object({ op: z.literal('battle'), expectWinner: z.string().min(1).optional() }).strict(),
]);

const scenarioSchema: z.ZodType<Scenario, z.ZodTypeDef, unknown> = z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    setup: z.array(stepSchema).default([]),
    steps: z.array(stepSchema).min(1),
});

const planSchema: z.ZodType<SmokePlan, z.ZodTypeDef, unknown> = z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    baseUrl: z.string().url().optional(),
    endpoints: endpointsSchema,
    meals: z.array(mealSchema).default([]),
    scenarios: z.array(scenarioSchema).min(1),
});

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => {
        const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${where}: ${issue.message}`;
    });
}

/**
 * Check references a schema cannot express: unique names, known meals,
 * and path placeholders each operation can fill
 */
export function crossCheckPlan(plan: SmokePlan): string[] {
    const issues: string[] = [];

    const mealNames = new Set<string>();
    for (const meal of plan.meals) {
        if (mealNames.has(meal.meal)) {
            issues.push(`meals: duplicate meal '${meal.meal}'`);
        }
        mealNames.add(meal.meal);
    }

    const scenarioNames = new Set<string>();
    for (const scenario of plan.scenarios) {
        if (scenarioNames.has(scenario.name)) {
            issues.push(`scenarios: duplicate scenario '${scenario.name}'`);
        }
        scenarioNames.add(scenario.name);

        const labelled = [
            ...scenario.setup.map((step, i) => ({ step, where: `scenarios.${scenario.name}.setup.${i}` })),
            ...scenario.steps.map((step, i) => ({ step, where: `scenarios.${scenario.name}.steps.${i}` })),
        ];
        for (const { step, where } of labelled) {
            if ('meal' in step && !mealNames.has(step.meal)) {
                issues.push(`${where}: unknown meal '${step.meal}'`);
            }
        }
    }

    for (const op of OPERATIONS) {
        const allowed = allowedPlaceholders(op);
        for (const name of placeholders(plan.endpoints[op].path)) {
            if (!allowed.includes(name)) {
                issues.push(`endpoints.${op}.path: operation cannot fill placeholder {${name}}`);
            }
        }
    }

    for (const op of ['getMealByName', 'deleteMeal', 'getMealById'] as const) {
        if (placeholders(plan.endpoints[op].path).length === 0) {
            issues.push(`endpoints.${op}.path: needs a placeholder to identify the meal`);
        }
    }

    return issues;
}

/**
 * Parse and validate plan text
 * @param source Name used in error messages
 * @throws PlanError listing every problem found
 */
export function parsePlan(content: string, source: string): SmokePlan {
    let document: unknown;
    try {
        document = yaml.parse(content);
    } catch (error) {
        const msg = error instanceof Error ? error.message : String(error);
        throw new PlanError(`Failed to parse plan '${source}': ${msg}`);
    }

    const result = planSchema.safeParse(document);
    if (!result.success) {
        throw new PlanError(`Invalid plan '${source}'`, formatIssues(result.error));
    }

    const issues = crossCheckPlan(result.data);
    if (issues.length > 0) {
        throw new PlanError(`Invalid plan '${source}'`, issues);
    }

    return result.data;
}

/**
 * Load a smoke plan from a YAML file
 * @throws PlanError if the file cannot be read or the plan is invalid
 */
export async function loadPlan(planPath: string = DEFAULT_PLAN_PATH): Promise<SmokePlan> {
    let content: string;
    try {
        content = await fs.readFile(planPath, 'utf-8');
    } catch (error) {
        const msg = error instanceof Error ? error.message : String(error);
        throw new PlanError(`Failed to read plan '${planPath}': ${msg}`);
    }
    return parsePlan(content, planPath);
}
