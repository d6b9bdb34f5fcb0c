/**
 * Step Catalog - Turns plan step definitions into concrete requests
 * Renders endpoint path templates, builds JSON bodies, and words progress messages
 */

import type {
    IdOperation,
    MealFixture,
    MealOperation,
    OperationName,
    PlannedStep,
    SmokePlan,
    StepDefinition,
    StepMessages,
    StepRequest,
} from '../types/index.js';
import { PlanError } from './errors.js';

export const OPERATIONS: readonly OperationName[] = [
    'health',
    'dbCheck',
    'clearMeals',
    'createMeal',
    'deleteMeal',
    'listMeals',
    'getMealById',
    'getMealByName',
    'clearCombatants',
    'prepCombatant',
    'getCombatants',
    'battle',
];

const MEAL_OPERATIONS: readonly MealOperation[] = ['createMeal', 'getMealByName', 'prepCombatant'];

const ID_OPERATIONS: readonly IdOperation[] = ['deleteMeal', 'getMealById'];

const MEAL_PLACEHOLDERS = ['meal', 'cuisine', 'price', 'difficulty'];

/** Operations whose successful body is printed under --echo-json */
const ECHOED_OPERATIONS: ReadonlySet<OperationName> = new Set<OperationName>([
    'listMeals',
    'getMealById',
    'getMealByName',
    'prepCombatant',
    'getCombatants',
    'battle',
]);

function isMealOperation(op: OperationName): op is MealOperation {
    return MEAL_OPERATIONS.some(candidate => candidate === op);
}

function isIdOperation(op: OperationName): op is IdOperation {
    return ID_OPERATIONS.some(candidate => candidate === op);
}

/**
 * Placeholder names an operation's path template may use
 */
export function allowedPlaceholders(op: OperationName): string[] {
    if (isMealOperation(op)) {
        return MEAL_PLACEHOLDERS;
    }
    if (isIdOperation(op)) {
        return ['id'];
    }
    return [];
}

/**
 * List the {placeholder} names in a path template
 */
export function placeholders(template: string): string[] {
    return Array.from(template.matchAll(/\{(\w+)\}/g), match => match[1]);
}

/**
 * Substitute {placeholder} names in a path template
 * Values are percent-encoded, so "Grilled Cheese" becomes "Grilled%20Cheese"
 * @throws Error if the template names a value that was not supplied
 */
export function renderPath(template: string, params: Record<string, string | number>): string {
    return template.replace(/\{(\w+)\}/g, (_, name: string) => {
        const value = params[name];
        if (value === undefined) {
            throw new Error(`No value for placeholder {${name}} in path '${template}'`);
        }
        return encodeURIComponent(String(value));
    });
}

/**
 * Look up a meal fixture by name
 * @throws PlanError if the plan has no such meal
 */
export function findMeal(plan: SmokePlan, name: string): MealFixture {
    const meal = plan.meals.find(fixture => fixture.meal === name);
    if (!meal) {
        throw new PlanError(`Plan '${plan.name}' has no meal named '${name}'`);
    }
    return meal;
}

/**
 * Build the HTTP request for a step from the plan's endpoint contract
 */
export function buildRequest(definition: StepDefinition, plan: SmokePlan): StepRequest {
    const endpoint = plan.endpoints[definition.op];

    switch (definition.op) {
        case 'createMeal': {
            const meal = findMeal(plan, definition.meal);
            return {
                method: endpoint.method,
                path: renderPath(endpoint.path, { ...meal }),
                body: { meal: meal.meal, cuisine: meal.cuisine, price: meal.price, difficulty: meal.difficulty },
            };
        }
        case 'prepCombatant': {
            const meal = findMeal(plan, definition.meal);
            return {
                method: endpoint.method,
                path: renderPath(endpoint.path, { ...meal }),
                body: { meal: meal.meal },
            };
        }
        case 'getMealByName': {
            const meal = findMeal(plan, definition.meal);
            return { method: endpoint.method, path: renderPath(endpoint.path, { ...meal }) };
        }
        case 'deleteMeal':
        case 'getMealById':
            return { method: endpoint.method, path: renderPath(endpoint.path, { id: definition.id }) };
        default:
            return { method: endpoint.method, path: renderPath(endpoint.path, {}) };
    }
}

/**
 * Word the progress messages printed around a step
 */
export function describeStep(definition: StepDefinition, plan: SmokePlan): StepMessages {
    switch (definition.op) {
        case 'health':
            return {
                start: 'Checking health status...',
                success: 'Service is healthy.',
                failure: 'Health check failed.',
            };
        case 'dbCheck':
            return {
                start: 'Checking database connection...',
                success: 'Database connection is healthy.',
                failure: 'Database check failed.',
            };
        case 'clearMeals':
            return {
                start: 'Clearing the meals list...',
                success: 'Meals list cleared.',
                failure: 'Failed to clear meals.',
            };
        case 'createMeal': {
            const { meal, cuisine, price, difficulty } = findMeal(plan, definition.meal);
            return {
                start: `Adding meal (${meal} - ${cuisine}, ${price}, ${difficulty}) to the meals list...`,
                success: 'Meal added successfully.',
                failure: 'Failed to add meal.',
            };
        }
        case 'deleteMeal':
            return {
                start: `Deleting meal by ID (${definition.id})...`,
                success: `Meal deleted successfully by ID (${definition.id}).`,
                failure: `Failed to delete meal by ID (${definition.id}).`,
            };
        case 'listMeals':
            return {
                start: 'Getting all meals in the meals list...',
                success: 'All meals retrieved successfully.',
                failure: 'Failed to get meals.',
            };
        case 'getMealById':
            return {
                start: `Getting meal by ID (${definition.id})...`,
                success: `Meal retrieved successfully by ID (${definition.id}).`,
                failure: `Failed to get meal by ID (${definition.id}).`,
            };
        case 'getMealByName':
            return {
                start: `Getting meal by name (${definition.meal})...`,
                success: `Meal retrieved successfully by name (${definition.meal}).`,
                failure: `Failed to get meal by name (${definition.meal}).`,
            };
        case 'clearCombatants':
            return {
                start: 'Clearing all combatants...',
                success: 'Combatants cleared successfully.',
                failure: 'Failed to clear combatants.',
            };
        case 'prepCombatant':
            return {
                start: `Prepping combatant (${definition.meal})...`,
                success: 'Combatant prepped successfully.',
                failure: 'Failed to prep combatant.',
            };
        case 'getCombatants':
            return {
                start: 'Retrieving current combatants...',
                success: 'Combatants retrieved successfully.',
                failure: 'Failed to retrieve combatants.',
            };
        case 'battle':
            return {
                start: 'Starting battle...',
                success: 'Battle completed.',
                failure: 'Failed to start battle.',
            };
    }
}

/**
 * Flatten the plan into the ordered list of steps to execute
 *
 * A full run executes every scenario's steps in plan order. Running a single
 * scenario executes its setup steps first so it does not depend on state
 * left behind by the scenarios before it.
 * @throws PlanError if the named scenario does not exist
 */
export function planSteps(plan: SmokePlan, scenarioName?: string): PlannedStep[] {
    const sequence: Array<{ scenario: string; setup: boolean; definition: StepDefinition }> = [];

    if (scenarioName !== undefined) {
        const scenario = plan.scenarios.find(candidate => candidate.name === scenarioName);
        if (!scenario) {
            const known = plan.scenarios.map(candidate => candidate.name).join(', ');
            throw new PlanError(`Unknown scenario '${scenarioName}' (plan '${plan.name}' defines: ${known})`);
        }
        for (const definition of scenario.setup) {
            sequence.push({ scenario: scenario.name, setup: true, definition });
        }
        for (const definition of scenario.steps) {
            sequence.push({ scenario: scenario.name, setup: false, definition });
        }
    } else {
        for (const scenario of plan.scenarios) {
            for (const definition of scenario.steps) {
                sequence.push({ scenario: scenario.name, setup: false, definition });
            }
        }
    }

    return sequence.map((entry, i) => ({
        index: i + 1,
        scenario: entry.scenario,
        setup: entry.setup,
        definition: entry.definition,
        request: buildRequest(entry.definition, plan),
        messages: describeStep(entry.definition, plan),
        expect: plan.endpoints[entry.definition.op].expect,
        echo: ECHOED_OPERATIONS.has(entry.definition.op),
    }));
}
