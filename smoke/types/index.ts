/**
 * Type definitions for the meal battle smoke runner
 * Defines interfaces for smoke plans, step execution, and run results
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Meal preparation difficulty accepted by the meal API
 */
export type Difficulty = 'LOW' | 'MED' | 'HIGH';

/**
 * Meal fixture from the plan's meal table
 */
export interface MealFixture {
    /** Meal name, also the key steps use to refer to it */
    meal: string;

    cuisine: string;

    /** Positive price */
    price: number;

    difficulty: Difficulty;
}

/**
 * Endpoint roles a step can invoke
 */
export type OperationName =
    | 'health'
    | 'dbCheck'
    | 'clearMeals'
    | 'createMeal'
    | 'deleteMeal'
    | 'listMeals'
    | 'getMealById'
    | 'getMealByName'
    | 'clearCombatants'
    | 'prepCombatant'
    | 'getCombatants'
    | 'battle';

/** Operations that take no parameters */
export type PlainOperation = 'health' | 'dbCheck' | 'clearMeals' | 'listMeals' | 'clearCombatants' | 'getCombatants';

/** Operations parameterized by a meal fixture */
export type MealOperation = 'createMeal' | 'getMealByName' | 'prepCombatant';

/** Operations parameterized by a meal identifier */
export type IdOperation = 'deleteMeal' | 'getMealById';

/**
 * What a response must look like for a step to pass
 * - fields: top-level keys that must equal the given values
 * - present: top-level keys that must exist and be non-null
 * - contains: literal text the raw body must contain (coarse, legacy check)
 */
export interface Expectation {
    fields: Record<string, string | number | boolean>;
    present: string[];
    contains?: string;
}

/**
 * Contract for one operation in a given deployment
 */
export interface EndpointContract {
    method: HttpMethod;

    /** Path relative to the base URL, may hold {placeholders} */
    path: string;

    expect: Expectation;
}

export type EndpointContracts = Record<OperationName, EndpointContract>;

/**
 * Step definition from a plan scenario
 */
export type StepDefinition =
    | { op: PlainOperation }
    | { op: MealOperation; meal: string }
    | { op: IdOperation; id: number }
    | { op: 'battle'; expectWinner?: string };

/**
 * Named, ordered group of steps
 */
export interface Scenario {
    name: string;

    description?: string;

    /** Steps that establish this scenario's preconditions when it runs on its own */
    setup: StepDefinition[];

    steps: StepDefinition[];
}

/**
 * Smoke plan structure (parsed from YAML)
 */
export interface SmokePlan {
    name: string;

    description?: string;

    /** Base URL used when neither the command line nor the environment sets one */
    baseUrl?: string;

    endpoints: EndpointContracts;

    meals: MealFixture[];

    scenarios: Scenario[];
}

/**
 * HTTP request built for a step
 */
export interface StepRequest {
    method: HttpMethod;
    path: string;
    body?: Record<string, string | number>;
}

/**
 * Human-readable progress messages for a step
 */
export interface StepMessages {
    start: string;
    success: string;
    failure: string;
}

/**
 * Step scheduled for execution
 */
export interface PlannedStep {
    /** Position in the run, starting at 1 */
    index: number;

    scenario: string;

    /** Whether the step belongs to the scenario's setup */
    setup: boolean;

    definition: StepDefinition;

    request: StepRequest;

    messages: StepMessages;

    expect: Expectation;

    /** Whether a successful body is printed under --echo-json */
    echo: boolean;
}

/**
 * Why a step failed
 * - TRANSPORT: no response (connection refused, DNS, timeout)
 * - VALIDATION: response did not meet the step's expectation
 * - MISSING_FIELD: battle succeeded but named no winner
 * - UNEXPECTED_WINNER: battle winner differs from the declared one
 */
export type FailureKind = 'TRANSPORT' | 'VALIDATION' | 'MISSING_FIELD' | 'UNEXPECTED_WINNER';

export interface StepFailure {
    kind: FailureKind;
    message: string;
}

/**
 * Result of executing one step
 */
export interface StepResult {
    index: number;
    scenario: string;
    op: OperationName;
    method: HttpMethod;
    path: string;
    passed: boolean;

    /** HTTP status, absent on transport failure */
    httpStatus?: number;

    /** Duration in milliseconds */
    duration: number;

    /** Raw response body */
    body: string;

    failure?: StepFailure;

    /** Winner named by a battle step */
    winner?: string;
}

/**
 * Complete smoke run results
 */
export interface SmokeRun {
    /** Run timestamp (ISO string) */
    timestamp: string;

    plan: string;

    baseUrl: string;

    /** Scenario run on its own, if any */
    scenario?: string;

    passed: boolean;

    /** Number of steps scheduled */
    totalSteps: number;

    /** Number of steps actually executed */
    executedSteps: number;

    results: StepResult[];

    /** First failing step, if any */
    failedStep?: StepResult;

    /** Total duration in milliseconds */
    duration: number;
}

/**
 * Explicit run configuration
 */
export interface SmokeConfig {
    baseUrl: string;

    /** Pretty-print successful response bodies */
    echoJson: boolean;

    /** Per-request timeout in milliseconds */
    timeout: number;

    planPath: string;

    scenario?: string;

    /** Where to write the run results JSON */
    output?: string;

    dryRun: boolean;

    verbose: boolean;
}
