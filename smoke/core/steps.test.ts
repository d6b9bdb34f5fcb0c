import { describe, it, expect, beforeAll } from 'vitest';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { SmokePlan } from '../types/index.js';
import { PlanError } from './errors.js';
import { loadPlan } from './plan-loader.js';
import { buildRequest, describeStep, placeholders, planSteps, renderPath } from './steps.js';

const PLANS_DIR = fileURLToPath(new URL('../../plans/', import.meta.url));

describe('Step catalog', () => {
  let leaderboard: SmokePlan;
  let flatList: SmokePlan;

  beforeAll(async () => {
    leaderboard = await loadPlan(path.join(PLANS_DIR, 'leaderboard.yaml'));
    flatList = await loadPlan(path.join(PLANS_DIR, 'flat-list.yaml'));
  });

  describe('renderPath', () => {
    it('percent-encodes spaces in names', () => {
      expect(renderPath('/get-meal-by-name/{meal}', { meal: 'Grilled Cheese' }))
        .toBe('/get-meal-by-name/Grilled%20Cheese');
    });

    it('encodes reserved characters in query values', () => {
      expect(renderPath('/find?meal={meal}', { meal: 'Mac & Cheese' })).toBe('/find?meal=Mac%20%26%20Cheese');
    });

    it('renders numbers', () => {
      expect(renderPath('/delete-meal/{id}', { id: 7 })).toBe('/delete-meal/7');
    });

    it('throws when a placeholder has no value', () => {
      expect(() => renderPath('/delete-meal/{id}', {})).toThrow('No value for placeholder {id}');
    });
  });

  it('lists placeholders in order', () => {
    expect(placeholders('/x?meal={meal}&price={price}')).toEqual(['meal', 'price']);
    expect(placeholders('/health')).toEqual([]);
  });

  describe('buildRequest', () => {
    it('sends the full meal fixture when creating a meal', () => {
      expect(buildRequest({ op: 'createMeal', meal: 'Pizza' }, leaderboard)).toEqual({
        method: 'POST',
        path: '/create-meal',
        body: { meal: 'Pizza', cuisine: 'Italian', price: 15.99, difficulty: 'MED' },
      });
    });

    it('sends only the meal name when prepping a combatant', () => {
      expect(buildRequest({ op: 'prepCombatant', meal: 'Taco' }, leaderboard)).toEqual({
        method: 'POST',
        path: '/prep-combatant',
        body: { meal: 'Taco' },
      });
    });

    it('puts the identifier in the path', () => {
      expect(buildRequest({ op: 'deleteMeal', id: 1 }, leaderboard)).toEqual({
        method: 'DELETE',
        path: '/delete-meal/1',
      });
    });

    it('uses query parameters for name lookup in the flat-list deployment', () => {
      expect(buildRequest({ op: 'getMealByName', meal: 'Grilled Cheese' }, flatList)).toEqual({
        method: 'GET',
        path: '/get-meal-by-name?meal=Grilled%20Cheese&cuisine=American&price=6.5&difficulty=LOW',
      });
    });

    it('follows each deployment for combatant and battle verbs', () => {
      expect(buildRequest({ op: 'clearCombatants' }, leaderboard).method).toBe('POST');
      expect(buildRequest({ op: 'clearCombatants' }, flatList).method).toBe('DELETE');
      expect(buildRequest({ op: 'battle' }, leaderboard).method).toBe('GET');
      expect(buildRequest({ op: 'battle' }, flatList).method).toBe('POST');
    });

    it('throws PlanError for a meal the plan does not define', () => {
      expect(() => buildRequest({ op: 'createMeal', meal: 'Sushi' }, leaderboard)).toThrow(PlanError);
    });
  });

  it('describes meal creation with the fixture values', () => {
    expect(describeStep({ op: 'createMeal', meal: 'Taco' }, leaderboard).start)
      .toBe('Adding meal (Taco - Mexican, 8.99, LOW) to the meals list...');
  });

  describe('planSteps', () => {
    it('runs every scenario in order without setup steps', () => {
      const steps = planSteps(leaderboard);

      expect(steps.map(step => step.definition.op)).toEqual([
        'health',
        'dbCheck',
        'clearMeals',
        'createMeal',
        'createMeal',
        'deleteMeal',
        'listMeals',
        'createMeal',
        'getMealById',
        'getMealByName',
        'clearCombatants',
        'prepCombatant',
        'prepCombatant',
        'battle',
        'getCombatants',
      ]);
      expect(steps.map(step => step.index)).toEqual(Array.from({ length: 15 }, (_, i) => i + 1));
      expect(steps.some(step => step.setup)).toBe(false);
    });

    it('prefixes a single scenario with its setup', () => {
      const steps = planSteps(leaderboard, 'battle');

      expect(steps).toHaveLength(8);
      expect(steps.slice(0, 3).map(step => [step.definition.op, step.setup])).toEqual([
        ['clearMeals', true],
        ['createMeal', true],
        ['createMeal', true],
      ]);
      expect(steps[3].definition.op).toBe('clearCombatants');
      expect(steps[3].setup).toBe(false);
    });

    it('marks query and battle steps for echoing', () => {
      const echoed = planSteps(leaderboard)
        .filter(step => step.echo)
        .map(step => step.definition.op);

      expect(echoed).toEqual([
        'listMeals',
        'getMealById',
        'getMealByName',
        'prepCombatant',
        'prepCombatant',
        'battle',
        'getCombatants',
      ]);
    });

    it('carries each endpoint expectation', () => {
      const [health, dbCheck, clearMeals] = planSteps(leaderboard);

      expect(health.expect.fields).toEqual({ status: 'healthy' });
      expect(dbCheck.expect.fields).toEqual({ database_status: 'healthy' });
      expect(clearMeals.expect.fields).toEqual({ status: 'success' });
    });

    it('rejects an unknown scenario', () => {
      expect(() => planSteps(leaderboard, 'desserts')).toThrow(
        "Unknown scenario 'desserts' (plan 'leaderboard' defines: health, meals, battle)"
      );
    });
  });
});
