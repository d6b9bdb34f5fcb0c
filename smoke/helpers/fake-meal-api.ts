import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { z } from 'zod';

/**
 * In-process stand-in for the meal battle API used by tests
 * Serves both deployment variants (leaderboard and flat list) from one
 * in-memory kitchen, records every request, and lets tests override routes
 */

export interface RecordedRequest {
  method: string;

  /** Raw request target, exactly as sent (percent-encoding preserved) */
  url: string;

  body?: unknown;
}

export interface CannedResponse {
  status?: number;

  /** Strings are sent verbatim; anything else as JSON */
  body: unknown;
}

interface StoredMeal {
  id: number;
  meal: string;
  cuisine: string;
  price: number;
  difficulty: 'LOW' | 'MED' | 'HIGH';
  battles: number;
  wins: number;
  deleted: boolean;
}

export interface FakeMealApi {
  /** Base URL including the /api prefix */
  baseUrl: string;
  requests: RecordedRequest[];

  /** Replace the response for one method and raw path, e.g. ('GET', '/api/battle') */
  override: (method: string, path: string, response: CannedResponse) => void;

  stop: () => Promise<void>;
}

const API_PREFIX = '/api';
const MAX_COMBATANTS = 2;
const DIFFICULTY_MODIFIER = { HIGH: 1, MED: 2, LOW: 3 } as const;

const createMealSchema = z.object({
  meal: z.string().min(1),
  cuisine: z.string().min(1),
  price: z.number().positive(),
  difficulty: z.enum(['LOW', 'MED', 'HIGH']),
});

const prepCombatantSchema = z.object({ meal: z.string().min(1) });

class BadRequest extends Error {}

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(typeof body === 'string' ? body : JSON.stringify(body));
}

async function readBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  const text = Buffer.concat(chunks).toString('utf-8');
  if (text === '') {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new BadRequest('Request body is not valid JSON');
  }
}

/**
 * Meal and combatant state behind the fake API
 */
class Kitchen {
  private meals: StoredMeal[] = [];
  private nextId = 1;
  private combatants: StoredMeal[] = [];

  clearMeals(): void {
    this.meals = [];
    this.nextId = 1;
  }

  createMeal(input: z.infer<typeof createMealSchema>): StoredMeal {
    if (this.meals.some(meal => meal.meal === input.meal && !meal.deleted)) {
      throw new BadRequest(`Meal with name '${input.meal}' already exists`);
    }
    const meal: StoredMeal = { id: this.nextId++, ...input, battles: 0, wins: 0, deleted: false };
    this.meals.push(meal);
    return meal;
  }

  deleteMeal(id: number): void {
    const meal = this.findById(id);
    meal.deleted = true;
  }

  findById(id: number): StoredMeal {
    const meal = this.meals.find(candidate => candidate.id === id);
    if (!meal) {
      throw new BadRequest(`Meal with ID ${id} not found`);
    }
    if (meal.deleted) {
      throw new BadRequest(`Meal with ID ${id} has been deleted`);
    }
    return meal;
  }

  findByName(name: string): StoredMeal {
    const meal = this.meals.find(candidate => candidate.meal === name && !candidate.deleted);
    if (!meal) {
      throw new BadRequest(`Meal with name ${name} not found`);
    }
    return meal;
  }

  listMeals(): StoredMeal[] {
    return this.meals
      .filter(meal => !meal.deleted)
      .sort((a, b) => b.wins - a.wins || a.id - b.id);
  }

  clearCombatants(): void {
    this.combatants = [];
  }

  prepCombatant(name: string): StoredMeal[] {
    if (this.combatants.length >= MAX_COMBATANTS) {
      throw new BadRequest('Combatant list is full, cannot add more combatants.');
    }
    this.combatants.push(this.findByName(name));
    return this.combatants;
  }

  getCombatants(): StoredMeal[] {
    return this.combatants;
  }

  /**
   * Higher score wins: price * cuisine length, minus a difficulty modifier
   */
  battle(): StoredMeal {
    if (this.combatants.length < MAX_COMBATANTS) {
      throw new BadRequest('Two combatants must be prepped for a battle.');
    }
    const [first, second] = this.combatants;
    const [winner, loser] = score(first) >= score(second) ? [first, second] : [second, first];
    winner.battles += 1;
    winner.wins += 1;
    loser.battles += 1;
    this.combatants = this.combatants.filter(meal => meal !== loser);
    return winner;
  }
}

function score(meal: StoredMeal): number {
  return meal.price * meal.cuisine.length - DIFFICULTY_MODIFIER[meal.difficulty];
}

function present(meal: StoredMeal): Omit<StoredMeal, 'deleted'> {
  const { deleted: _deleted, ...rest } = meal;
  return rest;
}

function parseId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id)) {
    throw new BadRequest(`Invalid meal ID '${raw}'`);
  }
  return id;
}

function route(kitchen: Kitchen, method: string, url: URL, body: unknown): CannedResponse {
  const pathname = url.pathname.slice(API_PREFIX.length);
  const key = `${method} ${pathname}`;

  switch (key) {
    case 'GET /health':
      return { body: { status: 'healthy' } };
    case 'GET /db-check':
      return { body: { database_status: 'healthy' } };
    case 'DELETE /clear-meals':
      kitchen.clearMeals();
      return { body: { status: 'success' } };
    case 'POST /create-meal': {
      const parsed = createMealSchema.safeParse(body);
      if (!parsed.success) {
        throw new BadRequest('Invalid input, all fields are required with valid values');
      }
      const meal = kitchen.createMeal(parsed.data);
      return { status: 201, body: { status: 'success', meal: meal.meal } };
    }
    case 'GET /leaderboard':
      return { body: { status: 'success', leaderboard: kitchen.listMeals().map(present) } };
    case 'GET /get-all-meals':
      return { body: { status: 'success', meals: kitchen.listMeals().map(present) } };
    case 'GET /get-meal-by-name': {
      const name = url.searchParams.get('meal');
      if (name === null) {
        throw new BadRequest('Meal name is required');
      }
      return { body: { status: 'success', meal: present(kitchen.findByName(name)) } };
    }
    case 'POST /clear-combatants':
    case 'DELETE /clear-combatants':
      kitchen.clearCombatants();
      return { body: { status: 'success', message: 'Combatants cleared.' } };
    case 'POST /prep-combatant': {
      const parsed = prepCombatantSchema.safeParse(body);
      if (!parsed.success) {
        throw new BadRequest('You must name a combatant');
      }
      const combatants = kitchen.prepCombatant(parsed.data.meal);
      return {
        body: {
          status: 'success',
          message: `Combatant '${parsed.data.meal}' prepared.`,
          combatants: combatants.map(present),
        },
      };
    }
    case 'GET /get-combatants':
      return { body: { status: 'success', combatants: kitchen.getCombatants().map(present) } };
    case 'GET /battle':
    case 'POST /battle':
      return { body: { status: 'success', winner: kitchen.battle().meal } };
  }

  const segments = pathname.split('/').filter(segment => segment !== '');
  if (segments.length === 2) {
    const [action, raw] = segments;
    if (method === 'DELETE' && action === 'delete-meal') {
      kitchen.deleteMeal(parseId(raw));
      return { body: { status: 'success', message: `Meal with ID ${raw} deleted` } };
    }
    if (method === 'GET' && action === 'get-meal-by-id') {
      return { body: { status: 'success', meal: present(kitchen.findById(parseId(raw))) } };
    }
    if (method === 'GET' && action === 'get-meal-by-name') {
      return { body: { status: 'success', meal: present(kitchen.findByName(decodeURIComponent(raw))) } };
    }
  }

  return { status: 404, body: { error: 'Not Found' } };
}

/**
 * Start the fake API on an ephemeral local port
 */
export async function startFakeMealApi(): Promise<FakeMealApi> {
  const kitchen = new Kitchen();
  const requests: RecordedRequest[] = [];
  const overrides = new Map<string, CannedResponse>();

  const handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const method = req.method ?? 'GET';
    const rawUrl = req.url ?? '/';
    const recorded: RecordedRequest = { method, url: rawUrl };
    requests.push(recorded);

    try {
      const body = await readBody(req);
      recorded.body = body;

      const url = new URL(rawUrl, 'http://localhost');
      const override = overrides.get(`${method} ${url.pathname}`);
      const response = override ?? route(kitchen, method, url, body);
      sendJson(res, response.status ?? 200, response.body);
    } catch (error) {
      if (error instanceof BadRequest) {
        sendJson(res, 400, { error: error.message });
        return;
      }
      sendJson(res, 500, { error: String(error) });
    }
  };

  const server: Server = createServer((req, res) => {
    void handle(req, res);
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => resolve());
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Fake meal API did not bind a TCP port');
  }
  const { port }: AddressInfo = address;

  return {
    baseUrl: `http://127.0.0.1:${port}${API_PREFIX}`,
    requests,
    override: (method, path, response) => {
      overrides.set(`${method} ${path}`, response);
    },
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close(error => (error ? reject(error) : resolve()));
      }),
  };
}
