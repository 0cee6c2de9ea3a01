import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { z } from 'zod';
import { defaultSupportedResources, isPlanetType } from './planetTypes';

// ─── Schemas ────────────────────────────────────────────────────

const idSchema = z.number().int().nonnegative();
const countSchema = z.number().int().nonnegative();
const rateSchema = z.number().min(0).max(1);

export const baseResourceSchema = z.enum([
  'hydrogen',
  'oxygen',
  'carbon',
  'silicon',
]);

export const complexResourceSchema = z.enum([
  'water',
  'diamond',
  'life',
  'robot',
  'dolphin',
  'ai_partner',
]);

export const inventorySchema = z
  .object({
    hydrogen: countSchema.optional(),
    oxygen: countSchema.optional(),
    carbon: countSchema.optional(),
    silicon: countSchema.optional(),
    water: countSchema.optional(),
    diamond: countSchema.optional(),
    life: countSchema.optional(),
    robot: countSchema.optional(),
    dolphin: countSchema.optional(),
    ai_partner: countSchema.optional(),
  })
  .strict();

export const strategySchema = z.enum([
  'greedy',
  'greedy_with_purpose',
  'best_path',
  'best_path_adaptive',
]);

export const planetDefinitionSchema = z.object({
  id: idSchema,
  type: z.enum(['A', 'B', 'C', 'D']),
  /** Initial charge; defaults to a full store. */
  energy: countSchema.optional(),
  /** Base kinds the planet can generate. */
  resources: z.array(baseResourceSchema).optional(),
  inventory: inventorySchema.optional(),
});

export const explorerDefinitionSchema = z.object({
  id: idSchema,
  name: z.string().min(1).optional(),
  start: idSchema,
  strategy: strategySchema.default('best_path_adaptive'),
  target: complexResourceSchema.default('ai_partner'),
  fallbackTarget: complexResourceSchema.optional(),
  inventory: inventorySchema.optional(),
  life: z.number().int().positive().optional(),
  knowledge: z.enum(['incremental', 'full']).default('incremental'),
});

export const galaxyDefinitionSchema = z.object({
  planets: z.array(planetDefinitionSchema).min(1),
  connections: z.array(z.tuple([idSchema, idSchema])).default([]),
  explorers: z.array(explorerDefinitionSchema).default([]),
});

export const eventSequenceSchema = z
  .string()
  .regex(/^[SA$-]*$/, 'event sequence may only contain S, A, - and $');

export const simulationSettingsSchema = z.object({
  seed: z.number().int().default(1),
  channelCapacity: z.number().int().positive().default(32),
  snapshotTimeoutMs: z.number().int().positive().default(250),
  sunrayRate: rateSchema.default(0.1),
  asteroidRate: rateSchema.default(0.05),
  eventSequence: eventSequenceSchema.optional(),
  sunrayCharge: z.number().int().positive().default(1),
  asteroidDamage: z.number().int().positive().default(1),
  poolCellCapacity: z.number().int().positive().default(5),
  explorerLife: z.number().int().positive().default(40),
  actionsPerTick: z.number().int().positive().default(8),
  maxCapabilityFailures: z.number().int().positive().default(3),
  tieBreak: z.enum(['random', 'lowest_id']).default('random'),
  purposeWeight: z.number().nonnegative().default(4),
  autoBuildRockets: z.boolean().default(true),
  rocketJumpMinHops: z.number().int().positive().default(3),
});

export const environmentPatchSchema = z.object({
  sunrayRate: rateSchema.optional(),
  asteroidRate: rateSchema.optional(),
  eventSequence: eventSequenceSchema.optional(),
});

export type PlanetDefinition = z.infer<typeof planetDefinitionSchema>;
export type ExplorerDefinition = z.infer<typeof explorerDefinitionSchema>;
export type GalaxyDefinition = z.infer<typeof galaxyDefinitionSchema>;
export type GalaxyDefinitionInput = z.input<typeof galaxyDefinitionSchema>;
export type ExplorerDefinitionInput = z.input<typeof explorerDefinitionSchema>;
export type SimulationSettings = z.infer<typeof simulationSettingsSchema>;
export type SimulationSettingsInput = z.input<typeof simulationSettingsSchema>;
export type EnvironmentPatch = z.infer<typeof environmentPatchSchema>;

export const DEFAULT_SETTINGS: SimulationSettings =
  simulationSettingsSchema.parse({});

// ─── Parsing ────────────────────────────────────────────────────

/** Validate a galaxy definition. Throws a ZodError on malformed input. */
export function parseGalaxyDefinition(input: unknown): GalaxyDefinition {
  return galaxyDefinitionSchema.parse(input);
}

/** Validate settings and fill in defaults. Throws a ZodError on bad values. */
export function parseSimulationSettings(
  input: unknown = {}
): SimulationSettings {
  return simulationSettingsSchema.parse(input);
}

export function parseEnvironmentPatch(input: unknown): EnvironmentPatch {
  return environmentPatchSchema.parse(input);
}

/**
 * Parse the plain-text galaxy format: one planet per line,
 * `id,type,neighbour,neighbour,...`. Blank lines are skipped. Edges are
 * made symmetric and deduplicated. Planets get their default generation
 * kinds, and the result carries no explorers.
 */
export function parseAdjacencyList(text: string): GalaxyDefinition {
  const planets: PlanetDefinition[] = [];
  const seen = new Set<string>();
  const connections: Array<[number, number]> = [];

  const lines = text.split(/\r?\n/);
  for (let lineNum = 0; lineNum < lines.length; lineNum++) {
    const line = lines[lineNum].trim();
    if (line === '') continue;
    const row = lineNum + 1;

    const fields = line.split(',').map((f) => f.trim());
    if (fields.length < 2) {
      throw new Error(`Row ${row}: id or type missing`);
    }
    const [rawId, rawType, ...rawNeighbors] = fields;
    const id = parseId(rawId, row);
    const type = rawType.toUpperCase();
    if (!isPlanetType(type)) {
      throw new Error(`Row ${row}: unknown planet type '${rawType}'`);
    }
    planets.push({ id, type, resources: defaultSupportedResources(id, type) });

    for (const raw of rawNeighbors) {
      if (raw === '') continue;
      const other = parseId(raw, row);
      const key = id < other ? `${id}-${other}` : `${other}-${id}`;
      if (seen.has(key)) continue;
      seen.add(key);
      connections.push([id, other]);
    }
  }

  return parseGalaxyDefinition({ planets, connections, explorers: [] });
}

function parseId(raw: string, row: number): number {
  if (!/^\d+$/.test(raw)) {
    throw new Error(`Row ${row}: value '${raw}' is not a planet id`);
  }
  return Number(raw);
}

/** Load a galaxy from disk: `.json` files are definitions, anything else is an adjacency list. */
export async function loadGalaxyFile(path: string): Promise<GalaxyDefinition> {
  const text = await readFile(path, 'utf8');
  if (extname(path).toLowerCase() === '.json') {
    const parsed: unknown = JSON.parse(text);
    return parseGalaxyDefinition(parsed);
  }
  return parseAdjacencyList(text);
}
