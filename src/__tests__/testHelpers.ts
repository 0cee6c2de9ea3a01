import type { ExplorerMemory, KnownPlanet, PlanetState } from '../models';
import type {
  ExplorerDefinitionInput,
  PlanetDefinition,
  SimulationSettingsInput,
} from '../simulationConfig';
import {
  createPlanetActor,
  createPlanetState,
  type PlanetActor,
  type PlanetRules,
} from '../planetActor';
import { askPlanet } from '../actorMessages';
import { createExplorerMemory } from '../explorerActor';

/**
 * Shared test factories.
 * Each returns a valid default that tests override field by field.
 */

export const TEST_PLANET_RULES: PlanetRules = {
  poolCellCapacity: 5,
  sunrayCharge: 1,
  asteroidDamage: 1,
  autoBuildRockets: false,
};

/** Settings with no random environment and deterministic tie-breaks. */
export const QUIET_SETTINGS: SimulationSettingsInput = {
  sunrayRate: 0,
  asteroidRate: 0,
  tieBreak: 'lowest_id',
  snapshotTimeoutMs: 100,
};

export function createTestPlanet(
  overrides: Partial<PlanetDefinition> = {},
  rules: PlanetRules = TEST_PLANET_RULES
): PlanetState {
  return createPlanetState(
    {
      id: 1,
      type: 'B',
      resources: ['hydrogen'],
      ...overrides,
    },
    rules
  );
}

export interface RunningPlanet {
  actor: PlanetActor;
  /** Send `stop` and wait for the actor loop to finish. */
  stop(): Promise<void>;
}

export function startTestPlanet(
  overrides: Partial<PlanetDefinition> = {},
  rules: PlanetRules = TEST_PLANET_RULES,
  channelCapacity = 8
): RunningPlanet {
  const actor = createPlanetActor(
    createTestPlanet(overrides, rules),
    rules,
    channelCapacity
  );
  const running = actor.run();
  return {
    actor,
    async stop() {
      await askPlanet(actor.mailbox, 'stop', {});
      await running;
    },
  };
}

export function createTestKnownPlanet(
  overrides: Partial<KnownPlanet> & { id: number }
): KnownPlanet {
  return {
    alive: true,
    lastSeenTick: 0,
    ...overrides,
  };
}

export function createTestMemory(planets: KnownPlanet[]): ExplorerMemory {
  const memory = createExplorerMemory('incremental');
  for (const planet of planets) memory.planets[planet.id] = planet;
  return memory;
}

export function createTestExplorerDefinition(
  overrides: Partial<ExplorerDefinitionInput> = {}
): ExplorerDefinitionInput {
  return {
    id: 1,
    start: 1,
    strategy: 'best_path',
    target: 'water',
    ...overrides,
  };
}
