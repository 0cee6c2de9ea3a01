export type * from './models';

export {
  createOrchestrator,
  type Orchestrator,
  type EnvironmentResult,
  type SimulationPhase,
  type TickSummary,
} from './orchestrator';

export {
  DEFAULT_SETTINGS,
  galaxyDefinitionSchema,
  simulationSettingsSchema,
  loadGalaxyFile,
  parseAdjacencyList,
  parseGalaxyDefinition,
  parseSimulationSettings,
  type ExplorerDefinition,
  type GalaxyDefinition,
  type GalaxyDefinitionInput,
  type PlanetDefinition,
  type SimulationSettings,
  type SimulationSettingsInput,
} from './simulationConfig';

export {
  RECIPES,
  combine,
  craftSteps,
  type CraftPlan,
  type CraftStep,
  type Recipe,
} from './recipeEngine';

export {
  components,
  connect,
  createTopology,
  criticalNodes,
  isConnected,
  neighbors,
  removeNode,
  shortestPath,
  type Topology,
} from './topology';

export { PLANET_TYPE_DEFINITIONS, type PlanetTypeDefinition } from './planetTypes';
export { RESOURCE_DEFINITIONS, type ResourceDefinition } from './resourceTypes';
export { STRATEGIES, FALLBACK_CHAIN, type ExplorerStrategy } from './explorerStrategies';
export type { EventBus, SimEvent, SimEventMap } from './simEvents';
export { SimulationStateError, StructuralInvariantError } from './simErrors';
