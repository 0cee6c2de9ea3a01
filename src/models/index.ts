export type BaseResource = 'hydrogen' | 'oxygen' | 'carbon' | 'silicon';

export type ComplexResource =
  | 'water'
  | 'diamond'
  | 'life'
  | 'robot'
  | 'dolphin'
  | 'ai_partner';

export type ResourceKind = BaseResource | ComplexResource;

/** Resource kind → unit count. Missing keys mean zero. */
export type Inventory = Partial<Record<ResourceKind, number>>;

export type PlanetType = 'A' | 'B' | 'C' | 'D';

export type PlanetId = number;
export type ExplorerId = number;

export type StrategyId =
  | 'greedy'
  | 'greedy_with_purpose'
  | 'best_path'
  | 'best_path_adaptive';

export type KnowledgeMode = 'incremental' | 'full';

export type TieBreak = 'random' | 'lowest_id';

/**
 * Recoverable outcome taxonomy. Every rejection an actor returns carries
 * exactly one of these; none of them terminate the simulation.
 */
export type RejectionReason =
  | 'NoRecipe'
  | 'CapabilityExceeded'
  | 'InsufficientInventory'
  | 'PlanetUnavailable'
  | 'ExplorerDead'
  | 'Disconnected';

export interface Rejection {
  success: false;
  error: RejectionReason;
  message: string;
}

export type Outcome<T extends object = object> = ({ success: true } & T) | Rejection;

// ─── Planets ────────────────────────────────────────────────────

export type PlanetStatus = 'active' | 'dead';

/** Where the inputs of a combination come from and where the product goes. */
export type CombineSource = 'explorer' | 'planet';

export type RocketAction = 'create' | 'use';

export interface PlanetState {
  id: PlanetId;
  type: PlanetType;
  status: PlanetStatus;
  energy: number; // charged units
  cellCapacity: number;
  supportedResources: BaseResource[];
  inventory: Inventory;
  rockets: number;
  generationsPerformed: number;
  combinationsPerformed: number;
}

/** Read-only copy of a planet's state, as answered to `query_state`. */
export interface PlanetView {
  id: PlanetId;
  type: PlanetType;
  alive: boolean;
  energy: number;
  cellCapacity: number;
  rockets: number;
  inventory: Inventory;
  supportedResources: BaseResource[];
  generationsRemaining: number | null; // null = unbounded
  combinationsRemaining: number | null; // null = unbounded
}

export interface PlanetRequestMap {
  generate_resource: { kind?: BaseResource };
  request_combine: { a: ResourceKind; b: ResourceKind; source: CombineSource };
  request_rocket: { action: RocketAction };
  explorer_harvest: { kind: ResourceKind };
  sunray_arrival: Record<string, never>;
  asteroid_arrival: Record<string, never>;
  query_state: Record<string, never>;
  stop: Record<string, never>;
}

export type PlanetRequestType = keyof PlanetRequestMap;

export type CombineReply =
  | { success: true; product: ComplexResource }
  | (Rejection & { returned: ResourceKind[] });

export interface PlanetReplyMap {
  /** `depleted` is set when the request spent a pool cell's last unit. */
  generate_resource: Outcome<{ kind: BaseResource; depleted?: true }>;
  request_combine: CombineReply;
  request_rocket: Outcome<{ rockets: number; depleted?: true }>;
  explorer_harvest: Outcome<{ kind: ResourceKind }>;
  sunray_arrival: Outcome<{ energy: number; rocketBuilt: boolean }>;
  asteroid_arrival: Outcome<{
    deflected: boolean;
    destroyed: boolean;
    energy: number;
  }>;
  query_state: Outcome<{ view: PlanetView }>;
  stop: Outcome;
}

// ─── Explorers ──────────────────────────────────────────────────

export type ExplorerStatus = 'alive' | 'dead';

export type ExplorerDeathCause =
  | 'exhausted'
  | 'stranded'
  | 'planet_destroyed'
  | 'killed';

/** Static facts about a planet, as published in the galaxy map. */
export interface PlanetDescriptor {
  id: PlanetId;
  type: PlanetType;
  supportedResources: BaseResource[];
}

/** What an explorer has learned about one planet. */
export interface KnownPlanet {
  id: PlanetId;
  type?: PlanetType;
  alive: boolean;
  energy?: number;
  supportedResources?: BaseResource[];
  inventory?: Inventory;
  generationsRemaining?: number | null;
  combinationsRemaining?: number | null;
  rockets?: number;
  neighbors?: PlanetId[];
  lastSeenTick: number;
}

export interface ExplorerMemory {
  knowledge: KnowledgeMode;
  planets: Record<PlanetId, KnownPlanet>;
  moveQueue: PlanetId[];
  consecutiveCapabilityFailures: number;
  rejections: Partial<Record<RejectionReason, number>>;
  lastRejection?: { reason: RejectionReason; message: string; tick: number };
}

export interface ExplorerState {
  id: ExplorerId;
  name: string;
  position: PlanetId;
  inventory: Inventory;
  life: number;
  status: ExplorerStatus;
  deathCause?: ExplorerDeathCause;
  strategy: StrategyId;
  target: ComplexResource;
  fallbackTarget?: ComplexResource;
  produced: number; // target units completed so far
  memory: ExplorerMemory;
}

/** Read-only copy of an explorer's state, as answered to `query_state`. */
export interface ExplorerView {
  id: ExplorerId;
  name: string;
  position: PlanetId;
  inventory: Inventory;
  life: number;
  strategy: StrategyId;
  target: ComplexResource;
  produced: number;
  alive: boolean;
  deathCause?: ExplorerDeathCause;
}

export interface ExplorerConfigPatch {
  strategy?: StrategyId;
  target?: ComplexResource;
  fallbackTarget?: ComplexResource;
}

/** Things that happened to an explorer during one tick, for the orchestrator log. */
export type ExplorerTickEvent =
  | { type: 'travel'; from: PlanetId; to: PlanetId; viaRocket: boolean }
  | { type: 'harvest'; kind: ResourceKind; planetId: PlanetId }
  | { type: 'generate'; kind: BaseResource; planetId: PlanetId }
  | { type: 'combine'; product: ComplexResource; planetId: PlanetId }
  | { type: 'planet_depleted'; planetId: PlanetId }
  | {
      type: 'rejected';
      reason: RejectionReason;
      message: string;
      planetId?: PlanetId;
    }
  | { type: 'target_produced'; target: ComplexResource; count: number }
  | {
      type: 'target_switched';
      from: ComplexResource;
      to: ComplexResource;
      reason: RejectionReason;
    }
  | { type: 'died'; cause: ExplorerDeathCause };

export interface TickReport {
  explorerId: ExplorerId;
  tick: number;
  alive: boolean;
  events: ExplorerTickEvent[];
}

export interface ExplorerRequestMap {
  tick: { tick: number };
  query_state: Record<string, never>;
  planet_destroyed: { planetId: PlanetId };
  galaxy_map: {
    adjacency: Record<PlanetId, PlanetId[]>;
    planets: PlanetDescriptor[];
  };
  configure: ExplorerConfigPatch;
  reset: Record<string, never>;
  kill: { cause: ExplorerDeathCause };
  stop: Record<string, never>;
}

export type ExplorerRequestType = keyof ExplorerRequestMap;

export interface ExplorerReplyMap {
  tick: Outcome<{ report: TickReport }>;
  query_state: Outcome<{ view: ExplorerView }>;
  planet_destroyed: Outcome<{ died: boolean }>;
  galaxy_map: Outcome;
  configure: Outcome;
  reset: Outcome;
  kill: Outcome;
  stop: Outcome;
}

// ─── Snapshots ──────────────────────────────────────────────────

export interface UnknownActorSnapshot {
  id: number;
  status: 'unknown';
}

export type PlanetSnapshot =
  | (Pick<
      PlanetView,
      'id' | 'type' | 'inventory' | 'energy' | 'rockets' | 'alive'
    > & { status: 'known' })
  | UnknownActorSnapshot;

export type ExplorerSnapshot =
  | (Pick<
      ExplorerView,
      | 'id'
      | 'position'
      | 'inventory'
      | 'life'
      | 'strategy'
      | 'alive'
      | 'target'
      | 'produced'
    > & { status: 'known' })
  | UnknownActorSnapshot;

export interface GalaxySnapshot {
  tick: number;
  planets: readonly PlanetSnapshot[];
  explorers: readonly ExplorerSnapshot[];
  connected: boolean;
  criticalNodes: readonly PlanetId[];
}

// ─── Log ────────────────────────────────────────────────────────

export type LogEntryType =
  | 'simulation_started'
  | 'simulation_paused'
  | 'simulation_resumed'
  | 'simulation_stopped'
  | 'tick_completed'
  | 'sunray'
  | 'asteroid_hit'
  | 'asteroid_deflected'
  | 'rocket_built'
  | 'planet_destroyed'
  | 'topology_changed'
  | 'travel'
  | 'resource_generated'
  | 'resource_harvested'
  | 'resource_combined'
  | 'request_rejected'
  | 'target_produced'
  | 'target_switched'
  | 'explorer_configured'
  | 'explorer_died';

export interface LogEntryMeta {
  count?: number;
  quantity?: number;
  resource?: ResourceKind;
  planetId?: PlanetId;
}

export interface LogEntry {
  tick: number;
  realTime: number; // Date.now() when logged
  type: LogEntryType;
  message: string;
  actor?: string;
  meta?: LogEntryMeta;
}
