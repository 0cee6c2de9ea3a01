import type {
  BaseResource,
  ComplexResource,
  ExplorerMemory,
  Inventory,
  KnownPlanet,
  PlanetId,
  StrategyId,
  TieBreak,
} from './models';
import { craftSteps, type CraftPlan } from './recipeEngine';
import { BASE_RESOURCES, countOf } from './resourceTypes';
import {
  bfsDistances,
  createTopology,
  connect,
  hasNode,
  neighbors,
  shortestPath,
  type Topology,
} from './topology';
import { pickRandom, pickWeighted } from './utils';

/**
 * Explorer Strategies
 *
 * Four interchangeable movement policies behind one decision interface,
 * selected by configuration. They only decide where to go next; gathering,
 * combining and the life budget are handled by the explorer actor.
 *
 *  - greedy: random live neighbour, gathers anything on offer
 *  - greedy_with_purpose: neighbour choice weighted toward planets known to
 *    hold what the current target still needs
 *  - best_path: shortest route over the known map to the nearest planet
 *    that advances the recipe chain, exploring the nearest unknown planet
 *    when nothing useful is known yet
 *  - best_path_adaptive: best_path, re-planned every tick, switching to a
 *    fallback target when the current one becomes infeasible
 */

export interface StrategyContext {
  position: PlanetId;
  inventory: Inventory;
  target: ComplexResource;
  memory: ExplorerMemory;
  plan: CraftPlan;
  rng: () => number;
  tieBreak: TieBreak;
  purposeWeight: number;
}

export type RouteDecision =
  | { kind: 'move'; path: PlanetId[] } // next hops, current planet excluded
  | { kind: 'stay' }
  | { kind: 'disconnected'; message: string };

export interface ExplorerStrategy {
  id: StrategyId;
  /** Gathers and combines whatever is on offer instead of following the plan. */
  opportunistic: boolean;
  /** Keeps a multi-hop route between ticks and may jump by rocket. */
  plansRoutes: boolean;
  /** Re-checks feasibility every tick and falls back to another target. */
  adaptive: boolean;
  chooseRoute(ctx: StrategyContext): RouteDecision;
}

// ─── Knowledge Helpers ──────────────────────────────────────────

export function knownPlanet(
  memory: ExplorerMemory,
  id: PlanetId
): KnownPlanet | undefined {
  return memory.planets[id];
}

export function knownPlanets(memory: ExplorerMemory): KnownPlanet[] {
  return Object.values(memory.planets).sort((a, b) => a.id - b.id);
}

/** A planet counts as surveyed once its type and its neighbours are known. */
export function isSurveyed(planet: KnownPlanet): boolean {
  return planet.type !== undefined && planet.neighbors !== undefined;
}

/**
 * Graph of the live planets the explorer knows about, plus `include` even
 * when it is dead, so an explorer can still walk off a planet that just died.
 */
export function knownTopology(memory: ExplorerMemory, include?: PlanetId): Topology {
  const live = knownPlanets(memory).filter((p) => p.alive || p.id === include);
  const topology = createTopology(live.map((p) => p.id));
  for (const planet of live) {
    for (const other of planet.neighbors ?? []) {
      if (hasNode(topology, other) && other !== planet.id) {
        connect(topology, planet.id, other);
      }
    }
  }
  return topology;
}

/** Known live neighbours of a planet, ascending. */
export function liveNeighbors(
  memory: ExplorerMemory,
  id: PlanetId
): PlanetId[] {
  return (knownPlanet(memory, id)?.neighbors ?? [])
    .filter((n) => knownPlanet(memory, n)?.alive ?? true)
    .sort((a, b) => a - b);
}

/** Base kinds still missing for the plan, in canonical order. */
export function missingKinds(plan: CraftPlan): BaseResource[] {
  return BASE_RESOURCES.filter((k) => countOf(plan.missing, k) > 0);
}

/**
 * Whether a planet can hand over `kind`: it holds some, or it can generate
 * it with allowance left and a cell not known to be empty.
 */
export function couldSupply(planet: KnownPlanet, kind: BaseResource): boolean {
  if (!planet.alive) return false;
  if (countOf(planet.inventory ?? {}, kind) > 0) return true;
  return (
    (planet.supportedResources ?? []).includes(kind) &&
    planet.generationsRemaining !== 0 &&
    planet.energy !== 0
  );
}

/** Remaining combinations a known planet offers (Infinity when unbounded). */
export function combineCapacity(planet: KnownPlanet): number {
  if (!planet.alive) return 0;
  if (planet.type !== 'B' && planet.type !== 'C') return 0;
  if (planet.combinationsRemaining === undefined) {
    return planet.type === 'C' ? Infinity : 1;
  }
  return planet.combinationsRemaining ?? Infinity;
}

function isUseful(planet: KnownPlanet, plan: CraftPlan): boolean {
  const missing = missingKinds(plan);
  if (missing.some((k) => couldSupply(planet, k))) return true;
  return missing.length === 0 && plan.steps.length > 0 && combineCapacity(planet) > 0;
}

// ─── Feasibility ────────────────────────────────────────────────

export type Feasibility = 'feasible' | 'infeasible' | 'unknown';

export interface FeasibilityReport {
  verdict: Feasibility;
  /** Base kinds no reachable planet can provide. */
  unreachable: BaseResource[];
}

/**
 * Decide whether one more unit of `target` can be built from what is
 * reachable on the known map. The verdict is `unknown` while reachable
 * planets remain unsurveyed and the answer depends on them.
 */
export function assessFeasibility(
  memory: ExplorerMemory,
  position: PlanetId,
  inventory: Inventory,
  target: ComplexResource
): FeasibilityReport {
  const plan = craftSteps(target, inventory);
  const topology = knownTopology(memory, position);
  const reachable = [...bfsDistances(topology, position).keys()]
    .map((id) => knownPlanet(memory, id))
    .filter((p): p is KnownPlanet => p !== undefined && p.alive);
  const unexplored = reachable.some((p) => !isSurveyed(p));

  const unreachable = missingKinds(plan).filter(
    (kind) => !reachable.some((p) => couldSupply(p, kind))
  );
  const capacity = reachable.reduce((sum, p) => sum + combineCapacity(p), 0);
  const lacksCombination = capacity < plan.steps.length;

  if (unreachable.length === 0 && !lacksCombination) {
    return { verdict: 'feasible', unreachable };
  }
  return { verdict: unexplored ? 'unknown' : 'infeasible', unreachable };
}

/** Built-in fallback chain: each target degrades to a simpler one. */
export const FALLBACK_CHAIN: Record<ComplexResource, ComplexResource | null> = {
  ai_partner: 'dolphin',
  dolphin: 'life',
  robot: 'life',
  life: 'water',
  diamond: 'water',
  water: null,
};

// ─── Route Selection ────────────────────────────────────────────

function chooseAmong(
  candidates: PlanetId[],
  ctx: StrategyContext
): PlanetId | undefined {
  if (ctx.tieBreak === 'lowest_id') return candidates[0];
  return pickRandom(candidates, ctx.rng);
}

function greedyRoute(ctx: StrategyContext): RouteDecision {
  const next = chooseAmong(liveNeighbors(ctx.memory, ctx.position), ctx);
  return next === undefined ? { kind: 'stay' } : { kind: 'move', path: [next] };
}

function purposeRoute(ctx: StrategyContext): RouteDecision {
  const options = liveNeighbors(ctx.memory, ctx.position);
  if (options.length === 0) return { kind: 'stay' };

  const weight = (id: PlanetId): number => {
    const planet = knownPlanet(ctx.memory, id);
    const useful = planet !== undefined && isUseful(planet, ctx.plan);
    return 1 + (useful ? ctx.purposeWeight : 0);
  };

  let next: PlanetId | undefined;
  if (ctx.tieBreak === 'lowest_id') {
    const best = Math.max(...options.map(weight));
    next = options.find((id) => weight(id) === best);
  } else {
    next = pickWeighted(options, weight, ctx.rng);
  }
  return next === undefined ? { kind: 'stay' } : { kind: 'move', path: [next] };
}

/** Nearest planet by hop count among `candidates`, ties to the lower id. */
function nearest(
  distances: Map<PlanetId, number>,
  candidates: PlanetId[]
): PlanetId | undefined {
  let best: PlanetId | undefined;
  let bestDist = Infinity;
  for (const id of candidates) {
    const d = distances.get(id);
    if (d === undefined) continue;
    if (d < bestDist || (d === bestDist && best !== undefined && id < best)) {
      best = id;
      bestDist = d;
    }
  }
  return best;
}

function bestPathRoute(ctx: StrategyContext): RouteDecision {
  const topology = knownTopology(ctx.memory, ctx.position);
  if (!hasNode(topology, ctx.position)) return { kind: 'stay' };
  const distances = bfsDistances(topology, ctx.position);
  const others = knownPlanets(ctx.memory).filter(
    (p) => p.alive && p.id !== ctx.position && distances.has(p.id)
  );

  const useful = others.filter((p) => isUseful(p, ctx.plan)).map((p) => p.id);
  const unexplored = others.filter((p) => !isSurveyed(p)).map((p) => p.id);

  const destination = nearest(distances, useful) ?? nearest(distances, unexplored);
  if (destination === undefined) {
    if (neighbors(topology, ctx.position).length === 0) return { kind: 'stay' };
    return {
      kind: 'disconnected',
      message: `no reachable planet advances ${ctx.target}`,
    };
  }

  const path = shortestPath(topology, ctx.position, destination);
  if (!path || path.length < 2) return { kind: 'stay' };
  return { kind: 'move', path: path.slice(1) };
}

export const STRATEGIES: Record<StrategyId, ExplorerStrategy> = {
  greedy: {
    id: 'greedy',
    opportunistic: true,
    plansRoutes: false,
    adaptive: false,
    chooseRoute: greedyRoute,
  },
  greedy_with_purpose: {
    id: 'greedy_with_purpose',
    opportunistic: true,
    plansRoutes: false,
    adaptive: false,
    chooseRoute: purposeRoute,
  },
  best_path: {
    id: 'best_path',
    opportunistic: false,
    plansRoutes: true,
    adaptive: false,
    chooseRoute: bestPathRoute,
  },
  best_path_adaptive: {
    id: 'best_path_adaptive',
    opportunistic: false,
    plansRoutes: true,
    adaptive: true,
    chooseRoute: bestPathRoute,
  },
};

export function getStrategy(id: StrategyId): ExplorerStrategy {
  return STRATEGIES[id];
}
