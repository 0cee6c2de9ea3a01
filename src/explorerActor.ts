import type {
  BaseResource,
  ComplexResource,
  ExplorerDeathCause,
  ExplorerMemory,
  ExplorerReplyMap,
  ExplorerRequestMap,
  ExplorerState,
  ExplorerTickEvent,
  ExplorerView,
  KnowledgeMode,
  KnownPlanet,
  Outcome,
  PlanetId,
  PlanetReplyMap,
  PlanetRequestMap,
  PlanetRequestType,
  PlanetView,
  RejectionReason,
  ResourceKind,
  TickReport,
} from './models';
import type { ExplorerDefinition, SimulationSettings } from './simulationConfig';
import { createMailbox, type Mailbox } from './mailbox';
import { rejectExplorerEnvelope, type ExplorerEnvelope } from './actorMessages';
import {
  RECIPES,
  craftSteps,
  nextExecutableStep,
  type CraftPlan,
  type CraftStep,
} from './recipeEngine';
import {
  BASE_RESOURCES,
  addToInventory,
  copyInventory,
  countOf,
  removeFromInventory,
} from './resourceTypes';
import {
  FALLBACK_CHAIN,
  assessFeasibility,
  combineCapacity,
  couldSupply,
  getStrategy,
  knownPlanet,
  liveNeighbors,
  missingKinds,
} from './explorerStrategies';
import { reject } from './simErrors';
import { createRng } from './utils';

/**
 * Explorer Actor
 *
 * Owns one traveller: position, inventory, life budget and strategy memory.
 * On every tick it surveys the planet it stands on, gathers and combines
 * within its action budget, then moves at most one edge (or one rocket
 * jump). Each edge or jump costs one unit of life.
 *
 * Rejections from planets never throw: they are counted in memory and
 * reported in the tick report, and the next tick re-plans.
 */

export type ExplorerRules = Pick<
  SimulationSettings,
  | 'explorerLife'
  | 'actionsPerTick'
  | 'maxCapabilityFailures'
  | 'tieBreak'
  | 'purposeWeight'
  | 'rocketJumpMinHops'
  | 'seed'
>;

/** The explorer's only view of the world outside its own state. */
export interface ExplorerGateway {
  /** Current neighbours of a planet; undefined once it left the galaxy. */
  neighbors(planetId: PlanetId): PlanetId[] | undefined;
  /** Validate a move along one edge. */
  travel(from: PlanetId, to: PlanetId): Outcome;
  /** Validate a long-range jump to any live planet. */
  rocketJump(from: PlanetId, to: PlanetId): Outcome;
  ask<K extends PlanetRequestType>(
    planetId: PlanetId,
    type: K,
    request: PlanetRequestMap[K]
  ): Promise<PlanetReplyMap[K]>;
}

export function createExplorerMemory(knowledge: KnowledgeMode): ExplorerMemory {
  return {
    knowledge,
    planets: {},
    moveQueue: [],
    consecutiveCapabilityFailures: 0,
    rejections: {},
  };
}

export function createExplorerState(
  definition: ExplorerDefinition,
  rules: Pick<ExplorerRules, 'explorerLife'>
): ExplorerState {
  return {
    id: definition.id,
    name: definition.name ?? `Explorer ${definition.id}`,
    position: definition.start,
    inventory: copyInventory(definition.inventory ?? {}),
    life: definition.life ?? rules.explorerLife,
    status: 'alive',
    strategy: definition.strategy,
    target: definition.target,
    fallbackTarget: definition.fallbackTarget,
    produced: 0,
    memory: createExplorerMemory(definition.knowledge),
  };
}

export function explorerView(state: ExplorerState): ExplorerView {
  const view: ExplorerView = {
    id: state.id,
    name: state.name,
    position: state.position,
    inventory: copyInventory(state.inventory),
    life: state.life,
    strategy: state.strategy,
    target: state.target,
    produced: state.produced,
    alive: state.status === 'alive',
  };
  if (state.deathCause) view.deathCause = state.deathCause;
  return view;
}

// ─── Memory Updates ─────────────────────────────────────────────

function rememberPlanet(
  memory: ExplorerMemory,
  id: PlanetId,
  tick: number
): KnownPlanet {
  let planet = memory.planets[id];
  if (!planet) {
    planet = { id, alive: true, lastSeenTick: tick };
    memory.planets[id] = planet;
  }
  return planet;
}

function recordView(memory: ExplorerMemory, view: PlanetView, tick: number): void {
  const planet = rememberPlanet(memory, view.id, tick);
  planet.type = view.type;
  planet.alive = view.alive;
  planet.energy = view.energy;
  planet.supportedResources = [...view.supportedResources];
  planet.inventory = copyInventory(view.inventory);
  planet.generationsRemaining = view.generationsRemaining;
  planet.combinationsRemaining = view.combinationsRemaining;
  planet.rockets = view.rockets;
  planet.lastSeenTick = tick;
}

function forgetPlanet(memory: ExplorerMemory, planetId: PlanetId): void {
  const planet = memory.planets[planetId];
  if (planet) {
    planet.alive = false;
    planet.neighbors = [];
  }
  for (const other of Object.values(memory.planets)) {
    if (other.neighbors?.includes(planetId)) {
      other.neighbors = other.neighbors.filter((n) => n !== planetId);
    }
  }
  if (memory.moveQueue.includes(planetId)) memory.moveQueue = [];
}

function recordRejection(
  memory: ExplorerMemory,
  reason: RejectionReason,
  message: string,
  tick: number
): void {
  memory.rejections[reason] = (memory.rejections[reason] ?? 0) + 1;
  memory.lastRejection = { reason, message, tick };
  if (reason === 'CapabilityExceeded') {
    memory.consecutiveCapabilityFailures += 1;
  } else {
    memory.consecutiveCapabilityFailures = 0;
  }
}

// ─── Tick Logic ─────────────────────────────────────────────────

type GatherAction =
  | { kind: 'combine'; step: CraftStep }
  | { kind: 'harvest'; resource: ResourceKind }
  | { kind: 'generate'; resource: BaseResource };

/** Next combination a greedy explorer can run with what it carries. */
function opportunisticStep(state: ExplorerState): CraftStep | undefined {
  for (const recipe of RECIPES) {
    const [a, b] = recipe.inputs;
    // Finished targets are never spent
    if (a === state.target || b === state.target) continue;
    const needed = a === b ? 2 : 1;
    if (
      countOf(state.inventory, a) >= needed &&
      countOf(state.inventory, b) >= needed
    ) {
      return { a, b, product: recipe.product };
    }
  }
  return undefined;
}

function canCombineHere(planet: KnownPlanet | undefined): boolean {
  return planet !== undefined && combineCapacity(planet) > 0;
}

/** Intermediates of the plan, which are worth taking from a planet's stock. */
function wantedIntermediates(plan: CraftPlan, target: ComplexResource): ResourceKind[] {
  return plan.steps.map((s) => s.product).filter((p) => p !== target);
}

function chooseAction(
  state: ExplorerState,
  planet: KnownPlanet | undefined,
  plan: CraftPlan
): GatherAction | undefined {
  if (!planet || !planet.alive) return undefined;
  const opportunistic = getStrategy(state.strategy).opportunistic;
  const stock = planet.inventory ?? {};

  if (canCombineHere(planet)) {
    const step = opportunistic
      ? opportunisticStep(state)
      : nextExecutableStep(plan, state.inventory);
    if (step) return { kind: 'combine', step };
  }

  const harvestable: ResourceKind[] = opportunistic
    ? BASE_RESOURCES.filter((k) => countOf(stock, k) > 0)
    : [...missingKinds(plan), ...wantedIntermediates(plan, state.target)].filter(
        (k) => countOf(stock, k) > 0
      );
  if (harvestable.length > 0) return { kind: 'harvest', resource: harvestable[0] };

  if (planet.energy === 0 || planet.generationsRemaining === 0) return undefined;
  const generable = (planet.supportedResources ?? []).filter(
    (k) => opportunistic || countOf(plan.missing, k) > 0
  );
  if (generable.length > 0) return { kind: 'generate', resource: generable[0] };
  return undefined;
}

/** Whether the current planet could still advance the plan if time allowed. */
function stillUsefulHere(
  state: ExplorerState,
  planet: KnownPlanet | undefined,
  plan: CraftPlan
): boolean {
  if (!planet || !planet.alive) return false;
  if (canCombineHere(planet) && nextExecutableStep(plan, state.inventory)) {
    return true;
  }
  return missingKinds(plan).some((k) => couldSupply(planet, k));
}

/** Next target after `current`, skipping any already tried. */
function nextFallback(
  current: ComplexResource,
  configured: ComplexResource | undefined,
  tried: Set<ComplexResource>
): ComplexResource | undefined {
  if (configured && !tried.has(configured)) return configured;
  let candidate = FALLBACK_CHAIN[current];
  while (candidate && tried.has(candidate)) {
    candidate = FALLBACK_CHAIN[candidate];
  }
  return candidate ?? undefined;
}

export interface ExplorerActor {
  id: number;
  mailbox: Mailbox<ExplorerEnvelope>;
  /** Start serving the mailbox. Resolves when the actor has stopped. */
  run(): Promise<void>;
}

export function createExplorerActor(
  state: ExplorerState,
  rules: ExplorerRules,
  gateway: ExplorerGateway,
  channelCapacity: number
): ExplorerActor {
  const mailbox = createMailbox<ExplorerEnvelope>(channelCapacity);
  const rng = createRng(rules.seed * 31 + state.id * 7919 + 1);
  let running: Promise<void> | undefined;

  function die(cause: ExplorerDeathCause, events: ExplorerTickEvent[]): void {
    if (state.status === 'dead') return;
    state.status = 'dead';
    state.deathCause = cause;
    state.memory.moveQueue = [];
    events.push({ type: 'died', cause });
  }

  function rejected(
    events: ExplorerTickEvent[],
    tick: number,
    reason: RejectionReason,
    message: string,
    planetId?: PlanetId
  ): void {
    recordRejection(state.memory, reason, message, tick);
    events.push({ type: 'rejected', reason, message, planetId });
  }

  async function survey(tick: number): Promise<KnownPlanet> {
    const here = rememberPlanet(state.memory, state.position, tick);
    const around = gateway.neighbors(state.position);
    if (around !== undefined) {
      here.neighbors = around;
      for (const n of around) rememberPlanet(state.memory, n, tick);
    }
    const reply = await gateway.ask(state.position, 'query_state', {});
    if (reply.success) {
      recordView(state.memory, reply.view, tick);
    } else {
      here.alive = false;
    }
    return here;
  }

  /**
   * Switch to the next feasible fallback target. Returns false when the
   * chain is exhausted.
   */
  function fallBack(
    reason: RejectionReason,
    _tick: number,
    events: ExplorerTickEvent[]
  ): boolean {
    const tried = new Set<ComplexResource>([state.target]);
    let candidate = nextFallback(state.target, state.fallbackTarget, tried);
    while (candidate) {
      tried.add(candidate);
      const report = assessFeasibility(
        state.memory,
        state.position,
        state.inventory,
        candidate
      );
      if (report.verdict !== 'infeasible') {
        events.push({
          type: 'target_switched',
          from: state.target,
          to: candidate,
          reason,
        });
        state.target = candidate;
        state.produced = 0;
        state.memory.moveQueue = [];
        state.memory.consecutiveCapabilityFailures = 0;
        return true;
      }
      candidate = nextFallback(candidate, state.fallbackTarget, tried);
    }
    return false;
  }

  /** Returns false when the explorer died of being stranded. */
  function checkFeasibility(tick: number, events: ExplorerTickEvent[]): boolean {
    const strategy = getStrategy(state.strategy);
    const report = assessFeasibility(
      state.memory,
      state.position,
      state.inventory,
      state.target
    );
    if (report.verdict !== 'infeasible') return true;

    const message =
      report.unreachable.length > 0
        ? `no reachable source of ${report.unreachable.join(', ')} for ${state.target}`
        : `no reachable planet can combine ${state.target}`;
    rejected(events, tick, 'Disconnected', message);
    if (strategy.adaptive && fallBack('Disconnected', tick, events)) return true;
    die('stranded', events);
    return false;
  }

  async function perform(
    action: GatherAction,
    tick: number,
    events: ExplorerTickEvent[]
  ): Promise<boolean> {
    const planetId = state.position;

    if (action.kind === 'harvest') {
      const reply = await gateway.ask(planetId, 'explorer_harvest', {
        kind: action.resource,
      });
      if (!reply.success) {
        rejected(events, tick, reply.error, reply.message, planetId);
        return false;
      }
      addToInventory(state.inventory, reply.kind);
      events.push({ type: 'harvest', kind: reply.kind, planetId });
      return true;
    }

    if (action.kind === 'generate') {
      const reply = await gateway.ask(planetId, 'generate_resource', {
        kind: action.resource,
      });
      if (!reply.success) {
        rejected(events, tick, reply.error, reply.message, planetId);
        return false;
      }
      addToInventory(state.inventory, reply.kind);
      events.push({ type: 'generate', kind: reply.kind, planetId });
      if (reply.depleted) events.push({ type: 'planet_depleted', planetId });
      return true;
    }

    const { a, b } = action.step;
    removeFromInventory(state.inventory, a);
    removeFromInventory(state.inventory, b);
    const reply = await gateway.ask(planetId, 'request_combine', {
      a,
      b,
      source: 'explorer',
    });
    if (!reply.success) {
      for (const kind of reply.returned) addToInventory(state.inventory, kind);
      rejected(events, tick, reply.error, reply.message, planetId);
      return false;
    }
    addToInventory(state.inventory, reply.product);
    events.push({ type: 'combine', product: reply.product, planetId });
    if (reply.product === state.target) {
      state.produced += 1;
      events.push({
        type: 'target_produced',
        target: state.target,
        count: state.produced,
      });
    }
    state.memory.consecutiveCapabilityFailures = 0;
    return true;
  }

  async function gather(tick: number, events: ExplorerTickEvent[]): Promise<void> {
    for (let used = 0; used < rules.actionsPerTick; used++) {
      const here = knownPlanet(state.memory, state.position);
      const plan = craftSteps(state.target, state.inventory);
      const action = chooseAction(state, here, plan);
      if (!action) return;
      const ok = await perform(action, tick, events);
      // Refresh the planet after every action; other explorers share it
      const reply = await gateway.ask(state.position, 'query_state', {});
      if (reply.success) recordView(state.memory, reply.view, tick);
      if (!ok) return;
    }
  }

  function spendLife(events: ExplorerTickEvent[]): void {
    state.life -= 1;
    if (state.life <= 0) {
      state.life = 0;
      die('exhausted', events);
    }
  }

  async function tryRocketJump(
    destination: PlanetId,
    tick: number,
    events: ExplorerTickEvent[]
  ): Promise<boolean> {
    const here = knownPlanet(state.memory, state.position);
    if (!here || !here.alive || (here.type !== 'A' && here.type !== 'C')) {
      return false;
    }
    const from = state.position;
    const hasRocket = (here.rockets ?? 0) > 0;
    // Never spend the last unit of an A planet's pool on a rocket
    const reserve = here.type === 'A' ? 1 : 0;
    if (!hasRocket && (here.energy ?? 0) <= reserve) return false;

    const jump = gateway.rocketJump(from, destination);
    if (!jump.success) {
      rejected(events, tick, jump.error, jump.message, destination);
      return false;
    }
    if (!hasRocket) {
      const built = await gateway.ask(from, 'request_rocket', { action: 'create' });
      if (!built.success) {
        rejected(events, tick, built.error, built.message, from);
        return false;
      }
    }
    const used = await gateway.ask(from, 'request_rocket', { action: 'use' });
    if (!used.success) {
      rejected(events, tick, used.error, used.message, from);
      return false;
    }
    here.rockets = used.rockets;
    state.position = destination;
    state.memory.moveQueue = [];
    events.push({ type: 'travel', from, to: destination, viaRocket: true });
    spendLife(events);
    return true;
  }

  async function move(tick: number, events: ExplorerTickEvent[]): Promise<void> {
    const strategy = getStrategy(state.strategy);
    const plan = craftSteps(state.target, state.inventory);
    const here = knownPlanet(state.memory, state.position);

    if (!strategy.opportunistic && stillUsefulHere(state, here, plan)) return;

    const queue = state.memory.moveQueue;
    const queued =
      strategy.plansRoutes &&
      !strategy.adaptive &&
      queue.length > 0 &&
      liveNeighbors(state.memory, state.position).includes(queue[0]);

    if (!queued) {
      const decision = strategy.chooseRoute({
        position: state.position,
        inventory: state.inventory,
        target: state.target,
        memory: state.memory,
        plan,
        rng,
        tieBreak: rules.tieBreak,
        purposeWeight: rules.purposeWeight,
      });
      if (decision.kind === 'stay') {
        state.memory.moveQueue = [];
        return;
      }
      if (decision.kind === 'disconnected') {
        state.memory.moveQueue = [];
        rejected(events, tick, 'Disconnected', decision.message);
        if (strategy.adaptive) fallBack('Disconnected', tick, events);
        return;
      }
      state.memory.moveQueue = [...decision.path];
    }

    const path = state.memory.moveQueue;
    const destination = path[path.length - 1];
    if (
      strategy.plansRoutes &&
      destination !== undefined &&
      path.length >= rules.rocketJumpMinHops &&
      (await tryRocketJump(destination, tick, events))
    ) {
      return;
    }

    const next = path.shift();
    if (next === undefined) return;
    const from = state.position;
    const travel = gateway.travel(from, next);
    if (!travel.success) {
      state.memory.moveQueue = [];
      rejected(events, tick, travel.error, travel.message, next);
      return;
    }
    state.position = next;
    events.push({ type: 'travel', from, to: next, viaRocket: false });
    spendLife(events);
  }

  async function onTick(tick: number): Promise<TickReport> {
    const events: ExplorerTickEvent[] = [];
    const report = (): TickReport => ({
      explorerId: state.id,
      tick,
      alive: state.status === 'alive',
      events,
    });

    const here = await survey(tick);
    if (!here.alive) {
      die('planet_destroyed', events);
      return report();
    }
    if (!checkFeasibility(tick, events)) return report();

    await gather(tick, events);

    const strategy = getStrategy(state.strategy);
    if (
      strategy.adaptive &&
      state.memory.consecutiveCapabilityFailures >= rules.maxCapabilityFailures
    ) {
      fallBack('CapabilityExceeded', tick, events);
    }

    await move(tick, events);
    return report();
  }

  // ─── Message Handling ───────────────────────────────────────────

  function onGalaxyMap(request: ExplorerRequestMap['galaxy_map']): void {
    const present = new Set(request.planets.map((p) => p.id));
    for (const planet of Object.values(state.memory.planets)) {
      if (!present.has(planet.id)) forgetPlanet(state.memory, planet.id);
    }
    for (const descriptor of request.planets) {
      const planet = rememberPlanet(state.memory, descriptor.id, 0);
      planet.type = descriptor.type;
      planet.supportedResources = [...descriptor.supportedResources];
      planet.neighbors = [...(request.adjacency[descriptor.id] ?? [])];
      planet.alive = true;
    }
  }

  function onPlanetDestroyed(
    request: ExplorerRequestMap['planet_destroyed']
  ): ExplorerReplyMap['planet_destroyed'] {
    forgetPlanet(state.memory, request.planetId);
    const died = state.status === 'alive' && state.position === request.planetId;
    if (died) die('planet_destroyed', []);
    return { success: true, died };
  }

  function deadRejection() {
    return reject('ExplorerDead', `explorer ${state.id} is dead`);
  }

  /** Handle one message. Returns false when the message was `stop`. */
  async function dispatch(envelope: ExplorerEnvelope): Promise<boolean> {
    switch (envelope.type) {
      case 'tick':
        if (state.status === 'dead') {
          envelope.reply(deadRejection());
        } else {
          envelope.reply({
            success: true,
            report: await onTick(envelope.request.tick),
          });
        }
        return true;
      case 'query_state':
        envelope.reply({ success: true, view: explorerView(state) });
        return true;
      case 'planet_destroyed':
        envelope.reply(onPlanetDestroyed(envelope.request));
        return true;
      case 'galaxy_map':
        onGalaxyMap(envelope.request);
        envelope.reply({ success: true });
        return true;
      case 'configure': {
        if (state.status === 'dead') {
          envelope.reply(deadRejection());
          return true;
        }
        const patch = envelope.request;
        if (patch.strategy) state.strategy = patch.strategy;
        if (patch.target && patch.target !== state.target) {
          state.target = patch.target;
          state.produced = 0;
        }
        if (patch.fallbackTarget) state.fallbackTarget = patch.fallbackTarget;
        state.memory.moveQueue = [];
        state.memory.consecutiveCapabilityFailures = 0;
        envelope.reply({ success: true });
        return true;
      }
      case 'reset':
        state.memory = createExplorerMemory(state.memory.knowledge);
        envelope.reply({ success: true });
        return true;
      case 'kill':
        if (state.status === 'dead') {
          envelope.reply(deadRejection());
        } else {
          die(envelope.request.cause, []);
          envelope.reply({ success: true });
        }
        return true;
      case 'stop':
        envelope.reply({ success: true });
        return false;
    }
  }

  async function loop(): Promise<void> {
    for (;;) {
      const envelope = await mailbox.receive();
      if (envelope === undefined) return;
      if (!(await dispatch(envelope))) {
        for (const leftover of mailbox.close()) {
          rejectExplorerEnvelope(leftover, 'ExplorerDead', `explorer ${state.id} has stopped`);
        }
        return;
      }
    }
  }

  return {
    id: state.id,
    mailbox,
    run() {
      if (!running) running = loop();
      return running;
    },
  };
}
