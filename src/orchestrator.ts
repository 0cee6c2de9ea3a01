import type {
  ExplorerConfigPatch,
  ExplorerDeathCause,
  ExplorerId,
  ExplorerTickEvent,
  GalaxySnapshot,
  LogEntry,
  Outcome,
  PlanetDescriptor,
  PlanetId,
  PlanetReplyMap,
  TickReport,
} from './models';
import {
  parseEnvironmentPatch,
  parseGalaxyDefinition,
  parseSimulationSettings,
  type GalaxyDefinitionInput,
  type SimulationSettings,
  type SimulationSettingsInput,
} from './simulationConfig';
import { createMailbox } from './mailbox';
import { askExplorer, askPlanet, type PlanetEnvelope } from './actorMessages';
import {
  createPlanetActor,
  createPlanetState,
  type PlanetActor,
} from './planetActor';
import {
  createExplorerActor,
  createExplorerState,
  type ExplorerActor,
  type ExplorerGateway,
} from './explorerActor';
import {
  areAdjacent,
  components,
  connect,
  createTopology,
  criticalNodes as findCriticalNodes,
  hasNode,
  isConnected,
  neighbors,
  nodes,
  removeNode,
  toAdjacencyRecord,
} from './topology';
import { createEventBus, type EventBus } from './simEvents';
import { addLog } from './logSystem';
import { collectSnapshot } from './snapshotSystem';
import { getResourceDefinition } from './resourceTypes';
import { SimulationStateError, StructuralInvariantError, reject } from './simErrors';
import { createRng } from './utils';

/**
 * Orchestrator
 *
 * Builds the galaxy, spawns one actor per planet and per explorer, and
 * drives the global tick. It never touches actor state directly: every
 * interaction is a message over a bounded mailbox.
 *
 * Each tick runs five phases in order:
 *
 *   1. Environment: sunrays and asteroids, from the event sequence or by
 *      per-planet probability
 *   2. Destruction: dead planets leave the topology, critical nodes are
 *      recomputed, explorers are told (and die if standing on one)
 *   3. Explorer round: every live explorer gets `tick`, all reports awaited
 *   4. Depletion: planets whose pool an explorer emptied go the way of
 *      phase 2
 *   5. Bookkeeping: log entries and `tick_completed`
 *
 * Every message of tick N is answered before tick N+1 starts.
 */

export type SimulationPhase = 'waiting_start' | 'running' | 'paused' | 'stopped';

export interface TickSummary {
  tick: number;
  destroyedPlanets: PlanetId[];
  reports: TickReport[];
  paused: boolean;
}

export interface EnvironmentResult {
  planetId: PlanetId;
  outcome:
    | PlanetReplyMap['sunray_arrival']
    | PlanetReplyMap['asteroid_arrival'];
}

export interface Orchestrator {
  readonly events: EventBus;
  start(): Promise<void>;
  tick(): Promise<TickSummary>;
  /** Run up to `ticks` ticks; stops early if the simulation pauses. */
  run(ticks: number): Promise<TickSummary[]>;
  pause(): void;
  resume(): void;
  shutdown(): Promise<void>;
  snapshot(): Promise<GalaxySnapshot>;
  configure(explorerId: ExplorerId, patch: ExplorerConfigPatch): Promise<Outcome>;
  configureEnvironment(patch: unknown): void;
  sendSunray(planetIds?: PlanetId[]): Promise<EnvironmentResult[]>;
  sendAsteroid(planetIds?: PlanetId[]): Promise<EnvironmentResult[]>;
  killExplorer(explorerId: ExplorerId): Promise<Outcome>;
  resetExplorer(explorerId: ExplorerId): Promise<Outcome>;
  getLog(): readonly LogEntry[];
  criticalNodes(): PlanetId[];
  isConnected(): boolean;
  getPhase(): SimulationPhase;
  getTick(): number;
  getSettings(): Readonly<SimulationSettings>;
}

interface ExplorerEntry {
  actor: ExplorerActor;
  name: string;
  fullKnowledge: boolean;
}

function planetName(id: PlanetId): string {
  return `Planet ${id}`;
}

export function createOrchestrator(
  definition: GalaxyDefinitionInput,
  settingsInput: SimulationSettingsInput = {}
): Orchestrator {
  const settings = parseSimulationSettings(settingsInput);
  const galaxy = parseGalaxyDefinition(definition);
  const events = createEventBus();
  const log: LogEntry[] = [];
  const rng = createRng(settings.seed);

  // ── Topology ──
  const seenPlanets = new Set<PlanetId>();
  for (const p of galaxy.planets) {
    if (seenPlanets.has(p.id)) {
      throw new StructuralInvariantError(`Duplicate planet id: ${p.id}`);
    }
    seenPlanets.add(p.id);
  }
  const topology = createTopology(galaxy.planets.map((p) => p.id));
  for (const [a, b] of galaxy.connections) connect(topology, a, b);
  let critical = findCriticalNodes(topology);

  // ── Planets ──
  const planetRules = {
    poolCellCapacity: settings.poolCellCapacity,
    sunrayCharge: settings.sunrayCharge,
    asteroidDamage: settings.asteroidDamage,
    autoBuildRockets: settings.autoBuildRockets,
  };
  const planets = new Map<PlanetId, PlanetActor>();
  const descriptors: PlanetDescriptor[] = [];
  for (const def of galaxy.planets) {
    const state = createPlanetState(def, planetRules);
    planets.set(
      def.id,
      createPlanetActor(state, planetRules, settings.channelCapacity)
    );
    descriptors.push({
      id: state.id,
      type: state.type,
      supportedResources: [...state.supportedResources],
    });
  }

  // Requests to an unknown planet go through a closed mailbox and come back
  // as PlanetUnavailable
  const nowhere = createMailbox<PlanetEnvelope>(1);
  nowhere.close();

  const gateway: ExplorerGateway = {
    neighbors(planetId) {
      return hasNode(topology, planetId) ? neighbors(topology, planetId) : undefined;
    },
    travel(from, to) {
      if (!hasNode(topology, to)) {
        return reject('PlanetUnavailable', `${planetName(to)} is gone`);
      }
      if (!areAdjacent(topology, from, to)) {
        return reject('Disconnected', `no edge between ${from} and ${to}`);
      }
      return { success: true };
    },
    rocketJump(_from, to) {
      if (!hasNode(topology, to)) {
        return reject('PlanetUnavailable', `${planetName(to)} is gone`);
      }
      return { success: true };
    },
    ask(planetId, type, request) {
      return askPlanet(planets.get(planetId)?.mailbox ?? nowhere, type, request);
    },
  };

  // ── Explorers ──
  const explorerRules = {
    explorerLife: settings.explorerLife,
    actionsPerTick: settings.actionsPerTick,
    maxCapabilityFailures: settings.maxCapabilityFailures,
    tieBreak: settings.tieBreak,
    purposeWeight: settings.purposeWeight,
    rocketJumpMinHops: settings.rocketJumpMinHops,
    seed: settings.seed,
  };
  const explorers = new Map<ExplorerId, ExplorerEntry>();
  for (const def of galaxy.explorers) {
    if (explorers.has(def.id)) {
      throw new StructuralInvariantError(`Duplicate explorer id: ${def.id}`);
    }
    if (!seenPlanets.has(def.start)) {
      throw new StructuralInvariantError(
        `Explorer ${def.id} starts on unknown planet ${def.start}`
      );
    }
    const state = createExplorerState(def, explorerRules);
    explorers.set(def.id, {
      actor: createExplorerActor(
        state,
        explorerRules,
        gateway,
        settings.channelCapacity
      ),
      name: state.name,
      fullKnowledge: def.knowledge === 'full',
    });
  }
  const liveExplorers = new Set<ExplorerId>(explorers.keys());

  // ── Run State ──
  let phase: SimulationPhase = 'waiting_start';
  let tickNumber = 0;
  let sequence = settings.eventSequence ?? '';
  let sequenceCursor = 0;
  let sunrayRate = settings.sunrayRate;
  let asteroidRate = settings.asteroidRate;
  const loops: Array<Promise<void>> = [];
  let fault: unknown;
  // Planets emptied by explorer requests during the current round
  let depletedThisRound: PlanetId[] = [];

  function watch(loop: Promise<void>): void {
    loops.push(
      loop.catch((err: unknown) => {
        if (fault === undefined) fault = err;
      })
    );
  }

  function requireActive(operation: string): void {
    if (phase === 'waiting_start') {
      throw new SimulationStateError(`${operation}() called before start()`);
    }
    if (phase === 'stopped') {
      throw new SimulationStateError(`${operation}() called after shutdown()`);
    }
  }

  function getExplorer(id: ExplorerId): ExplorerEntry {
    const entry = explorers.get(id);
    if (!entry) {
      throw new Error(`Explorer not found: ${id}`);
    }
    return entry;
  }

  function explorerDied(
    id: ExplorerId,
    cause: ExplorerDeathCause
  ): void {
    if (!liveExplorers.delete(id)) return;
    const name = getExplorer(id).name;
    addLog(log, tickNumber, 'explorer_died', `${name} died (${cause})`, name);
    events.emit({ type: 'explorer_died', tick: tickNumber, explorerId: id, cause });
  }

  async function publishMap(ids: Iterable<ExplorerId>): Promise<void> {
    const adjacency = toAdjacencyRecord(topology);
    const live = descriptors.filter((d) => hasNode(topology, d.id));
    await Promise.all(
      [...ids]
        .filter((id) => getExplorer(id).fullKnowledge)
        .map((id) =>
          askExplorer(getExplorer(id).actor.mailbox, 'galaxy_map', {
            adjacency,
            planets: live,
          })
        )
    );
  }

  // ── Environment ──

  async function applySunrays(ids: PlanetId[]): Promise<EnvironmentResult[]> {
    const results = await Promise.all(
      ids.map(async (planetId) => ({
        planetId,
        outcome: await gateway.ask(planetId, 'sunray_arrival', {}),
      }))
    );
    for (const { planetId, outcome } of results) {
      if (!outcome.success) continue;
      addLog(
        log,
        tickNumber,
        'sunray',
        `Sunray charged ${planetName(planetId)} to ${outcome.energy}`,
        planetName(planetId),
        { quantity: settings.sunrayCharge, planetId }
      );
      if (outcome.rocketBuilt) {
        addLog(
          log,
          tickNumber,
          'rocket_built',
          `${planetName(planetId)} built a rocket`,
          planetName(planetId),
          { planetId }
        );
      }
    }
    return results;
  }

  async function applyAsteroids(ids: PlanetId[]): Promise<{
    results: EnvironmentResult[];
    destroyed: PlanetId[];
  }> {
    const results = await Promise.all(
      ids.map(async (planetId) => ({
        planetId,
        outcome: await gateway.ask(planetId, 'asteroid_arrival', {}),
      }))
    );
    const destroyed: PlanetId[] = [];
    for (const { planetId, outcome } of results) {
      if (!outcome.success) continue;
      if (outcome.deflected) {
        addLog(
          log,
          tickNumber,
          'asteroid_deflected',
          `${planetName(planetId)} deflected an asteroid with its rocket`,
          planetName(planetId),
          { planetId }
        );
        events.emit({ type: 'asteroid_deflected', tick: tickNumber, planetId });
      } else {
        addLog(
          log,
          tickNumber,
          'asteroid_hit',
          `Asteroid hit ${planetName(planetId)} (energy ${outcome.energy})`,
          planetName(planetId),
          { planetId }
        );
      }
      if (outcome.destroyed) destroyed.push(planetId);
    }
    return { results, destroyed };
  }

  async function runEnvironment(): Promise<PlanetId[]> {
    const live = nodes(topology);
    const code =
      sequenceCursor < sequence.length ? sequence[sequenceCursor++] : undefined;

    if (code === '$') {
      sequence = '';
      sequenceCursor = 0;
      phase = 'paused';
      addLog(log, tickNumber, 'simulation_paused', 'Event sequence finished');
      return [];
    }
    if (code === 'S') {
      await applySunrays(live);
      return [];
    }
    if (code === 'A') {
      return (await applyAsteroids(live)).destroyed;
    }
    if (code === '-') return [];

    const sunrays: PlanetId[] = [];
    const asteroids: PlanetId[] = [];
    for (const id of live) {
      if (rng() < sunrayRate) sunrays.push(id);
      if (rng() < asteroidRate) asteroids.push(id);
    }
    await applySunrays(sunrays);
    return (await applyAsteroids(asteroids)).destroyed;
  }

  // ── Destruction ──

  async function processDestroyed(
    destroyed: PlanetId[],
    cause: 'asteroid' | 'depleted' = 'asteroid'
  ): Promise<void> {
    const removed = [...new Set(destroyed)].filter((id) => hasNode(topology, id));
    if (removed.length === 0) return;

    for (const planetId of removed) {
      const wasCritical = critical.includes(planetId);
      removeNode(topology, planetId);
      critical = findCriticalNodes(topology);
      const connected = isConnected(topology);
      addLog(
        log,
        tickNumber,
        'planet_destroyed',
        `${planetName(planetId)} ${cause === 'depleted' ? 'ran out of energy' : 'was destroyed'}${wasCritical ? ' (critical node)' : ''}`,
        planetName(planetId),
        { planetId }
      );
      addLog(
        log,
        tickNumber,
        'topology_changed',
        connected
          ? `Galaxy remains connected; critical nodes: [${critical.join(', ')}]`
          : `Galaxy split into ${components(topology).length} components`
      );
      events.emit({
        type: 'planet_destroyed',
        tick: tickNumber,
        planetId,
        wasCritical,
        connected,
      });

      const ids = [...liveExplorers];
      const replies = await Promise.all(
        ids.map((id) =>
          askExplorer(getExplorer(id).actor.mailbox, 'planet_destroyed', {
            planetId,
          })
        )
      );
      replies.forEach((reply, i) => {
        if (reply.success && reply.died) explorerDied(ids[i], 'planet_destroyed');
      });
    }

    await publishMap(liveExplorers);
  }

  // ── Explorer Round ──

  function recordExplorerEvent(id: ExplorerId, event: ExplorerTickEvent): void {
    const name = getExplorer(id).name;
    switch (event.type) {
      case 'travel':
        addLog(
          log,
          tickNumber,
          'travel',
          `${name} ${event.viaRocket ? 'jumped' : 'travelled'} ${event.from} → ${event.to}`,
          name,
          { planetId: event.to }
        );
        break;
      case 'harvest':
        addLog(
          log,
          tickNumber,
          'resource_harvested',
          `${name} harvested ${getResourceDefinition(event.kind).name} on ${planetName(event.planetId)}`,
          name,
          { resource: event.kind, quantity: 1, planetId: event.planetId }
        );
        break;
      case 'generate':
        addLog(
          log,
          tickNumber,
          'resource_generated',
          `${planetName(event.planetId)} generated ${getResourceDefinition(event.kind).name} for ${name}`,
          name,
          { resource: event.kind, quantity: 1, planetId: event.planetId }
        );
        break;
      case 'combine':
        addLog(
          log,
          tickNumber,
          'resource_combined',
          `${name} combined ${getResourceDefinition(event.product).name} on ${planetName(event.planetId)}`,
          name,
          { resource: event.product, quantity: 1, planetId: event.planetId }
        );
        break;
      case 'rejected':
        addLog(
          log,
          tickNumber,
          'request_rejected',
          `${name}: ${event.reason} (${event.message})`,
          name,
          event.planetId === undefined ? undefined : { planetId: event.planetId }
        );
        break;
      case 'target_produced':
        addLog(
          log,
          tickNumber,
          'target_produced',
          `${name} produced ${getResourceDefinition(event.target).name} #${event.count}`,
          name,
          { resource: event.target, count: event.count }
        );
        events.emit({
          type: 'target_produced',
          tick: tickNumber,
          explorerId: id,
          target: event.target,
          count: event.count,
        });
        break;
      case 'target_switched':
        addLog(
          log,
          tickNumber,
          'target_switched',
          `${name} switched target ${event.from} → ${event.to} (${event.reason})`,
          name
        );
        events.emit({
          type: 'target_switched',
          tick: tickNumber,
          explorerId: id,
          from: event.from,
          to: event.to,
          reason: event.reason,
        });
        break;
      case 'planet_depleted':
        depletedThisRound.push(event.planetId);
        break;
      case 'died':
        explorerDied(id, event.cause);
        break;
    }
  }

  async function runExplorers(): Promise<TickReport[]> {
    const ids = [...liveExplorers].sort((a, b) => a - b);
    const replies = await Promise.all(
      ids.map((id) =>
        askExplorer(getExplorer(id).actor.mailbox, 'tick', { tick: tickNumber })
      )
    );
    const reports: TickReport[] = [];
    replies.forEach((reply, i) => {
      if (!reply.success) {
        liveExplorers.delete(ids[i]);
        return;
      }
      reports.push(reply.report);
      for (const event of reply.report.events) {
        recordExplorerEvent(ids[i], event);
      }
    });
    return reports;
  }

  // ── Control Surface ──

  async function start(): Promise<void> {
    if (phase !== 'waiting_start') {
      throw new SimulationStateError('start() may only be called once');
    }
    for (const actor of planets.values()) watch(actor.run());
    for (const entry of explorers.values()) watch(entry.actor.run());
    phase = 'running';
    await publishMap(explorers.keys());
    addLog(
      log,
      tickNumber,
      'simulation_started',
      `Simulation started with ${planets.size} planets and ${explorers.size} explorers`
    );
  }

  async function tick(): Promise<TickSummary> {
    requireActive('tick');
    if (phase === 'paused') {
      throw new SimulationStateError('tick() called while paused');
    }
    tickNumber++;

    const destroyed = await runEnvironment();
    await processDestroyed(destroyed);
    const reports = await runExplorers();
    const depleted = depletedThisRound;
    depletedThisRound = [];
    await processDestroyed(depleted, 'depleted');

    addLog(
      log,
      tickNumber,
      'tick_completed',
      `Tick ${tickNumber}: ${nodes(topology).length} planets, ${liveExplorers.size} explorers alive`
    );
    events.emit({
      type: 'tick_completed',
      tick: tickNumber,
      livePlanets: nodes(topology).length,
      liveExplorers: liveExplorers.size,
    });

    if (fault !== undefined) throw fault;
    return {
      tick: tickNumber,
      destroyedPlanets: [...destroyed, ...depleted],
      reports,
      paused: phase === 'paused',
    };
  }

  async function run(ticks: number): Promise<TickSummary[]> {
    requireActive('run');
    const summaries: TickSummary[] = [];
    for (let i = 0; i < ticks && phase === 'running'; i++) {
      summaries.push(await tick());
    }
    return summaries;
  }

  async function shutdown(): Promise<void> {
    if (phase === 'stopped') return;
    const started = phase !== 'waiting_start';
    phase = 'stopped';
    if (!started) return;

    await Promise.all([
      ...[...explorers.values()].map((e) =>
        askExplorer(e.actor.mailbox, 'stop', {})
      ),
      ...[...planets.values()].map((p) => askPlanet(p.mailbox, 'stop', {})),
    ]);
    await Promise.all(loops);
    addLog(log, tickNumber, 'simulation_stopped', 'Simulation stopped');
  }

  async function sendEnvironment(
    kind: 'sunray' | 'asteroid',
    planetIds?: PlanetId[]
  ): Promise<EnvironmentResult[]> {
    requireActive(kind === 'sunray' ? 'sendSunray' : 'sendAsteroid');
    const targets = planetIds ?? nodes(topology);
    if (kind === 'sunray') return applySunrays(targets);
    const { results, destroyed } = await applyAsteroids(targets);
    await processDestroyed(destroyed);
    return results;
  }

  return {
    events,
    start,
    tick,
    run,

    pause() {
      requireActive('pause');
      if (phase !== 'running') return;
      phase = 'paused';
      addLog(log, tickNumber, 'simulation_paused', 'Simulation paused');
    },

    resume() {
      requireActive('resume');
      if (phase !== 'paused') return;
      phase = 'running';
      addLog(log, tickNumber, 'simulation_resumed', 'Simulation resumed');
    },

    shutdown,

    snapshot() {
      return collectSnapshot({
        tick: tickNumber,
        planets: [...planets.values()],
        explorers: [...explorers.values()].map((e) => e.actor),
        connected: isConnected(topology),
        criticalNodes: critical,
        timeoutMs: settings.snapshotTimeoutMs,
      });
    },

    async configure(explorerId, patch) {
      requireActive('configure');
      const entry = getExplorer(explorerId);
      const outcome = await askExplorer(entry.actor.mailbox, 'configure', patch);
      if (outcome.success) {
        const parts = [
          patch.strategy && `strategy ${patch.strategy}`,
          patch.target && `target ${patch.target}`,
          patch.fallbackTarget && `fallback ${patch.fallbackTarget}`,
        ].filter((p): p is string => typeof p === 'string');
        addLog(
          log,
          tickNumber,
          'explorer_configured',
          `${entry.name} reconfigured: ${parts.join(', ') || 'no changes'}`,
          entry.name
        );
      }
      return outcome;
    },

    configureEnvironment(patch) {
      const parsed = parseEnvironmentPatch(patch);
      if (parsed.sunrayRate !== undefined) sunrayRate = parsed.sunrayRate;
      if (parsed.asteroidRate !== undefined) asteroidRate = parsed.asteroidRate;
      if (parsed.eventSequence !== undefined) {
        sequence = parsed.eventSequence;
        sequenceCursor = 0;
      }
    },

    sendSunray(planetIds) {
      return sendEnvironment('sunray', planetIds);
    },

    sendAsteroid(planetIds) {
      return sendEnvironment('asteroid', planetIds);
    },

    async killExplorer(explorerId) {
      requireActive('killExplorer');
      const outcome = await askExplorer(
        getExplorer(explorerId).actor.mailbox,
        'kill',
        { cause: 'killed' }
      );
      if (outcome.success) explorerDied(explorerId, 'killed');
      return outcome;
    },

    async resetExplorer(explorerId) {
      requireActive('resetExplorer');
      const entry = getExplorer(explorerId);
      const outcome = await askExplorer(entry.actor.mailbox, 'reset', {});
      if (outcome.success) {
        await publishMap([explorerId]);
        addLog(
          log,
          tickNumber,
          'explorer_configured',
          `${entry.name} memory reset`,
          entry.name
        );
      }
      return outcome;
    },

    getLog() {
      return log;
    },

    criticalNodes() {
      return [...critical];
    },

    isConnected() {
      return isConnected(topology);
    },

    getPhase() {
      return phase;
    },

    getTick() {
      return tickNumber;
    },

    getSettings() {
      return settings;
    },
  };
}
