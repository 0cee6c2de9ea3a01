import type {
  BaseResource,
  CombineReply,
  PlanetReplyMap,
  PlanetRequestMap,
  PlanetState,
  PlanetView,
} from './models';
import type { PlanetDefinition, SimulationSettings } from './simulationConfig';
import { createMailbox, type Mailbox } from './mailbox';
import {
  rejectPlanetEnvelope,
  type PlanetEnvelope,
} from './actorMessages';
import { combine } from './recipeEngine';
import {
  addToInventory,
  copyInventory,
  getResourceDefinition,
  hasAll,
  removeFromInventory,
} from './resourceTypes';
import {
  assertPlanetInvariants,
  canCombineMore,
  canGenerateMore,
  canHoldMoreRockets,
  cellCapacityFor,
  defaultSupportedResources,
  getPlanetTypeDefinition,
  remainingAllowance,
} from './planetTypes';
import { reject } from './simErrors';

/**
 * Planet Actor
 *
 * Owns one planet's economy and serves its mailbox strictly one message at
 * a time. Every handler below runs to completion before the next message is
 * taken, so limits such as "one combination on a B planet" hold no matter
 * how many explorers address the planet at once.
 *
 * Energy:
 *  - `energy` counts charged units, capped at the cell capacity
 *  - pool-cell types (A, D) spend one unit per generation
 *  - single-cell types (B, C) need a charged cell but keep it
 *  - building a rocket spends one unit
 *  - a pool spent to zero leaves the planet dead, as does an asteroid
 */

export type PlanetRules = Pick<
  SimulationSettings,
  'poolCellCapacity' | 'sunrayCharge' | 'asteroidDamage' | 'autoBuildRockets'
>;

export function createPlanetState(
  definition: PlanetDefinition,
  rules: Pick<PlanetRules, 'poolCellCapacity'>
): PlanetState {
  const cellCapacity = cellCapacityFor(definition.type, rules.poolCellCapacity);
  const state: PlanetState = {
    id: definition.id,
    type: definition.type,
    status: 'active',
    energy: definition.energy ?? cellCapacity,
    cellCapacity,
    supportedResources: [
      ...(definition.resources ??
        defaultSupportedResources(definition.id, definition.type)),
    ],
    inventory: copyInventory(definition.inventory ?? {}),
    rockets: 0,
    generationsPerformed: 0,
    combinationsPerformed: 0,
  };
  assertPlanetInvariants(state);
  return state;
}

export function planetView(state: PlanetState): PlanetView {
  const def = getPlanetTypeDefinition(state.type);
  return {
    id: state.id,
    type: state.type,
    alive: state.status === 'active',
    energy: state.energy,
    cellCapacity: state.cellCapacity,
    rockets: state.rockets,
    inventory: copyInventory(state.inventory),
    supportedResources: [...state.supportedResources],
    generationsRemaining: remainingAllowance(
      def.generationLimit,
      state.generationsPerformed
    ),
    combinationsRemaining: remainingAllowance(
      def.combinationLimit,
      state.combinationsPerformed
    ),
  };
}

function unavailable(state: PlanetState) {
  return reject('PlanetUnavailable', `planet ${state.id} is dead`);
}

/** Spend one unit of charge. Returns true when it emptied a pool for good. */
function spendCharge(state: PlanetState): boolean {
  state.energy -= 1;
  if (state.energy > 0) return false;
  if (getPlanetTypeDefinition(state.type).cells !== 'pool') return false;
  state.status = 'dead';
  return true;
}

// ─── Handlers ───────────────────────────────────────────────────

export function handleGenerate(
  state: PlanetState,
  request: PlanetRequestMap['generate_resource']
): PlanetReplyMap['generate_resource'] {
  if (state.status === 'dead') return unavailable(state);

  const kind: BaseResource | undefined =
    request.kind ?? state.supportedResources[0];
  if (kind === undefined || !state.supportedResources.includes(kind)) {
    return reject(
      'CapabilityExceeded',
      `planet ${state.id} cannot generate ${kind ?? 'anything'}`
    );
  }
  if (!canGenerateMore(state)) {
    return reject(
      'CapabilityExceeded',
      `planet ${state.id} (type ${state.type}) has used its generation allowance`
    );
  }
  if (state.energy < 1) {
    return reject(
      'InsufficientInventory',
      `planet ${state.id} has no charged energy cell`
    );
  }

  state.generationsPerformed += 1;
  if (getPlanetTypeDefinition(state.type).cells === 'pool' && spendCharge(state)) {
    return { success: true, kind, depleted: true };
  }
  return { success: true, kind };
}

export function handleCombine(
  state: PlanetState,
  request: PlanetRequestMap['request_combine']
): CombineReply {
  const { a, b, source } = request;
  const returned = source === 'explorer' ? [a, b] : [];

  if (state.status === 'dead') {
    return { ...unavailable(state), returned };
  }
  if (getPlanetTypeDefinition(state.type).combinationLimit === 0) {
    return {
      ...reject(
        'CapabilityExceeded',
        `combination not permitted on type ${state.type} planets`
      ),
      returned,
    };
  }
  if (!canCombineMore(state)) {
    return {
      ...reject(
        'CapabilityExceeded',
        `planet ${state.id} has used its combination allowance`
      ),
      returned,
    };
  }
  const product = combine(a, b);
  if (product === undefined) {
    return {
      ...reject(
        'NoRecipe',
        `${getResourceDefinition(a).name} and ${getResourceDefinition(b).name} do not combine`
      ),
      returned,
    };
  }

  if (source === 'planet') {
    if (!hasAll(state.inventory, [a, b])) {
      return {
        ...reject(
          'InsufficientInventory',
          `planet ${state.id} does not hold ${a} and ${b}`
        ),
        returned,
      };
    }
    removeFromInventory(state.inventory, a);
    removeFromInventory(state.inventory, b);
    addToInventory(state.inventory, product);
  }

  state.combinationsPerformed += 1;
  return { success: true, product };
}

export function handleRocket(
  state: PlanetState,
  request: PlanetRequestMap['request_rocket']
): PlanetReplyMap['request_rocket'] {
  if (state.status === 'dead') return unavailable(state);

  if (request.action === 'use') {
    if (state.rockets < 1) {
      return reject(
        'InsufficientInventory',
        `planet ${state.id} holds no rocket`
      );
    }
    state.rockets -= 1;
    return { success: true, rockets: state.rockets };
  }

  if (getPlanetTypeDefinition(state.type).rocketLimit === 0) {
    return reject(
      'CapabilityExceeded',
      `type ${state.type} planets cannot build rockets`
    );
  }
  if (!canHoldMoreRockets(state)) {
    return reject(
      'CapabilityExceeded',
      `planet ${state.id} already holds a rocket`
    );
  }
  if (state.energy < 1) {
    return reject(
      'InsufficientInventory',
      `planet ${state.id} has no charge to build a rocket`
    );
  }
  state.rockets += 1;
  if (spendCharge(state)) {
    return { success: true, rockets: state.rockets, depleted: true };
  }
  return { success: true, rockets: state.rockets };
}

export function handleHarvest(
  state: PlanetState,
  request: PlanetRequestMap['explorer_harvest']
): PlanetReplyMap['explorer_harvest'] {
  if (state.status === 'dead') return unavailable(state);
  if (!removeFromInventory(state.inventory, request.kind)) {
    return reject(
      'InsufficientInventory',
      `planet ${state.id} has no ${request.kind}`
    );
  }
  return { success: true, kind: request.kind };
}

export function handleSunray(
  state: PlanetState,
  rules: PlanetRules
): PlanetReplyMap['sunray_arrival'] {
  if (state.status === 'dead') return unavailable(state);

  state.energy = Math.min(state.cellCapacity, state.energy + rules.sunrayCharge);

  // Planet AI: turn spare charge into asteroid protection
  let rocketBuilt = false;
  if (
    rules.autoBuildRockets &&
    state.rockets === 0 &&
    canHoldMoreRockets(state) &&
    state.energy > 1
  ) {
    state.energy -= 1;
    state.rockets += 1;
    rocketBuilt = true;
  }
  return { success: true, energy: state.energy, rocketBuilt };
}

export function handleAsteroid(
  state: PlanetState,
  rules: PlanetRules
): PlanetReplyMap['asteroid_arrival'] {
  if (state.status === 'dead') return unavailable(state);

  if (state.rockets > 0) {
    state.rockets -= 1;
    return {
      success: true,
      deflected: true,
      destroyed: false,
      energy: state.energy,
    };
  }

  state.energy = Math.max(0, state.energy - rules.asteroidDamage);
  if (state.energy === 0) {
    state.status = 'dead';
  }
  return {
    success: true,
    deflected: false,
    destroyed: state.status === 'dead',
    energy: state.energy,
  };
}

// ─── Actor Loop ─────────────────────────────────────────────────

export interface PlanetActor {
  id: number;
  mailbox: Mailbox<PlanetEnvelope>;
  /** Start serving the mailbox. Resolves when the actor has stopped. */
  run(): Promise<void>;
}

/**
 * Dispatch one message. Returns false when the message was `stop`.
 * Throws a StructuralInvariantError if a handler left the planet outside
 * its type's capability matrix.
 */
function dispatch(
  state: PlanetState,
  rules: PlanetRules,
  envelope: PlanetEnvelope
): boolean {
  switch (envelope.type) {
    case 'generate_resource':
      envelope.reply(handleGenerate(state, envelope.request));
      break;
    case 'request_combine':
      envelope.reply(handleCombine(state, envelope.request));
      break;
    case 'request_rocket':
      envelope.reply(handleRocket(state, envelope.request));
      break;
    case 'explorer_harvest':
      envelope.reply(handleHarvest(state, envelope.request));
      break;
    case 'sunray_arrival':
      envelope.reply(handleSunray(state, rules));
      break;
    case 'asteroid_arrival':
      envelope.reply(handleAsteroid(state, rules));
      break;
    case 'query_state':
      envelope.reply({ success: true, view: planetView(state) });
      break;
    case 'stop':
      envelope.reply({ success: true });
      return false;
  }
  assertPlanetInvariants(state);
  return true;
}

export function createPlanetActor(
  state: PlanetState,
  rules: PlanetRules,
  channelCapacity: number
): PlanetActor {
  const mailbox = createMailbox<PlanetEnvelope>(channelCapacity);
  let running: Promise<void> | undefined;

  function drain(reason: string): void {
    for (const envelope of mailbox.close()) {
      rejectPlanetEnvelope(envelope, 'PlanetUnavailable', reason);
    }
  }

  async function loop(): Promise<void> {
    for (;;) {
      const envelope = await mailbox.receive();
      if (envelope === undefined) return;
      let keepGoing: boolean;
      try {
        keepGoing = dispatch(state, rules, envelope);
      } catch (err) {
        drain(`planet ${state.id} failed`);
        throw err;
      }
      if (!keepGoing) {
        drain(`planet ${state.id} has stopped`);
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
