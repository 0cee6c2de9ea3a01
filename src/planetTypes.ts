import type { BaseResource, PlanetId, PlanetState, PlanetType } from './models';
import { StructuralInvariantError } from './simErrors';

/**
 * Planet Type Rules
 *
 * Each planet type fixes four independent capability limits. A limit of
 * `null` means unbounded, 0 means the capability is absent.
 *
 *   Type | Cells | Generation | Rockets | Combination
 *   A    | pool  | ≤1         | ≤1      | none
 *   B    | one   | ∞          | none    | ≤1
 *   C    | one   | ≤1         | ≤1      | ∞
 *   D    | pool  | ∞          | none    | none
 */

export type CellStore = 'single' | 'pool';

export interface PlanetTypeDefinition {
  id: PlanetType;
  cells: CellStore;
  generationLimit: number | null;
  rocketLimit: number;
  combinationLimit: number | null;
}

export const PLANET_TYPE_DEFINITIONS: PlanetTypeDefinition[] = [
  {
    id: 'A',
    cells: 'pool',
    generationLimit: 1,
    rocketLimit: 1,
    combinationLimit: 0,
  },
  {
    id: 'B',
    cells: 'single',
    generationLimit: null,
    rocketLimit: 0,
    combinationLimit: 1,
  },
  {
    id: 'C',
    cells: 'single',
    generationLimit: 1,
    rocketLimit: 1,
    combinationLimit: null,
  },
  {
    id: 'D',
    cells: 'pool',
    generationLimit: null,
    rocketLimit: 0,
    combinationLimit: 0,
  },
];

export const PLANET_TYPES: readonly PlanetType[] = ['A', 'B', 'C', 'D'];

export function isPlanetType(value: string): value is PlanetType {
  return PLANET_TYPES.some((t) => t === value);
}

export function getPlanetTypeDefinition(
  type: PlanetType
): PlanetTypeDefinition {
  const def = PLANET_TYPE_DEFINITIONS.find((d) => d.id === type);
  if (!def) {
    throw new StructuralInvariantError(`Unknown planet type: ${type}`);
  }
  return def;
}

/** Number of charge units the planet's store can hold. */
export function cellCapacityFor(
  type: PlanetType,
  poolCellCapacity: number
): number {
  return getPlanetTypeDefinition(type).cells === 'pool' ? poolCellCapacity : 1;
}

/** Remaining allowance, or null when the limit is unbounded. */
export function remainingAllowance(
  limit: number | null,
  used: number
): number | null {
  return limit === null ? null : Math.max(0, limit - used);
}

export function canGenerateMore(state: PlanetState): boolean {
  const remaining = remainingAllowance(
    getPlanetTypeDefinition(state.type).generationLimit,
    state.generationsPerformed
  );
  return remaining === null || remaining > 0;
}

export function canCombineMore(state: PlanetState): boolean {
  const remaining = remainingAllowance(
    getPlanetTypeDefinition(state.type).combinationLimit,
    state.combinationsPerformed
  );
  return remaining === null || remaining > 0;
}

export function canHoldMoreRockets(state: PlanetState): boolean {
  return state.rockets < getPlanetTypeDefinition(state.type).rocketLimit;
}

/**
 * Default generation kind for planets loaded without an explicit list.
 * Rotates through the base kinds by id so a text galaxy still offers every
 * base resource somewhere.
 */
export function defaultSupportedResources(
  id: PlanetId,
  type: PlanetType
): BaseResource[] {
  const rotation: BaseResource[] = ['hydrogen', 'oxygen', 'carbon', 'silicon'];
  const first = rotation[Math.abs(id) % rotation.length];
  if (getPlanetTypeDefinition(type).generationLimit === 1) return [first];
  const second = rotation[(Math.abs(id) + 2) % rotation.length];
  return [first, second];
}

/**
 * Check a planet's state against its type's capability matrix. Any
 * violation is an internal-consistency fault, never a recoverable outcome.
 */
export function assertPlanetInvariants(state: PlanetState): void {
  const def = getPlanetTypeDefinition(state.type);
  const where = `planet ${state.id} (type ${state.type})`;

  if (def.generationLimit === 1 && state.supportedResources.length > 1) {
    throw new StructuralInvariantError(
      `${where} declares ${state.supportedResources.length} generated resources; its type allows one`
    );
  }
  if (
    def.generationLimit !== null &&
    state.generationsPerformed > def.generationLimit
  ) {
    throw new StructuralInvariantError(`${where} exceeded its generation limit`);
  }
  if (
    def.combinationLimit !== null &&
    state.combinationsPerformed > def.combinationLimit
  ) {
    throw new StructuralInvariantError(
      `${where} exceeded its combination limit`
    );
  }
  if (state.rockets > def.rocketLimit || state.rockets < 0) {
    throw new StructuralInvariantError(`${where} holds ${state.rockets} rockets`);
  }
  if (state.energy < 0 || state.energy > state.cellCapacity) {
    throw new StructuralInvariantError(
      `${where} energy ${state.energy} outside 0..${state.cellCapacity}`
    );
  }
  for (const [kind, count] of Object.entries(state.inventory)) {
    if (count === undefined) continue;
    if (!Number.isInteger(count) || count < 0) {
      throw new StructuralInvariantError(
        `${where} holds an invalid count of ${kind}: ${count}`
      );
    }
  }
}
