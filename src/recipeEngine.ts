import type { ComplexResource, Inventory, ResourceKind } from './models';
import {
  addToInventory,
  copyInventory,
  countOf,
  isBaseResource,
  removeFromInventory,
} from './resourceTypes';

/**
 * Recipe Engine
 *
 * Fixed table of two-unit combinations. `combine` is a pure lookup over an
 * unordered pair; it never touches inventories. Callers (the planet actor)
 * consume the inputs and store the product atomically.
 *
 * `craftSteps` expands a target into the ordered list of combinations needed
 * to build one unit of it from a given inventory, which is what explorers
 * plan against.
 */

export interface Recipe {
  inputs: readonly [ResourceKind, ResourceKind];
  product: ComplexResource;
}

export const RECIPES: readonly Recipe[] = [
  { inputs: ['hydrogen', 'oxygen'], product: 'water' },
  { inputs: ['carbon', 'carbon'], product: 'diamond' },
  { inputs: ['water', 'carbon'], product: 'life' },
  { inputs: ['silicon', 'life'], product: 'robot' },
  { inputs: ['water', 'life'], product: 'dolphin' },
  { inputs: ['robot', 'diamond'], product: 'ai_partner' },
];

function pairKey(a: ResourceKind, b: ResourceKind): string {
  return a < b ? `${a}+${b}` : `${b}+${a}`;
}

const RECIPE_INDEX = new Map<string, ComplexResource>(
  RECIPES.map((r) => [pairKey(r.inputs[0], r.inputs[1]), r.product])
);

/** Product of an unordered pair, or undefined when the pair has no recipe. */
export function combine(
  a: ResourceKind,
  b: ResourceKind
): ComplexResource | undefined {
  return RECIPE_INDEX.get(pairKey(a, b));
}

export function getRecipe(product: ComplexResource): Recipe {
  const recipe = RECIPES.find((r) => r.product === product);
  if (!recipe) {
    throw new Error(`No recipe produces: ${product}`);
  }
  return recipe;
}

// ─── Planning ───────────────────────────────────────────────────

export interface CraftStep {
  a: ResourceKind;
  b: ResourceKind;
  product: ComplexResource;
}

export interface CraftPlan {
  /** Combinations in execution order (inputs always precede their use). */
  steps: CraftStep[];
  /** Base units that are not in the inventory and must be gathered. */
  missing: Inventory;
}

/**
 * Expand one unit of `target` into combination steps.
 *
 * Intermediates already held are reserved before anything is expanded
 * further, so a held Water removes the Hydrogen+Oxygen step. The target
 * itself is always expanded: held units of the target are finished
 * products and are never consumed.
 */
export function craftSteps(
  target: ComplexResource,
  inventory: Inventory
): CraftPlan {
  const available = copyInventory(inventory);
  const steps: CraftStep[] = [];
  const missing: Inventory = {};

  const expand = (kind: ResourceKind, reserve: boolean): void => {
    if (reserve && removeFromInventory(available, kind)) return;
    if (isBaseResource(kind)) {
      addToInventory(missing, kind);
      return;
    }
    const recipe = getRecipe(kind);
    expand(recipe.inputs[0], true);
    expand(recipe.inputs[1], true);
    steps.push({ a: recipe.inputs[0], b: recipe.inputs[1], product: kind });
  };

  expand(target, false);
  return { steps, missing };
}

/**
 * First step of a plan whose two inputs are both held right now, in plan
 * order. Steps whose inputs are themselves products of earlier steps only
 * become executable once those steps ran.
 */
export function nextExecutableStep(
  plan: CraftPlan,
  inventory: Inventory
): CraftStep | undefined {
  for (const step of plan.steps) {
    const needed = step.a === step.b ? 2 : 1;
    if (
      countOf(inventory, step.a) >= needed &&
      countOf(inventory, step.b) >= needed
    ) {
      return step;
    }
  }
  return undefined;
}
