import type {
  BaseResource,
  ComplexResource,
  Inventory,
  ResourceKind,
} from './models';

export interface ResourceDefinition {
  id: ResourceKind;
  name: string;
  symbol: string;
  tier: number; // 0 = base, n = n combinations deep
}

export const RESOURCE_DEFINITIONS: ResourceDefinition[] = [
  { id: 'hydrogen', name: 'Hydrogen', symbol: 'H', tier: 0 },
  { id: 'oxygen', name: 'Oxygen', symbol: 'O', tier: 0 },
  { id: 'carbon', name: 'Carbon', symbol: 'C', tier: 0 },
  { id: 'silicon', name: 'Silicon', symbol: 'Si', tier: 0 },
  { id: 'water', name: 'Water', symbol: 'H2O', tier: 1 },
  { id: 'diamond', name: 'Diamond', symbol: 'Dia', tier: 1 },
  { id: 'life', name: 'Life', symbol: 'Lif', tier: 2 },
  { id: 'robot', name: 'Robot', symbol: 'Rob', tier: 3 },
  { id: 'dolphin', name: 'Dolphin', symbol: 'Dol', tier: 3 },
  { id: 'ai_partner', name: 'AI Partner', symbol: 'AI', tier: 4 },
];

export const BASE_RESOURCES: readonly BaseResource[] = [
  'hydrogen',
  'oxygen',
  'carbon',
  'silicon',
];

export const COMPLEX_RESOURCES: readonly ComplexResource[] = [
  'water',
  'diamond',
  'life',
  'robot',
  'dolphin',
  'ai_partner',
];

export const ALL_RESOURCES: readonly ResourceKind[] = [
  ...BASE_RESOURCES,
  ...COMPLEX_RESOURCES,
];

export function getResourceDefinition(id: ResourceKind): ResourceDefinition {
  const def = RESOURCE_DEFINITIONS.find((r) => r.id === id);
  if (!def) {
    throw new Error(`Unknown resource: ${id}`);
  }
  return def;
}

export function isBaseResource(kind: ResourceKind): kind is BaseResource {
  return BASE_RESOURCES.some((b) => b === kind);
}

// ─── Inventory Helpers ──────────────────────────────────────────

export function countOf(inventory: Inventory, kind: ResourceKind): number {
  return inventory[kind] ?? 0;
}

export function addToInventory(
  inventory: Inventory,
  kind: ResourceKind,
  quantity = 1
): void {
  inventory[kind] = countOf(inventory, kind) + quantity;
}

/**
 * Remove units of one kind. Returns false and leaves the inventory untouched
 * when fewer than `quantity` units are held. Kinds that reach zero are
 * deleted so inventories compare cleanly.
 */
export function removeFromInventory(
  inventory: Inventory,
  kind: ResourceKind,
  quantity = 1
): boolean {
  const have = countOf(inventory, kind);
  if (have < quantity) return false;
  if (have === quantity) {
    delete inventory[kind];
  } else {
    inventory[kind] = have - quantity;
  }
  return true;
}

/** True when the inventory holds every unit listed (kinds may repeat). */
export function hasAll(
  inventory: Inventory,
  kinds: readonly ResourceKind[]
): boolean {
  const needed: Inventory = {};
  for (const k of kinds) addToInventory(needed, k);
  return ALL_RESOURCES.every(
    (k) => countOf(inventory, k) >= countOf(needed, k)
  );
}

export function copyInventory(inventory: Inventory): Inventory {
  const copy: Inventory = {};
  for (const kind of ALL_RESOURCES) {
    const n = countOf(inventory, kind);
    if (n > 0) copy[kind] = n;
  }
  return copy;
}
