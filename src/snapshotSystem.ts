import type {
  ExplorerSnapshot,
  GalaxySnapshot,
  PlanetId,
  PlanetSnapshot,
} from './models';
import type { Mailbox } from './mailbox';
import {
  askExplorer,
  askPlanet,
  withTimeout,
  type ExplorerEnvelope,
  type PlanetEnvelope,
} from './actorMessages';

/**
 * Snapshot System
 *
 * Polls every actor for its state and assembles an immutable, point-in-time
 * copy of the galaxy. An actor that does not answer within the timeout
 * (busy, stopped or wedged) is reported as `unknown` instead of holding up
 * the caller.
 */

export interface SnapshotSource {
  tick: number;
  planets: ReadonlyArray<{ id: number; mailbox: Mailbox<PlanetEnvelope> }>;
  explorers: ReadonlyArray<{ id: number; mailbox: Mailbox<ExplorerEnvelope> }>;
  connected: boolean;
  criticalNodes: readonly PlanetId[];
  timeoutMs: number;
}

/** Recursively freeze plain objects and arrays. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

async function pollPlanet(
  id: number,
  mailbox: Mailbox<PlanetEnvelope>,
  timeoutMs: number
): Promise<PlanetSnapshot> {
  const reply = await withTimeout(
    askPlanet(mailbox, 'query_state', {}),
    timeoutMs
  );
  if (!reply || !reply.success) return { id, status: 'unknown' };
  const { view } = reply;
  return {
    status: 'known',
    id: view.id,
    type: view.type,
    inventory: view.inventory,
    energy: view.energy,
    rockets: view.rockets,
    alive: view.alive,
  };
}

async function pollExplorer(
  id: number,
  mailbox: Mailbox<ExplorerEnvelope>,
  timeoutMs: number
): Promise<ExplorerSnapshot> {
  const reply = await withTimeout(
    askExplorer(mailbox, 'query_state', {}),
    timeoutMs
  );
  if (!reply || !reply.success) return { id, status: 'unknown' };
  const { view } = reply;
  return {
    status: 'known',
    id: view.id,
    position: view.position,
    inventory: view.inventory,
    life: view.life,
    strategy: view.strategy,
    alive: view.alive,
    target: view.target,
    produced: view.produced,
  };
}

export async function collectSnapshot(
  source: SnapshotSource
): Promise<GalaxySnapshot> {
  const [planets, explorers] = await Promise.all([
    Promise.all(
      source.planets.map((p) => pollPlanet(p.id, p.mailbox, source.timeoutMs))
    ),
    Promise.all(
      source.explorers.map((e) =>
        pollExplorer(e.id, e.mailbox, source.timeoutMs)
      )
    ),
  ]);

  return deepFreeze({
    tick: source.tick,
    planets,
    explorers,
    connected: source.connected,
    criticalNodes: [...source.criticalNodes],
  });
}
