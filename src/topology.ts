import type { PlanetId } from './models';
import { StructuralInvariantError } from './simErrors';

/**
 * Galaxy Topology
 *
 * Undirected graph over planet ids, stored as an id-indexed adjacency map
 * (no object references between planets). The edge set only changes when
 * a planet is destroyed and removed together with its edges.
 *
 * Iteration is always in ascending id order so every traversal, and every
 * choice made from one, is reproducible.
 */

export interface Topology {
  adjacency: Map<PlanetId, Set<PlanetId>>;
}

export function createTopology(ids: Iterable<PlanetId> = []): Topology {
  const adjacency = new Map<PlanetId, Set<PlanetId>>();
  for (const id of ids) adjacency.set(id, new Set());
  return { adjacency };
}

export function hasNode(topology: Topology, id: PlanetId): boolean {
  return topology.adjacency.has(id);
}

export function nodes(topology: Topology): PlanetId[] {
  return [...topology.adjacency.keys()].sort((a, b) => a - b);
}

export function connect(topology: Topology, a: PlanetId, b: PlanetId): void {
  const edgesA = topology.adjacency.get(a);
  const edgesB = topology.adjacency.get(b);
  if (!edgesA || !edgesB) {
    throw new StructuralInvariantError(
      `Cannot connect ${a} and ${b}: planet not found: ${edgesA ? b : a}`
    );
  }
  if (a === b) {
    throw new StructuralInvariantError(`Planet ${a} cannot connect to itself`);
  }
  edgesA.add(b);
  edgesB.add(a);
}

export function areAdjacent(
  topology: Topology,
  a: PlanetId,
  b: PlanetId
): boolean {
  return topology.adjacency.get(a)?.has(b) ?? false;
}

/** Sorted neighbour ids; empty for an unknown or removed node. */
export function neighbors(topology: Topology, id: PlanetId): PlanetId[] {
  const edges = topology.adjacency.get(id);
  return edges ? [...edges].sort((a, b) => a - b) : [];
}

/** Remove a node and every edge touching it. */
export function removeNode(topology: Topology, id: PlanetId): void {
  const edges = topology.adjacency.get(id);
  if (!edges) return;
  for (const other of edges) topology.adjacency.get(other)?.delete(id);
  topology.adjacency.delete(id);
}

/** Plain `id -> neighbours` record, as handed to explorers. */
export function toAdjacencyRecord(
  topology: Topology
): Record<PlanetId, PlanetId[]> {
  const record: Record<PlanetId, PlanetId[]> = {};
  for (const id of nodes(topology)) record[id] = neighbors(topology, id);
  return record;
}

// ─── Traversal ──────────────────────────────────────────────────

/** BFS hop counts from `start` to every reachable node. */
export function bfsDistances(
  topology: Topology,
  start: PlanetId
): Map<PlanetId, number> {
  const dist = new Map<PlanetId, number>();
  if (!hasNode(topology, start)) return dist;
  dist.set(start, 0);
  const queue: PlanetId[] = [start];
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    const d = dist.get(current) ?? 0;
    for (const next of neighbors(topology, current)) {
      if (dist.has(next)) continue;
      dist.set(next, d + 1);
      queue.push(next);
    }
  }
  return dist;
}

/**
 * Shortest path by hop count, inclusive of both ends. Returns undefined
 * when `to` is unreachable. Ties resolve toward lower ids.
 */
export function shortestPath(
  topology: Topology,
  from: PlanetId,
  to: PlanetId
): PlanetId[] | undefined {
  if (!hasNode(topology, from) || !hasNode(topology, to)) return undefined;
  if (from === to) return [from];
  const parent = new Map<PlanetId, PlanetId>();
  const seen = new Set<PlanetId>([from]);
  const queue: PlanetId[] = [from];
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    for (const next of neighbors(topology, current)) {
      if (seen.has(next)) continue;
      seen.add(next);
      parent.set(next, current);
      if (next === to) {
        const path: PlanetId[] = [to];
        let step = current;
        while (step !== from) {
          path.push(step);
          step = parent.get(step) ?? from;
        }
        path.push(from);
        return path.reverse();
      }
      queue.push(next);
    }
  }
  return undefined;
}

/** Connected components, each sorted, ordered by their smallest id. */
export function components(topology: Topology): PlanetId[][] {
  const seen = new Set<PlanetId>();
  const result: PlanetId[][] = [];
  for (const id of nodes(topology)) {
    if (seen.has(id)) continue;
    const component = [...bfsDistances(topology, id).keys()].sort(
      (a, b) => a - b
    );
    for (const member of component) seen.add(member);
    result.push(component);
  }
  return result;
}

/** An empty graph counts as connected. */
export function isConnected(topology: Topology): boolean {
  return components(topology).length <= 1;
}

// ─── Critical Nodes ─────────────────────────────────────────────

interface DfsFrame {
  node: PlanetId;
  parent: PlanetId | undefined;
  pending: PlanetId[];
}

/**
 * Articulation points, found with one iterative depth-first pass per
 * component tracking discovery order and low-link values.
 *
 * A non-root node is critical when some child subtree has no back edge
 * reaching strictly above it. A DFS root is critical when it has more than
 * one child subtree. Disconnected graphs yield the union of the per-component
 * results. O(V + E).
 */
export function criticalNodes(topology: Topology): PlanetId[] {
  const disc = new Map<PlanetId, number>();
  const low = new Map<PlanetId, number>();
  const critical = new Set<PlanetId>();
  let time = 0;

  const discOf = (id: PlanetId): number => disc.get(id) ?? 0;
  const lowOf = (id: PlanetId): number => low.get(id) ?? 0;
  const visit = (id: PlanetId): void => {
    disc.set(id, time);
    low.set(id, time);
    time++;
  };

  for (const root of nodes(topology)) {
    if (disc.has(root)) continue;
    visit(root);
    let rootChildren = 0;
    const stack: DfsFrame[] = [
      { node: root, parent: undefined, pending: neighbors(topology, root) },
    ];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const next = frame.pending.shift();

      if (next !== undefined) {
        if (next === frame.parent) continue;
        if (disc.has(next)) {
          low.set(frame.node, Math.min(lowOf(frame.node), discOf(next)));
          continue;
        }
        visit(next);
        if (frame.node === root) rootChildren++;
        stack.push({
          node: next,
          parent: frame.node,
          pending: neighbors(topology, next),
        });
        continue;
      }

      // Subtree of frame.node is finished
      stack.pop();
      const parentFrame = stack[stack.length - 1];
      if (!parentFrame) continue;
      const u = parentFrame.node;
      low.set(u, Math.min(lowOf(u), lowOf(frame.node)));
      if (u !== root && lowOf(frame.node) >= discOf(u)) critical.add(u);
    }

    if (rootChildren > 1) critical.add(root);
  }

  return [...critical].sort((a, b) => a - b);
}
