import type { LogEntry, LogEntryMeta, ResourceKind } from './models';
import { getResourceDefinition } from './resourceTypes';

/**
 * Log System
 *
 * Creates log entries for significant simulation events.
 * The log is capped at MAX_LOG_ENTRIES so long runs stay bounded.
 *
 * Trimming uses a priority system:
 *  1. Combinable entries (resource_generated, resource_harvested, sunray)
 *     are aggregated into summary entries with summed quantities.
 *  2. Droppable entries (travel, request_rejected, tick_completed) are
 *     removed oldest-first.
 *  3. Important entries (planet_destroyed, explorer_died, target_switched,
 *     etc.) are preserved and only removed as a last resort.
 */

/** Maximum number of log entries kept after a trim. */
export const MAX_LOG_ENTRIES = 200;

/** Entries allowed above the cap before a trim runs. */
export const TRIM_BUFFER = 50;

function isCombinable(type: LogEntry['type']): boolean {
  return (
    type === 'resource_generated' ||
    type === 'resource_harvested' ||
    type === 'sunray'
  );
}

/** High-frequency, low-importance entries, dropped first when trimming. */
function isDroppable(type: LogEntry['type']): boolean {
  return (
    type === 'travel' ||
    type === 'request_rejected' ||
    type === 'tick_completed'
  );
}

export function createLogEntry(
  tick: number,
  type: LogEntry['type'],
  message: string,
  actor?: string,
  meta?: LogEntryMeta,
  realTime: number = Date.now()
): LogEntry {
  const entry: LogEntry = {
    tick,
    realTime,
    type,
    message,
  };
  if (actor) {
    entry.actor = actor;
  }
  if (meta) {
    entry.meta = meta;
  }
  return entry;
}

export function addLog(
  log: LogEntry[],
  tick: number,
  type: LogEntry['type'],
  message: string,
  actor?: string,
  meta?: LogEntryMeta
): void {
  log.push(createLogEntry(tick, type, message, actor, meta));

  if (log.length > MAX_LOG_ENTRIES + TRIM_BUFFER) {
    compactAndTrimLog(log);
  }
}

// ── Trim Implementation ──────────────────────────────────────────

/** Combinable entries aggregate per (type, actor). */
function groupKey(entry: LogEntry): string {
  return `${entry.type}::${entry.actor ?? ''}`;
}

function buildSummaryMessage(
  type: LogEntry['type'],
  mergedMeta: LogEntryMeta,
  count: number,
  actor?: string
): string {
  const prefix = actor ? `${actor}: ` : '';
  const what = mergedMeta.resource
    ? `${mergedMeta.quantity ?? 0} ${getResourceDefinition(mergedMeta.resource).name}`
    : `${mergedMeta.quantity ?? 0} units`;

  if (type === 'resource_generated') {
    return `${prefix}Generated ${what} (x${count})`;
  }
  if (type === 'resource_harvested') {
    return `${prefix}Harvested ${what} (x${count})`;
  }
  if (type === 'sunray') {
    return `${prefix}Sunrays charged ${mergedMeta.quantity ?? 0} cells (x${count})`;
  }
  return `${prefix}${type} (x${count})`;
}

/**
 * Merge meta from entries of one group. Quantities are summed; the
 * resource is kept only when every entry names the same one.
 */
function mergeMeta(entries: LogEntry[]): LogEntryMeta {
  const result: LogEntryMeta = { count: 0 };
  let totalQuantity = 0;
  let hasQuantity = false;
  const resources = new Set<ResourceKind>();

  for (const e of entries) {
    result.count = (result.count ?? 0) + (e.meta?.count ?? 1);
    if (e.meta?.quantity !== undefined) {
      totalQuantity += e.meta.quantity;
      hasQuantity = true;
    }
    if (e.meta?.resource) resources.add(e.meta.resource);
  }

  if (hasQuantity) result.quantity = totalQuantity;
  if (resources.size === 1) {
    const [only] = resources;
    result.resource = only;
  }
  return result;
}

/**
 * Priority-aware log compaction and trimming.
 *
 * Operates in-place on the log array to preserve external references.
 */
export function compactAndTrimLog(log: LogEntry[]): void {
  const target = MAX_LOG_ENTRIES;

  // ── Phase 1: Compact combinable entries ──
  const groups = new Map<string, number[]>();
  log.forEach((entry, i) => {
    if (!isCombinable(entry.type) || !entry.meta) return;
    const key = groupKey(entry);
    const group = groups.get(key);
    if (group) {
      group.push(i);
    } else {
      groups.set(key, [i]);
    }
  });

  // Each merged group is replaced by one summary at its latest entry's slot
  const replaced = new Map<number, LogEntry>();
  const removed = new Set<number>();
  for (const indices of groups.values()) {
    if (indices.length <= 1) continue;
    const entries = indices.map((i) => log[i]);
    const mergedMeta = mergeMeta(entries);
    const latest = entries[entries.length - 1];
    const latestIdx = indices[indices.length - 1];
    replaced.set(
      latestIdx,
      createLogEntry(
        latest.tick,
        latest.type,
        buildSummaryMessage(
          latest.type,
          mergedMeta,
          mergedMeta.count ?? entries.length,
          latest.actor
        ),
        latest.actor,
        mergedMeta,
        latest.realTime
      )
    );
    for (const i of indices.slice(0, -1)) removed.add(i);
  }

  const compacted: LogEntry[] = [];
  log.forEach((entry, i) => {
    if (removed.has(i)) return;
    compacted.push(replaced.get(i) ?? entry);
  });

  // ── Phase 2: Drop oldest droppable entries ──
  if (compacted.length > target) {
    let excess = compacted.length - target;
    const kept: LogEntry[] = [];
    for (const entry of compacted) {
      if (excess > 0 && isDroppable(entry.type)) {
        excess--;
        continue;
      }
      kept.push(entry);
    }
    compacted.length = 0;
    compacted.push(...kept);
  }

  // ── Phase 3: drop oldest entries of any type ──
  if (compacted.length > target) {
    compacted.splice(0, compacted.length - target);
  }

  log.length = 0;
  log.push(...compacted);
}
