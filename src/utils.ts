/**
 * Seeded linear congruential generator returning floats in [0, 1].
 * Every random choice in a run goes through one of these so the run
 * can be replayed from its seed.
 */
export function createRng(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1103515245 + 12345) & 0x7fffffff;
    return state / 0x7fffffff;
  };
}

/** Pick one element uniformly. Returns undefined for an empty list. */
export function pickRandom<T>(
  items: readonly T[],
  rng: () => number
): T | undefined {
  if (items.length === 0) return undefined;
  const idx = Math.min(items.length - 1, Math.floor(rng() * items.length));
  return items[idx];
}

/**
 * Pick one element with probability proportional to its weight.
 * Non-positive weights are never picked unless every weight is non-positive,
 * in which case the choice is uniform.
 */
export function pickWeighted<T>(
  items: readonly T[],
  weight: (item: T) => number,
  rng: () => number
): T | undefined {
  const weights = items.map((item) => Math.max(0, weight(item)));
  const total = weights.reduce((sum, w) => sum + w, 0);
  if (total <= 0) return pickRandom(items, rng);

  let roll = rng() * total;
  for (let i = 0; i < items.length; i++) {
    roll -= weights[i];
    if (roll < 0 && weights[i] > 0) return items[i];
  }
  // Rounding can leave roll at exactly zero: take the last weighted item
  for (let i = items.length - 1; i >= 0; i--) {
    if (weights[i] > 0) return items[i];
  }
  return undefined;
}

/** Resolve after the given delay. `cancel` clears the pending timer. */
export function delay(ms: number): {
  promise: Promise<void>;
  cancel: () => void;
} {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const promise = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms);
  });
  return {
    promise,
    cancel: () => {
      if (timer !== undefined) clearTimeout(timer);
    },
  };
}
