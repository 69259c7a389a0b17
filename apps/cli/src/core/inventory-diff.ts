/** Node names seen in one sinfo sweep. */
export interface NodeSnapshot {
  all: ReadonlySet<string>;
  available: ReadonlySet<string>;
}

export interface InventoryDiff {
  added: string[];
  removed: string[];
  newlyAvailable: string[];
  /** (added ∩ available) ∪ newlyAvailable: nodes to rediscover and upsert. */
  toRefresh: string[];
  changed: boolean;
}

export const EMPTY_SNAPSHOT: NodeSnapshot = {
  all: new Set(),
  available: new Set(),
};

function difference(a: ReadonlySet<string>, b: ReadonlySet<string>): string[] {
  return [...a].filter((name) => !b.has(name)).sort();
}

/**
 * Compare two consecutive sweeps. Pure: the result depends only on the two
 * snapshots, so a node that appears and disappears between sweeps is never
 * seen.
 */
export function diffInventory(
  previous: NodeSnapshot,
  current: NodeSnapshot,
): InventoryDiff {
  const added = difference(current.all, previous.all);
  const removed = difference(previous.all, current.all);
  const newlyAvailable = difference(current.available, previous.available);

  const toRefresh = new Set(newlyAvailable);
  for (const name of added) {
    if (current.available.has(name)) toRefresh.add(name);
  }

  return {
    added,
    removed,
    newlyAvailable,
    toRefresh: [...toRefresh].sort(),
    changed: added.length > 0 || removed.length > 0 || newlyAvailable.length > 0,
  };
}
