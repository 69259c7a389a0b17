const INTEGER = /^[+-]?\d+$/;

function parseInteger(raw: string): number | null {
  const trimmed = raw.trim();
  return INTEGER.test(trimmed) ? Number(trimmed) : null;
}

/**
 * Expand a Slurm nodelist like "node[1-3,5]" into individual node names.
 *
 *   "node1"        -> ["node1"]
 *   "node[1-3,5]"  -> ["node1", "node2", "node3", "node5"]
 *   "node[5,1-3]"  -> ["node5", "node1", "node2", "node3"]
 *   "node[08-10]"  -> ["node8", "node9", "node10"]
 *   "node[1-x]"    -> ["node1-x"]
 *
 * Order follows the input and duplicates are kept. A range whose bounds
 * are not integers is emitted literally instead of failing. Bounds are
 * read as integers, so zero padding is not kept.
 */
export function expandNodeList(nodeList: string): string[] {
  if (!nodeList) return [];

  // Simple case: single node with no brackets
  if (!nodeList.includes("[")) return [nodeList];

  const match = nodeList.match(/^([^[\]]+)\[([^\]]*)\]/);
  if (!match) return [nodeList];

  const [, prefix = "", rangeStr = ""] = match;
  const nodes: string[] = [];

  for (const rawPart of rangeStr.split(",")) {
    const part = rawPart.trim();
    if (!part) continue;

    const dash = part.indexOf("-");
    if (dash === -1) {
      nodes.push(`${prefix}${part}`);
      continue;
    }

    const start = parseInteger(part.slice(0, dash));
    const end = parseInteger(part.slice(dash + 1));
    if (start === null || end === null) {
      nodes.push(`${prefix}${part}`);
      continue;
    }

    for (let i = start; i <= end; i++) {
      nodes.push(`${prefix}${i}`);
    }
  }

  return nodes;
}
