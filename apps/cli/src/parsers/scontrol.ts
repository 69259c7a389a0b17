/**
 * Parse `scontrol show config` output into key/value pairs.
 * Lines look like `ClusterName             = gpu-cluster`; the header line
 * and anything without `=` are ignored.
 */
export function parseScontrolConfig(output: string): Map<string, string> {
  const entries = new Map<string, string>();

  for (const line of output.split("\n")) {
    const eq = line.indexOf("=");
    if (eq === -1) continue;

    const key = line.slice(0, eq).trim();
    if (!key || entries.has(key)) continue;
    entries.set(key, line.slice(eq + 1).trim());
  }

  return entries;
}

/** ClusterName from `scontrol show config`, or null when unset. */
export function parseClusterName(output: string): string | null {
  return parseScontrolConfig(output).get("ClusterName") || null;
}
