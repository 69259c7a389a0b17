import { z } from "zod";
import type { NodeDiscoveryReport } from "@cvslurm/shared";

export const InterfaceRecordSchema = z.object({
  name: z.string().min(1),
  mac_address: z.string().min(1),
  ip_addresses: z.array(z.string()).default([]),
});

export const NodeDiscoveryReportSchema = z.object({
  node_name: z.string().min(1),
  hostname: z.string(),
  location: z.string(),
  interfaces: z.array(InterfaceRecordSchema).default([]),
});

export interface SkippedLine {
  line: string;
  reason: string;
}

export interface DiscoveryOutput {
  reports: NodeDiscoveryReport[];
  skipped: SkippedLine[];
}

/**
 * Parse worker output collected by srun: one JSON report per line, one
 * line per node. Lines that are not valid JSON, or not a report, are
 * returned in `skipped` rather than failing the batch.
 */
export function parseDiscoveryOutput(output: string): DiscoveryOutput {
  const reports: NodeDiscoveryReport[] = [];
  const skipped: SkippedLine[] = [];

  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch (error) {
      skipped.push({
        line: trimmed,
        reason: error instanceof Error ? error.message : "invalid JSON",
      });
      continue;
    }

    const result = NodeDiscoveryReportSchema.safeParse(json);
    if (!result.success) {
      skipped.push({
        line: trimmed,
        reason: result.error.issues
          .map((i) => `${i.path.join(".") || "report"}: ${i.message}`)
          .join(", "),
      });
      continue;
    }
    reports.push(result.data);
  }

  return { reports, skipped };
}
