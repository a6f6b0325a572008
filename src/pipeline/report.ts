import type { DisabledChannel } from "../config/index.js";
import type { DeliveryResult } from "../delivery/index.js";
import { isDegraded, unavailableReason, type DigestEntry } from "../digest/index.js";
import type { DroppedStory } from "../hn/index.js";

export type RunStage = "init" | "configuring" | "fetching" | "processing" | "delivering";
export type RunStatus = "success" | "partial" | "failed";

export interface RunReport {
  status: RunStatus;
  /** Last stage entered before the run finished */
  stage: RunStage;
  startedAt: string;
  finishedAt: string;
  dryRun: boolean;
  storiesRequested: number;
  dropped: DroppedStory[];
  /** Digest in ranking order, degraded entries included */
  entries: DigestEntry[];
  delivery: DeliveryResult[];
  disabledChannels: DisabledChannel[];
  error?: string;
}

/**
 * Overall status from the channel results: success when every channel
 * succeeded, failed when every channel failed (or none ran), partial otherwise.
 */
export function aggregateStatus(results: readonly DeliveryResult[]): RunStatus {
  if (results.length === 0) return "failed";
  if (results.every((r) => r.status === "success")) return "success";
  if (results.every((r) => r.status === "failed")) return "failed";
  return "partial";
}

export function exitCode(status: RunStatus): number {
  switch (status) {
    case "success":
      return 0;
    case "failed":
      return 1;
    case "partial":
      return 2;
  }
}

export function formatRunReport(report: RunReport): string {
  const degraded = report.entries.filter(isDegraded);
  const lines = [
    `Run ${report.status}${report.dryRun ? " (dry run)" : ""} at stage "${report.stage}"`,
    `Stories: ${report.entries.length} in digest, ${report.dropped.length} dropped, ${degraded.length} degraded`,
  ];

  for (const entry of degraded) {
    lines.push(`  #${entry.rank} ${entry.story.title}: ${unavailableReason(entry)}`);
  }
  for (const drop of report.dropped) {
    lines.push(`  dropped ${drop.id}: ${drop.reason}`);
  }

  if (report.delivery.length > 0) {
    lines.push("Channels:");
    for (const result of report.delivery) {
      const detail = `${result.itemsDelivered}/${result.itemsAttempted} stories, ${result.messagesSent}/${result.messagesTotal} messages`;
      lines.push(`  ${result.channel}: ${result.status} (${detail})${result.error ? ` - ${result.error}` : ""}`);
    }
  }

  if (report.disabledChannels.length > 0) {
    lines.push("Disabled channels:");
    for (const disabled of report.disabledChannels) {
      lines.push(`  ${disabled.channel}: ${disabled.reason}`);
    }
  }

  if (report.error) lines.push(`Error: ${report.error}`);
  return lines.join("\n");
}
