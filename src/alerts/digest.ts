import type { PoolRunSummary, ScoutRunSummary } from "../types";

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export interface PromotedLine {
  title: string;
  company: string;
  fitScore: number;
}

/**
 * On-demand run message. Detailed when something was promoted, a one-liner
 * when only review items came back, nothing otherwise.
 */
export function formatScoutSummary(
  summary: ScoutRunSummary,
  promoted: PromotedLine[],
): string | null {
  const runId = escapeHtml(summary.runId);

  if (summary.promotedToPipeline > 0) {
    const lines = [
      `<b>Job Scout Run Complete</b> (${runId})`,
      "",
      `Fetched: ${summary.totalFetched} | Deduped: ${summary.afterDedup} | Filtered: ${summary.afterPrefilter} | Scored: ${summary.aiScored}`,
      `<b>Promoted to pipeline: ${summary.promotedToPipeline}</b>`,
      `For review: ${summary.savedForReview} | Dismissed: ${summary.dismissed}`,
      "",
      ...promoted.map(
        (job) =>
          `  ${escapeHtml(job.title)} @ ${escapeHtml(job.company)} — Score: ${job.fitScore}/10`,
      ),
    ];
    return lines.join("\n");
  }

  if (summary.savedForReview > 0) {
    return (
      `<b>Job Scout</b> (${runId}): No strong matches this run. ` +
      `${summary.savedForReview} jobs saved for review, ${summary.dismissed} dismissed.`
    );
  }

  return null;
}

export function formatPoolSummary(summary: PoolRunSummary): string {
  const lines = [
    `<b>Shared Pool Refresh</b> (${escapeHtml(summary.runId)})`,
    "",
    `Sources: ${summary.sourcesQueried} | Fetched: ${summary.totalFetched}`,
    `New: ${summary.inserted} | Refreshed: ${summary.refreshed} | Marked inactive: ${summary.markedInactive}`,
    `Users scored: ${summary.usersScored} | <b>New matches: ${summary.matchesCreated}</b>`,
  ];
  if (summary.errors.length > 0) {
    lines.push("", `⚠️ ${summary.errors.length} issue(s):`);
    for (const error of summary.errors.slice(0, 5)) {
      lines.push(`  • ${escapeHtml(error.substring(0, 200))}`);
    }
  }
  return lines.join("\n");
}
