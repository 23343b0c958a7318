import type { FilteredCandidate, UserProfile, UserScoutPreferences } from "../types";
import type { BatchScore, Result, ScoringFailure } from "./types";

const SYSTEM_PROMPT = `You are an executive recruiter screening senior roles at consumer (B2C) companies in India.

For each job in the batch, rate how well it fits the candidate on a 1-10 scale and decide whether the employer is genuinely a B2C business.

Scoring guide:
- 9-10: Target role, target seniority, consumer company, right city
- 7-8: Strong fit with one minor gap
- 5-6: Plausible, worth a manual look
- 1-4: Wrong function, wrong seniority, or not B2C

Respond with ONLY a JSON array, one object per job, no prose and no markdown:
[{"index": 1, "fit_score": 8, "b2c_validated": true, "reasoning": "one sentence"}]`;

const SNIPPET_LIMIT = 500;

export function formatSalary(min: number | null, max: number | null): string {
  const lakh = (value: number) => `₹${Math.round(value / 100_000)}L`;
  if (min !== null && max !== null && min !== max) return `${lakh(min)}–${lakh(max)}`;
  if (min !== null) return lakh(min);
  if (max !== null) return `up to ${lakh(max)}`;
  return "Not disclosed";
}

export function truncateSnippet(text: string | null): string {
  if (!text) return "";
  if (text.length <= SNIPPET_LIMIT) return text;
  return text.substring(0, SNIPPET_LIMIT) + "...";
}

export function buildProfileSummary(
  profile: UserProfile | null,
  prefs: UserScoutPreferences,
): string {
  const lines = [
    `Target roles: ${prefs.targetRoles.join(", ") || "not specified"}`,
    `Target locations: ${prefs.targetLocations.join(", ") || "not specified"}`,
  ];
  if (profile?.experienceLevel) lines.push(`Experience level: ${profile.experienceLevel}`);
  if (profile && profile.coreSkills.length > 0) {
    lines.push(`Core skills: ${profile.coreSkills.join(", ")}`);
  }
  if (prefs.targetIndustries.length > 0) {
    lines.push(`Preferred industries: ${prefs.targetIndustries.join(", ")}`);
  }
  if (prefs.minSalary !== null) {
    lines.push(`Minimum salary: ${formatSalary(prefs.minSalary, null)}`);
  }
  return lines.join("\n");
}

export function buildBatchPrompt(
  profileSummary: string,
  batch: FilteredCandidate[],
): string {
  const jobs = batch
    .map((job, i) =>
      [
        `Job ${i + 1}:`,
        `Title: ${job.title}`,
        `Company: ${job.company}`,
        `Location: ${job.location ?? "Not specified"}`,
        `Salary: ${formatSalary(job.salaryMin, job.salaryMax)}`,
        `B2C hint: ${job.b2cHint ? "yes" : "no"}`,
        `Snippet: ${truncateSnippet(job.description)}`,
      ].join("\n"),
    )
    .join("\n\n");

  return `## Candidate\n${profileSummary}\n\n## Jobs\n${jobs}\n\nReturn the JSON array now.`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // Models sometimes wrap the array in prose
    const start = text.indexOf("[");
    const end = text.lastIndexOf("]");
    if (start === -1 || end <= start) return undefined;
    try {
      return JSON.parse(text.slice(start, end + 1));
    } catch {
      return undefined;
    }
  }
}

export function parseBatchScores(raw: string): Result<BatchScore[], ScoringFailure> {
  let jsonStr = raw.trim();

  // Strip <think> blocks (some models output reasoning before JSON)
  jsonStr = jsonStr.replace(/<think>[\s\S]*?<\/think>/gi, "").trim();

  const fenced = jsonStr.match(/```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/);
  if (fenced) {
    jsonStr = fenced[1].trim();
  }

  const parsed = parseJson(jsonStr);
  if (!Array.isArray(parsed)) {
    return {
      ok: false,
      error: { kind: "parse", message: "Response is not a JSON array" },
    };
  }

  const scores: BatchScore[] = [];
  for (const item of parsed) {
    if (!isRecord(item)) continue;
    const index = toNumber(item.index);
    const fitScore = toNumber(item.fit_score);
    if (index === null || fitScore === null) continue;

    scores.push({
      index: Math.round(index),
      fitScore: Math.max(0, Math.min(10, fitScore)),
      b2cValidated: item.b2c_validated === true || item.b2c_validated === "true",
      reasoning: typeof item.reasoning === "string" ? item.reasoning : "",
    });
  }

  return { ok: true, value: scores };
}

export { SYSTEM_PROMPT };
