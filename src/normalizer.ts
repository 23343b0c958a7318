import { createHash } from "crypto";
import * as cheerio from "cheerio";
import type { PostingCandidate, SalaryRange, SourceName } from "./types";

// Company name normalization
const COMPANY_SUFFIXES: RegExp[] = [
  /\s+india\b/g,
  /\s+pvt\.?\s*ltd\.?/g,
  /\s+private\s+limited/g,
  /\s+technologies\b/g,
  /\s+tech\b/g,
  /\s+limited\b/g,
  /\s+ltd\.?/g,
  /\s+inc\b\.?/g,
  /\s+llc\b/g,
  /\s+corp\b\.?/g,
];

export function normalizeCompany(name: string): string {
  let normalized = name.toLowerCase().trim();
  for (const suffix of COMPANY_SUFFIXES) {
    normalized = normalized.replace(suffix, "");
  }
  return normalized.replace(/\s+/g, " ").trim();
}

// Title normalization
const TITLE_ABBREVIATIONS: Array<[RegExp, string]> = [
  [/\bvice president\b/g, "vp"],
  [/\bsenior\b/g, "sr"],
  [/\bassistant\b/g, "asst"],
  [/\bassociate\b/g, "assoc"],
  [/\bdirector\b/g, "dir"],
  [/\bmanager\b/g, "mgr"],
];

export function normalizeTitle(title: string): string {
  let normalized = title.toLowerCase().replace(/[^\w\s]/g, " ");
  normalized = normalized.replace(/\s+/g, " ").trim();
  for (const [pattern, replacement] of TITLE_ABBREVIATIONS) {
    normalized = normalized.replace(pattern, replacement);
  }
  return normalized;
}

/** Lowercase, punctuation to spaces, collapsed whitespace. Used by the scorers. */
export function normalizeForMatching(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\w\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function extractCity(location: string | null | undefined): string | null {
  if (!location) return null;
  const city = location.split(",")[0].trim();
  return city.length > 0 ? city : null;
}

// Dates

const DAY_MS = 24 * 60 * 60 * 1000;

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Relative posting phrases ("3 days ago", "yesterday", "last month") to an
 * absolute date. Months count as 30 days. Returns null on unrecognized text.
 */
export function parseRelativeDate(
  text: string | null | undefined,
  now: Date = new Date(),
): Date | null {
  if (!text) return null;
  const raw = text.toLowerCase().trim();
  const daysBack = (days: number) => new Date(now.getTime() - days * DAY_MS);

  const hours = raw.match(/(\d+)\s*hours?\s*ago/);
  if (hours) {
    return new Date(now.getTime() - Number.parseInt(hours[1], 10) * 3600_000);
  }
  const days = raw.match(/(\d+)\+?\s*days?\s*ago/);
  if (days) return daysBack(Number.parseInt(days[1], 10));

  const weeks = raw.match(/(\d+)\s*weeks?\s*ago/);
  if (weeks) return daysBack(Number.parseInt(weeks[1], 10) * 7);

  const months = raw.match(/(\d+)\s*months?\s*ago/);
  if (months) return daysBack(Number.parseInt(months[1], 10) * 30);

  if (raw.includes("yesterday")) return daysBack(1);
  if (raw.includes("today") || raw.includes("just posted")) return new Date(now);
  if (raw.includes("last week")) return daysBack(7);
  if (raw.includes("last month")) return daysBack(30);

  return null;
}

/** ISO timestamps, epoch milliseconds or relative phrases to YYYY-MM-DD. */
export function normalizePostedDate(
  value: string | number | null | undefined,
  now: Date = new Date(),
): string | null {
  if (value === null || value === undefined || value === "") return null;

  if (typeof value === "number") {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : toIsoDate(date);
  }

  const relative = parseRelativeDate(value, now);
  if (relative) return toIsoDate(relative);

  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : toIsoDate(new Date(parsed));
}

// Salary

const LAKH = 100_000;
const HEDGING = /estimated|approx\.?|approximately|~|up to/;
const LAKH_RANGE =
  /₹?\s*(\d+(?:\.\d+)?)\s*(?:lakhs?|lacs?|lpa|l)?\s*(?:-|–|—|to)\s*₹?\s*(\d+(?:\.\d+)?)\s*(?:lakhs?|lacs?|lpa|l)\b/;
const LAKH_SINGLE = /₹?\s*(\d+(?:\.\d+)?)\s*(?:lakhs?|lacs?|lpa)\b/;
const BARE_RANGE = /(\d+(?:\.\d+)?)\s*(?:-|–|—)\s*(\d+(?:\.\d+)?)/;

function lakhs(value: string): number {
  return Math.round(Number.parseFloat(value) * LAKH);
}

/** Salary text in lakhs ("₹20-30 Lakh", "25 LPA") to rupees. */
export function parseSalary(text: string | null | undefined): SalaryRange {
  const none: SalaryRange = { min: null, max: null, estimated: false };
  if (!text) return none;

  const lower = text.toLowerCase();
  const estimated = HEDGING.test(lower);

  const range = lower.match(LAKH_RANGE);
  if (range) {
    return { min: lakhs(range[1]), max: lakhs(range[2]), estimated };
  }

  const single = lower.match(LAKH_SINGLE);
  if (single) {
    const value = lakhs(single[1]);
    return { min: value, max: value, estimated };
  }

  const bare = lower.match(BARE_RANGE);
  if (bare) {
    return { min: lakhs(bare[1]), max: lakhs(bare[2]), estimated };
  }

  return none;
}

// Fingerprint

export function dedupFingerprint(
  company: string,
  title: string,
  city: string | null | undefined,
): string {
  const key = [
    normalizeCompany(company),
    normalizeTitle(title),
    (extractCity(city) ?? "").toLowerCase(),
  ].join("|");
  return createHash("sha256").update(key).digest("hex");
}

// HTML

const BLOCK_TAGS = "p, li, div, br, h1, h2, h3, h4, h5, h6, tr, ul, ol";

function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $(BLOCK_TAGS).after(" ");
  return $.root().text();
}

/** ATS descriptions arrive as HTML, sometimes entity-encoded HTML. */
export function stripHtml(html: string | null | undefined): string | null {
  if (!html) return null;

  let text = htmlToText(html);
  if (/<[a-z][^>]*>/i.test(text)) {
    text = htmlToText(text);
  }

  const collapsed = text.replace(/\s+/g, " ").trim();
  return collapsed.length > 0 ? collapsed : null;
}

/** A non-blank string from untyped JSON, else null. */
export function asText(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value : null;
}

export function titleCaseSlug(slug: string): string {
  return slug
    .split(/[-_]+/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}

// Posting

export interface PostingFields {
  source: SourceName;
  externalId: string | null;
  title: string;
  company: string;
  location: string | null;
  description: string | null;
  salary: SalaryRange;
  sourceUrl: string;
  applyUrl: string | null;
  postedDate: string | null;
  raw: unknown;
}

/** Adapter fields to a PostingCandidate, with fingerprint and derived columns. */
export function normalizePosting(fields: PostingFields): PostingCandidate {
  const title = fields.title.replace(/\s+/g, " ").trim();
  const company = fields.company.replace(/\s+/g, " ").trim() || "Unknown";
  const location = fields.location?.trim() || null;
  const city = extractCity(location);

  return {
    externalId: fields.externalId,
    fingerprint: dedupFingerprint(company, title, city),
    title,
    company,
    companyNormalized: normalizeCompany(company),
    location,
    city,
    description: fields.description,
    salaryMin: fields.salary.min,
    salaryMax: fields.salary.max,
    salaryEstimated: fields.salary.estimated,
    source: fields.source,
    sourceUrl: fields.sourceUrl,
    applyUrl: fields.applyUrl,
    postedDate: fields.postedDate,
    rawPayload: JSON.stringify(fields.raw),
  };
}
