import type {
  NormalizedReview,
  NormalizedReviewRun,
  RawReviewEntry,
  RawReviewRun,
  RawReviewStats,
  ReviewParseError,
  ReviewParseResult,
  ReviewSummary,
} from './types.js';

export type {
  NormalizedReview,
  NormalizedReviewRun,
  ReviewParseError,
  ReviewParseResult,
  ReviewSummary,
} from './types.js';

export const DEFAULT_SESSION_ID = 'unknown';
export const DEFAULT_SEVERITY = 'i';

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function stringField(v: unknown, fallback: string): string {
  return typeof v === 'string' ? v : fallback;
}

function countField(v: unknown): number {
  return typeof v === 'number' && Number.isInteger(v) ? v : 0;
}

// Integers beyond 2^53 arrive already rounded by JSON.parse.
function lineField(v: unknown): number | null {
  return typeof v === 'number' && Number.isInteger(v) ? v : null;
}

function formatSummary(stats: RawReviewStats): ReviewSummary {
  return {
    files: countField(stats.files_reviewed),
    comments: countField(stats.total_comments),
    critical: countField(stats.critical),
    warning: countField(stats.warning),
    info: countField(stats.info),
  };
}

function formatReview(entry: RawReviewEntry): NormalizedReview {
  return {
    file: stringField(entry.file, ''),
    line: lineField(entry.line),
    severity: stringField(entry.sev, DEFAULT_SEVERITY),
    content: stringField(entry.content, ''),
  };
}

/**
 * Projects an already-parsed review export onto the normalized shape.
 * Anything that is not an object is read as an empty one, so a bare array or
 * number yields the all-defaults run.
 */
export function formatReviewRun(data: unknown): NormalizedReviewRun {
  const run: RawReviewRun = isRecord(data) ? data : {};
  const stats: RawReviewStats = isRecord(run.stats) ? run.stats : {};
  const reviewsIn: unknown[] = Array.isArray(run.reviews) ? run.reviews : [];

  return {
    session_id: stringField(run.session_id, DEFAULT_SESSION_ID),
    summary: formatSummary(stats),
    // keep one output entry per input entry, even malformed ones
    reviews: reviewsIn.map((r) => formatReview(isRecord(r) ? r : {})),
  };
}

export function parseReviewOutput(text: string): ReviewParseResult {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return { error: `Invalid JSON: ${msg}` };
  }
  return formatReviewRun(data);
}

export function isParseError(result: ReviewParseResult): result is ReviewParseError {
  return 'error' in result;
}
