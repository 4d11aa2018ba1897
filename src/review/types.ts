// Input as exported by the review tool. Every field is optional and may carry
// the wrong type; nothing here is trusted until normalize.ts narrows it.
export type RawReviewStats = {
  files_reviewed?: unknown;
  total_comments?: unknown;
  critical?: unknown;
  warning?: unknown;
  info?: unknown;
};

export type RawReviewEntry = {
  file?: unknown;
  line?: unknown;
  sev?: unknown; // severity code, e.g. c / w / i
  content?: unknown;
};

export type RawReviewRun = {
  session_id?: unknown;
  stats?: unknown;
  reviews?: unknown;
};

export type ReviewSummary = {
  files: number;
  comments: number;
  critical: number;
  warning: number;
  info: number;
};

export type NormalizedReview = {
  file: string;
  line: number | null;
  severity: string; // opaque, passed through
  content: string;
};

export type NormalizedReviewRun = {
  session_id: string;
  summary: ReviewSummary;
  reviews: NormalizedReview[];
};

export type ReviewParseError = {
  error: string;
};

export type ReviewParseResult = NormalizedReviewRun | ReviewParseError;
