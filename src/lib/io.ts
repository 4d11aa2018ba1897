import fs from 'node:fs';
import type { ReviewParseResult } from '../review/types.js';

// A non-blocking stdin pipe can make the sync read throw EAGAIN; not handled.
const STDIN_FD = 0;

// No path means stdin. A missing or unreadable file throws the fs error as-is.
export function readReviewInput(file?: string): string {
  return fs.readFileSync(file ?? STDIN_FD, 'utf8');
}

export function formatOutput(result: ReviewParseResult): string {
  return JSON.stringify(result, null, 2) + '\n';
}
