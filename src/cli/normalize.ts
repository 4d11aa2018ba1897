#!/usr/bin/env node
import { readReviewInput, formatOutput } from '../lib/io.js';
import { parseReviewOutput } from '../review/normalize.js';

// review-normalize [input-file]
// Reads the review export from the file, or from stdin when no file is given.
async function main() {
  const file = process.argv[2];
  const text = readReviewInput(file);
  const result = parseReviewOutput(text);
  process.stdout.write(formatOutput(result));
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
