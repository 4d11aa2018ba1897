import * as core from '@actions/core';

import fs from 'node:fs/promises';
import path from 'node:path';

import { formatOutput } from './lib/io.js';
import { isParseError, parseReviewOutput } from './review/normalize.js';

function resolveInWorkspace(p: string): string {
  const workspace = process.env.GITHUB_WORKSPACE || process.cwd();
  return path.isAbsolute(p) ? p : path.join(workspace, p);
}

async function writeNormalized(outputFile: string, json: string) {
  const outAbs = resolveInWorkspace(outputFile);
  await fs.mkdir(path.dirname(outAbs), { recursive: true });
  await fs.writeFile(outAbs, json, 'utf8');
  core.info(`Wrote normalized review to ${outAbs}`);
}

export async function run() {
  const reviewFile = core.getInput('review_file', { required: true });
  const outputFile = core.getInput('output_file');
  const blockOnCritical = (core.getInput('block_on_critical') || 'true').toLowerCase() === 'true';

  const text = await fs.readFile(resolveInWorkspace(reviewFile), 'utf8');
  const result = parseReviewOutput(text);
  const json = formatOutput(result);

  core.setOutput('normalized_json', json);
  if (outputFile) await writeNormalized(outputFile, json);

  // A broken export is reported, not fatal: downstream steps still get the error record.
  if (isParseError(result)) {
    core.warning(result.error);
    return;
  }

  const { session_id, summary, reviews } = result;
  core.setOutput('session_id', session_id);
  core.setOutput('critical_count', String(summary.critical));
  core.setOutput('comment_count', String(reviews.length));

  core.info(
    `Session ${session_id}: ${reviews.length} comment(s) across ${summary.files} file(s) ` +
      `(critical ${summary.critical}, warning ${summary.warning}, info ${summary.info})`
  );

  if (blockOnCritical && summary.critical > 0) {
    throw new Error(`Found ${summary.critical} critical review comment(s)`);
  }
}
