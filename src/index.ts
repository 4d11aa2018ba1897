import * as core from '@actions/core';

import { run } from './action.js';

function describeError(err: unknown): string {
  if (err instanceof Error) return err.stack ?? err.message;
  return String(err);
}

void (async () => {
  try {
    await run();
  } catch (err) {
    core.setFailed(describeError(err));
  }
})();
