/**
 * Global Vitest Setup
 *
 * Runs before each test so that credentials and debug switches from the
 * invoking shell never leak into test behavior.
 */

import { beforeEach } from 'vitest';

beforeEach(() => {
  for (const key of Object.keys(process.env)) {
    if (key.startsWith('SHIPLOG_')) {
      delete process.env[key];
    }
  }

  // The pull request range reads these; tests set them explicitly when needed
  delete process.env.GITHUB_API_TOKEN;
  delete process.env.GITHUB_TOKEN;
});
