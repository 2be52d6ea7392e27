#!/usr/bin/env node
/**
 * shiplog CLI Entry Point
 */

import { readFileSync } from 'node:fs';

import { createProgram } from './program.js';

// Read version from package.json at runtime
function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.warn(`Warning: Could not read package.json version (${errorMessage}), using fallback`);
  }
  return '0.0.0';
}

await createProgram(readVersion()).parseAsync(process.argv);
