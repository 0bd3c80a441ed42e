#!/usr/bin/env tsx
/**
 * Pre-flight environment check — validates env vars via config.ts Zod schema
 * and reports which external tools resolve on PATH.
 * Run: npm run check-env
 */
import { spawnSync } from 'child_process';
import { env, TOOLS } from '../src/config.js';

// config.ts import will throw descriptively on invalid vars
console.log('✓ Environment variables are valid');
console.log(`  LOG_LEVEL:          ${env.LOG_LEVEL} (${env.LOG_FORMAT})`);
console.log(`  DEFAULT_FRAMERATE:  ${env.DEFAULT_FRAMERATE}`);
console.log(`  DEFAULT_VIDEO_EXT:  ${env.DEFAULT_VIDEO_EXT}`);

for (const [name, bin] of Object.entries(TOOLS)) {
  const probe = spawnSync(bin, ['--help'], { stdio: 'ignore' });
  const status = probe.error ? 'MISSING' : 'found';
  console.log(`  ${(name + ':').padEnd(19)} ${bin} (${status})`);
}
