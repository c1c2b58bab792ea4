/**
 * Fixture loading utilities for tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Get the absolute path to the fixtures directory
 * Works whether running from src or dist
 */
function getFixturesRoot(): string {
  // Compiled code lives in dist/fixtures; the JSON files stay in src/fixtures
  if (__dirname.includes(`${path.sep}dist${path.sep}`)) {
    const packageRoot = path.resolve(__dirname, '..', '..');
    return path.join(packageRoot, 'src', 'fixtures');
  }

  return __dirname;
}

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(relativePath: string): string {
  return path.join(getFixturesRoot(), relativePath);
}

/**
 * Load a JSON fixture file synchronously and check it against a schema
 */
export function loadJsonSync<T>(relativePath: string, schema: z.ZodType<T>): T {
  const content = fs.readFileSync(getFixturePath(relativePath), 'utf-8');
  return schema.parse(JSON.parse(content));
}

/**
 * List the JSON fixtures in a directory
 */
export function listJsonFixtures(directory: string): string[] {
  const fullPath = getFixturePath(directory);
  if (!fs.existsSync(fullPath)) {
    return [];
  }
  return fs
    .readdirSync(fullPath)
    .filter((f) => f.endsWith('.json'))
    .sort()
    .map((f) => path.join(directory, f));
}
