/**
 * Fixture file access for tests
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

export function fixturePath(fileName: string): string {
  return fileURLToPath(new URL(`../fixtures/${fileName}`, import.meta.url));
}

export function readFixture(fileName: string): string {
  return readFileSync(fixturePath(fileName), 'utf-8');
}
