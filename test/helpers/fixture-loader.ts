import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

export const FIXTURES_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', 'fixtures');

export function fixturePath(source: string, filename: string): string {
  return path.join(FIXTURES_DIR, source, filename);
}

export function loadFixture(source: string, filename: string): string {
  return fs.readFileSync(fixturePath(source, filename), 'utf-8');
}
