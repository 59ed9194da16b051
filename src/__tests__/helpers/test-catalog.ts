/**
 * Test catalog helper
 * Creates throwaway directories for catalog files
 */

import { mkdtempSync, rmSync, writeFileSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export interface TestCatalogContext {
  dir: string;
  filePath: string;
  write(content: string): void;
  read(): string;
}

/**
 * Create a temp directory; the catalog file inside it does not exist yet
 */
export function createTestCatalog(fileName = 'songs.json'): TestCatalogContext {
  const dir = mkdtempSync(join(tmpdir(), 'song-catalog-'));
  const filePath = join(dir, fileName);

  return {
    dir,
    filePath,
    write: content => writeFileSync(filePath, content, 'utf-8'),
    read: () => readFileSync(filePath, 'utf-8')
  };
}

export function removeTestCatalog(ctx: TestCatalogContext): void {
  rmSync(ctx.dir, { recursive: true, force: true });
}
