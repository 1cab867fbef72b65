import * as fs from 'fs-extra';
import * as path from 'path';

/**
 * Lowercases the query and replaces each space with an underscore.
 */
export function normalizeQuery(query: string): string {
  return query.replace(/ /g, '_').toLowerCase();
}

/**
 * Output name for the n-th candidate of a query. The extension is always
 * `.jpg`, whatever the container format of the bytes.
 */
export function buildFilename(query: string, sequence: number): string {
  return `${normalizeQuery(query)}_${sequence}.jpg`;
}

export async function writeAsset(outputDir: string, filename: string, bytes: Buffer): Promise<string> {
  await fs.ensureDir(outputDir);
  const filePath = path.join(outputDir, filename);
  await fs.writeFile(filePath, bytes);

  const stats = await fs.stat(filePath);
  if (stats.size === 0) {
    throw new Error(`Failed to save file: ${filename}`);
  }
  return filePath;
}
