import fs from 'fs/promises';
import path from 'path';
import { logger } from '../observability/logger.js';
import { hasErrorCode } from '../utils/errors.js';
import type { DiscoveryOptions } from './types.js';
import { toDocumentKey } from './reader.js';

function isExcluded(key: string, exclude: readonly string[]): boolean {
  return exclude.some(prefix => {
    const normalized = prefix.replace(/\/+$/, '');
    return key === normalized || key.startsWith(`${normalized}/`);
  });
}

/**
 * Find documents under the configured roots by extension. Returns
 * root-relative keys, sorted.
 */
export async function discoverDocuments(root: string, options: DiscoveryOptions): Promise<string[]> {
  const found = new Set<string>();

  for (const scanRoot of options.roots) {
    const absolute = path.resolve(root, scanRoot);
    let entries: string[];
    try {
      entries = await fs.readdir(absolute, { recursive: true });
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        logger.warn('discovery', 'Scan root does not exist', { scanRoot });
        continue;
      }
      throw error;
    }

    for (const entry of entries) {
      if (!options.extensions.includes(path.extname(entry))) continue;
      const key = toDocumentKey(root, path.join(absolute, entry));
      if (isExcluded(key, options.exclude)) continue;
      const stat = await fs.stat(path.resolve(root, key));
      if (stat.isFile()) {
        found.add(key);
      }
    }
  }

  return [...found].sort();
}
