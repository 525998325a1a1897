import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { logger } from '../observability/logger.js';
import { hasErrorCode } from '../utils/errors.js';
import { parseCacheSnapshot, serializeCacheSnapshot } from './codec.js';
import {
  CACHE_VERSION,
  CacheFormatError,
  CacheWriteError,
  type CacheLoadFailure,
  type CacheSnapshot,
} from './types.js';

export type CacheLoadResult =
  | { status: 'loaded'; snapshot: CacheSnapshot }
  | { status: 'absent'; reason: CacheLoadFailure; detail?: string };

/**
 * Read the cache file and classify the outcome. Never throws: anything that
 * prevents a trustworthy snapshot is reported as absent.
 */
export async function readCache(
  cachePath: string,
  expectedVersion: string = CACHE_VERSION
): Promise<CacheLoadResult> {
  let text: string;
  try {
    text = await fs.readFile(cachePath, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return { status: 'absent', reason: 'missing' };
    }
    return {
      status: 'absent',
      reason: 'unreadable',
      detail: error instanceof Error ? error.message : 'Unknown error',
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return {
      status: 'absent',
      reason: 'invalid_json',
      detail: error instanceof Error ? error.message : 'Unknown error',
    };
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { status: 'absent', reason: 'malformed', detail: 'root is not an object' };
  }

  const version = 'version' in parsed ? parsed.version : undefined;
  if (version !== expectedVersion) {
    return {
      status: 'absent',
      reason: 'version_mismatch',
      detail: `found ${String(version)}, expected ${expectedVersion}`,
    };
  }

  try {
    return { status: 'loaded', snapshot: parseCacheSnapshot(parsed) };
  } catch (error) {
    if (error instanceof CacheFormatError) {
      return { status: 'absent', reason: 'malformed', detail: error.message };
    }
    throw error;
  }
}

export async function loadCache(
  cachePath: string,
  expectedVersion: string = CACHE_VERSION
): Promise<CacheSnapshot | null> {
  const result = await readCache(cachePath, expectedVersion);

  if (result.status === 'loaded') {
    logger.info('cache_load', 'Cache loaded', {
      cachePath,
      documents: result.snapshot.documents.size,
      timestamp: result.snapshot.timestamp,
    });
    return result.snapshot;
  }

  if (result.reason === 'missing') {
    logger.info('cache_load', 'No cache file, starting cold', { cachePath });
  } else {
    logger.warn('cache_load', 'Cache discarded, starting cold', {
      cachePath,
      reason: result.reason,
      detail: result.detail,
    });
  }
  return null;
}

/**
 * Stamp and persist a snapshot. The file is written beside the target and
 * renamed over it, so a reader sees either the previous file or the new one.
 */
export async function saveCache(snapshot: CacheSnapshot, cachePath: string): Promise<CacheSnapshot> {
  const stamped: CacheSnapshot = {
    ...snapshot,
    timestamp: new Date().toISOString(),
  };
  const payload = JSON.stringify(serializeCacheSnapshot(stamped), null, 2);
  const tmpPath = `${cachePath}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`;

  try {
    await fs.mkdir(path.dirname(cachePath), { recursive: true });
    await fs.writeFile(tmpPath, payload, 'utf-8');
    await fs.rename(tmpPath, cachePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true }).catch((rmError: unknown) => {
      logger.warn('cache_save', 'Could not remove temporary cache file', {
        tmpPath,
        error: rmError instanceof Error ? rmError.message : 'Unknown error',
      });
    });
    throw new CacheWriteError(cachePath, error);
  }

  logger.info('cache_save', 'Cache saved', {
    cachePath,
    documents: stamped.documents.size,
  });

  return stamped;
}

export async function clearCache(cachePath: string): Promise<boolean> {
  try {
    await fs.unlink(cachePath);
    return true;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return false;
    }
    throw error;
  }
}
