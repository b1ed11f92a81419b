import { access } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { PathNotFoundError } from './errors.js';

interface PathResolverOptions {
  fallbackDir: string;
  exists?: (path: string) => Promise<boolean>;
}

export interface PathResolver {
  resolve(item: string): Promise<string>;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolves a work item to a readable path: the item as given, then the same
 * file name inside the fallback directory.
 */
export function createPathResolver(options: PathResolverOptions): PathResolver {
  const exists = options.exists ?? fileExists;

  return {
    resolve: async (item: string): Promise<string> => {
      const candidates = [item, join(options.fallbackDir, basename(item))];

      for (const candidate of candidates) {
        if (await exists(candidate)) {
          return candidate;
        }
      }

      throw new PathNotFoundError(item, candidates);
    },
  };
}
