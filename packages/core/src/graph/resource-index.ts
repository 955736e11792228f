/**
 * Resource lookup by pattern and boundary.
 *
 * Resource ids are kept in one sorted array so prefix patterns resolve with
 * a binary search; other pattern kinds scan. Results are memoized per
 * (boundary, pattern) until the index changes.
 */

import { compilePattern, matchesCompiled } from '../utils/pattern-matching';

export const DEFAULT_BOUNDARY = '(default)';

export interface ResourceIndexStats {
  resources: number;
  cachedPatterns: number;
  cacheHits: number;
  cacheMisses: number;
}

export class ResourceIndex {
  private sortedIds: string[] = [];
  private dirty = false;
  private boundaries: Map<string, string> = new Map();
  private cache: Map<string, readonly string[]> = new Map();
  private hits = 0;
  private misses = 0;

  add(resourceId: string, boundary: string): void {
    this.sortedIds.push(resourceId);
    this.boundaries.set(resourceId, boundary);
    this.dirty = true;
    this.cache.clear();
  }

  boundaryOf(resourceId: string): string | undefined {
    return this.boundaries.get(resourceId);
  }

  /**
   * Resource ids matching `pattern`, optionally restricted to one boundary.
   * Sorted ascending. Throws ResolutionError for malformed patterns.
   */
  match(pattern: string, boundary?: string): readonly string[] {
    const key = `${boundary ?? '*'}\u0000${pattern}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const compiled = compilePattern(pattern);
    const ids = this.ensureSorted();
    let candidates: string[];

    switch (compiled.kind) {
      case 'exact':
        candidates = this.boundaries.has(compiled.literal) ? [compiled.literal] : [];
        break;
      case 'prefix': {
        candidates = [];
        for (let i = lowerBound(ids, compiled.literal); i < ids.length; i++) {
          if (!ids[i].startsWith(compiled.literal)) break;
          candidates.push(ids[i]);
        }
        break;
      }
      default:
        candidates = ids.filter(id => matchesCompiled(compiled, id));
    }

    const result =
      boundary === undefined
        ? candidates
        : candidates.filter(id => this.boundaries.get(id) === boundary);

    this.cache.set(key, result);
    return result;
  }

  getStats(): ResourceIndexStats {
    return {
      resources: this.sortedIds.length,
      cachedPatterns: this.cache.size,
      cacheHits: this.hits,
      cacheMisses: this.misses,
    };
  }

  private ensureSorted(): string[] {
    if (this.dirty) {
      this.sortedIds.sort(compareIds);
      this.dirty = false;
    }
    return this.sortedIds;
  }
}

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function lowerBound(sorted: string[], value: string): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < value) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
