import path from 'path';

/**
 * True when `candidate` is `ancestor` itself or lies anywhere below it.
 * Compares whole path segments, so `/data/photos2` is not inside `/data/photos`.
 *
 * @example
 * isSameOrInside('/data/photos', '/data/photos/2019') // true
 * isSameOrInside('/data/photos', '/data/photos2')     // false
 */
export function isSameOrInside(ancestor: string, candidate: string): boolean {
  const relative = path.relative(path.resolve(ancestor), path.resolve(candidate));
  if (relative === '') {
    return true;
  }
  if (path.isAbsolute(relative)) {
    return false;
  }
  return relative !== '..' && !relative.startsWith(`..${path.sep}`);
}

/**
 * Finds the first pair of paths where one equals or contains the other
 * @returns The overlapping pair as [ancestor, descendant], or null when all are disjoint
 */
export function findOverlap(paths: string[]): [string, string] | null {
  for (let i = 0; i < paths.length; i++) {
    for (let j = i + 1; j < paths.length; j++) {
      if (isSameOrInside(paths[i], paths[j])) {
        return [paths[i], paths[j]];
      }
      if (isSameOrInside(paths[j], paths[i])) {
        return [paths[j], paths[i]];
      }
    }
  }
  return null;
}
