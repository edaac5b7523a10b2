/**
 * First entry of an ordered table that satisfies the predicate.
 * Shared by the API 2000 band table and the API 526 orifice table.
 */
export function findFirst<T>(table: readonly T[], matches: (entry: T) => boolean): T | undefined {
  return table.find(matches);
}
