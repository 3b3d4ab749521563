/**
 * Reliability ranking for descriptors that match the same lookup
 *
 * Criteria, first discriminating one wins:
 * 1. Registered before unregistered
 * 2. Complete (has extensions) before incomplete
 * 3. Current before obsolete
 * 4. Obsolete with a replacement before obsolete without
 * 5. Replacement names in lexical order
 *
 * The simplified key is not consulted; ties keep their input order.
 */

import type { MimeType } from "./mime-type.js";

/**
 * Code-unit string comparison
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order two descriptors by reliability
 * @returns Negative when `a` ranks first, positive when `b` does, 0 on a tie
 */
export function priorityCompare(a: MimeType, b: MimeType): number {
  if (a.registered !== b.registered) {
    return a.registered ? -1 : 1;
  }

  if (a.complete !== b.complete) {
    return a.complete ? -1 : 1;
  }

  if (a.obsolete !== b.obsolete) {
    return a.obsolete ? 1 : -1;
  }

  if (a.obsolete) {
    const ours = a.useInstead;
    const theirs = b.useInstead;

    if (ours !== theirs) {
      if (ours === undefined) return 1;
      if (theirs === undefined) return -1;
      return compareStrings(ours, theirs);
    }
  }

  return 0;
}

/**
 * Sorted copy, most reliable first (stable for ties)
 */
export function sortByPriority(types: Iterable<MimeType>): MimeType[] {
  return [...types].sort(priorityCompare);
}
