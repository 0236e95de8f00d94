// ============================================================
// AC-3 Arc Consistency
//
// Runs once before search. Removes every row that has no
// compatible partner in some other column's domain, and stops
// as soon as a domain wipes out.
//
// Revision uses the full non-attack predicate (row AND
// diagonal), so n = 2 and n = 3 are refuted here without search.
// ============================================================

import type { Arc } from '../types';
import type { DomainStore } from './domain-store';
import { generateArcs, isCompatible } from './constraints';

export interface ArcConsistencyResult {
  consistent: boolean;
  revisions: number;
  removedValues: number;
  emptiedVariable?: number;
}

/**
 * Make xi arc-consistent with xj. Returns the number of values
 * removed from xi's domain.
 */
export function revise(domains: DomainStore, xi: number, xj: number): number {
  const target = domains.get(xj);
  let removed = 0;
  for (const v of [...domains.get(xi)]) {
    const supported = target.some(w => isCompatible(xi, v, xj, w));
    if (!supported && domains.remove(xi, v)) removed++;
  }
  return removed;
}

export function enforceArcConsistency(domains: DomainStore): ArcConsistencyResult {
  const n = domains.size;
  // FIFO worklist, consumed by head index
  const queue: Arc[] = generateArcs(n);
  let head = 0;
  let revisions = 0;
  let removedValues = 0;

  while (head < queue.length) {
    const { from: xi, to: xj } = queue[head++];
    revisions++;

    const removed = revise(domains, xi, xj);
    if (removed === 0) continue;
    removedValues += removed;

    if (domains.isEmpty(xi)) {
      return { consistent: false, revisions, removedValues, emptiedVariable: xi };
    }

    for (let k = 0; k < n; k++) {
      if (k !== xi && k !== xj) queue.push({ from: k, to: xi });
    }
  }

  return { consistent: true, revisions, removedValues };
}
