/**
 * Cluster building: transitive closure of similarity pairs
 */

import { pino } from 'pino';
import { compareIds, type Claim, type ClaimGroup, type SimilarityPair } from '@digest/core';
import { flagConflicts, type UnflaggedGroup } from './conflicts.js';
import { DisjointSet } from './union-find.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

/**
 * Map every claim id to its group id.
 *
 * Claims connected through any chain of pairs share a group. The group id is
 * the smallest claim id in the group, so the result does not depend on the
 * order of claims or pairs.
 */
export function buildClusters(claimIds: readonly string[], pairs: readonly SimilarityPair[]): Map<string, string> {
  const indexById = new Map<string, number>();
  claimIds.forEach((id, index) => {
    if (indexById.has(id)) {
      throw new Error(`Duplicate claim id: ${id}`);
    }
    indexById.set(id, index);
  });

  const sets = new DisjointSet(claimIds.length);
  let ignored = 0;

  for (const pair of pairs) {
    const a = indexById.get(pair.claimIdA);
    const b = indexById.get(pair.claimIdB);
    if (a === undefined || b === undefined || a === b) {
      ignored += 1;
      logger.warn(
        { event: 'grouping.cluster.skip_pair', claimIdA: pair.claimIdA, claimIdB: pair.claimIdB },
        'Ignoring pair with unknown or identical claim ids'
      );
      continue;
    }
    sets.union(a, b);
  }

  const smallestByRoot = new Map<number, string>();
  claimIds.forEach((id, index) => {
    const root = sets.find(index);
    const current = smallestByRoot.get(root);
    if (current === undefined || compareIds(id, current) < 0) {
      smallestByRoot.set(root, id);
    }
  });

  const assignment = new Map<string, string>();
  claimIds.forEach((id, index) => {
    const groupId = smallestByRoot.get(sets.find(index));
    assignment.set(id, groupId ?? id);
  });

  logger.debug(
    { event: 'grouping.cluster.built', claims: claimIds.length, pairs: pairs.length, ignored, groups: smallestByRoot.size },
    `Built ${smallestByRoot.size} clusters`
  );

  return assignment;
}

/**
 * Largest groups first; equal sizes ordered by group id
 */
export function compareGroups(a: Pick<ClaimGroup, 'claims' | 'groupId'>, b: Pick<ClaimGroup, 'claims' | 'groupId'>): number {
  return b.claims.length - a.claims.length || compareIds(a.groupId, b.groupId);
}

/**
 * Turn an assignment into flagged groups. Claims keep their input order
 * inside a group; the first one names the theme.
 */
export function materializeGroups(claims: readonly Claim[], assignment: ReadonlyMap<string, string>): ClaimGroup[] {
  const membersByGroup = new Map<string, Claim[]>();

  for (const claim of claims) {
    const groupId = assignment.get(claim.id);
    if (groupId === undefined) {
      throw new Error(`Claim ${claim.id} has no group assignment`);
    }
    const members = membersByGroup.get(groupId);
    if (members) {
      members.push(claim);
    } else {
      membersByGroup.set(groupId, [claim]);
    }
  }

  const drafts: UnflaggedGroup[] = [];
  for (const [groupId, members] of membersByGroup) {
    const [first] = members;
    if (!first) continue;
    drafts.push({
      groupId,
      theme: first.text,
      claimIds: members.map((claim) => claim.id).sort(compareIds),
      claims: members,
    });
  }

  return flagConflicts(drafts).sort(compareGroups);
}
