import { compareIds, type ClaimGroup } from '@digest/core';

export type UnflaggedGroup = Omit<ClaimGroup, 'sourceIds' | 'conflicting'>;

/**
 * Derive each group's distinct sources and mark groups that span more than one.
 * Singletons can never conflict.
 */
export function flagConflicts(groups: readonly UnflaggedGroup[]): ClaimGroup[] {
  return groups.map((group) => {
    const sourceIds = [...new Set(group.claims.map((claim) => claim.sourceId))].sort(compareIds);
    return {
      groupId: group.groupId,
      theme: group.theme,
      claimIds: group.claimIds,
      claims: group.claims,
      sourceIds,
      conflicting: sourceIds.length > 1,
    };
  });
}
