/**
 * Membership lookup and classification
 */

import type { Classification, MembershipSets, PackageStatus } from '../models/index.js';

export function getPackageStatus(name: string, membership: MembershipSets): PackageStatus {
  return {
    installed: membership.installed.has(name),
    inspected: membership.inspected.has(name),
  };
}

/** Installed takes precedence over inspected. */
export function classify(status: PackageStatus): Classification {
  if (status.installed) return 'installed';
  if (status.inspected) return 'inspected';
  return 'plain';
}

export function createMembershipSets(
  installed: Iterable<string> = [],
  inspected: Iterable<string> = [],
): MembershipSets {
  return {
    installed: new Set(installed),
    inspected: new Set(inspected),
  };
}
