// src/aggregator/DirectoryAggregator.ts

/**
 * Merges VRChat group memberships and Discord role maps into one canonical
 * user list, and projects every group's and server's roles onto it.
 *
 * Display names are the join key between the two platforms. Their position in
 * the sorted, deduplicated list is the index written to the snapshot.
 *
 * @module aggregator
 */

import {
  ChatServer,
  Group,
  PermissionMarkers,
  RoleDefinition,
  TrackedDiscordServer,
  TrackedRole,
  TrackedVrcGroup
} from "../types";

export const VRC_PERMISSION_MARKERS: PermissionMarkers = {
  admin: '*',
  moderator: 'group-instance-moderate'
};

export const DISCORD_PERMISSION_MARKERS: PermissionMarkers = {
  admin: 'Administrator',
  moderator: 'ModerateMembers'
};

const collator = new Intl.Collator('en', { sensitivity: 'variant', caseFirst: 'lower' });

/**
 * Ordinal (UTF-16 code unit) comparison.
 */
export const compareOrdinal = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Dictionary order under a fixed English collation, lower case before upper
 * case of the same letter. Names the collation treats as equal fall back to
 * ordinal order.
 */
export const compareDisplayNames = (a: string, b: string): number => collator.compare(a, b) || compareOrdinal(a, b);

/**
 * Deduplicated list of display names in `compareDisplayNames` order.
 */
export class CanonicalUserList {
  private readonly names: string[];
  private readonly positions = new Map<string, number>();

  constructor(names: Iterable<string>) {
    this.names = Array.from(new Set(names)).sort(compareDisplayNames);
    this.names.forEach((name, index) => this.positions.set(name, index));
  }

  get displayNames(): readonly string[] {
    return this.names;
  }

  get size(): number {
    return this.names.length;
  }

  /**
   * @returns the canonical index, or -1 when the name is unknown
   */
  indexOf(name: string): number {
    return this.positions.get(name) ?? -1;
  }

  /**
   * Canonical indices of the given names in encounter order.
   * Unknown names are skipped and each index appears once.
   */
  indicesOf(names: Iterable<string>): number[] {
    const seen = new Set<number>();
    const indices: number[] = [];
    for (const name of names) {
      const index = this.indexOf(name);
      if (index === -1 || seen.has(index)) {
        continue;
      }
      seen.add(index);
      indices.push(index);
    }
    return indices;
  }
}

export interface Directory {
  users: CanonicalUserList;
  groups: Record<string, TrackedVrcGroup>;
  servers: Record<string, TrackedDiscordServer>;
}

/**
 * Admin and moderator flags are computed independently: admin implies
 * moderator, never the reverse.
 */
export function classifyRole(
  role: RoleDefinition,
  markers: PermissionMarkers
): Pick<TrackedRole, 'isAdmin' | 'isModerator'> {
  const isAdmin = role.permissions.includes(markers.admin);
  return {
    isAdmin,
    isModerator: isAdmin || role.permissions.includes(markers.moderator)
  };
}

interface RoleHolder {
  displayName: string;
  roleIds: readonly string[];
}

function projectRoles(
  roles: readonly RoleDefinition[],
  holders: readonly RoleHolder[],
  users: CanonicalUserList,
  markers: PermissionMarkers
): Record<string, TrackedRole> {
  const projected: Record<string, TrackedRole> = {};
  for (const role of roles) {
    projected[role.id] = {
      name: role.name,
      ...classifyRole(role, markers),
      vrcUsers: users.indicesOf(
        holders.filter(holder => holder.roleIds.includes(role.id)).map(holder => holder.displayName)
      )
    };
  }
  return projected;
}

/**
 * Builds the canonical user list and the group/server projections.
 */
export function aggregateDirectory(groups: readonly Group[], servers: readonly ChatServer[]): Directory {
  const users = new CanonicalUserList([
    ...groups.flatMap(group => group.members.map(member => member.displayName)),
    ...servers.flatMap(server => server.linkedUsers.map(user => user.displayName))
  ]);

  const projectedGroups: Record<string, TrackedVrcGroup> = {};
  for (const group of groups) {
    projectedGroups[group.id] = {
      name: group.name,
      vrcUsers: users.indicesOf(group.members.map(member => member.displayName)),
      roles: projectRoles(group.roles, group.members, users, VRC_PERMISSION_MARKERS)
    };
  }

  const projectedServers: Record<string, TrackedDiscordServer> = {};
  for (const server of servers) {
    projectedServers[server.id] = {
      name: server.name,
      vrcUsers: users.indicesOf(server.linkedUsers.map(user => user.displayName)),
      roles: projectRoles(server.roles, server.linkedUsers, users, DISCORD_PERMISSION_MARKERS)
    };
  }

  return { users, groups: projectedGroups, servers: projectedServers };
}
