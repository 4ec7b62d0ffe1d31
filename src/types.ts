// src/types.ts

/**
 * A chat message as seen by the reconciler.
 */
export interface ChatMessage {
  id: string;
  authorId: string;
  timestamp: number;     // epoch milliseconds
  content: string;
}

/**
 * A claimed association between a chat author and a VRChat user id,
 * recovered from a single message.
 */
export interface IdentityLink {
  vrcUserId: string;
  authorId: string;
  timestamp: number;
  sequence: number;      // position in the channel history, oldest first
}

/**
 * Chat author id -> role ids held on one server.
 */
export type Roster = ReadonlyMap<string, readonly string[]>;

/**
 * VRChat user id -> role ids held on one chat server.
 */
export type RoleMap = Map<string, ReadonlySet<string>>;

/**
 * A role definition on either platform. Permissions are kept as names
 * (e.g. "*" on VRChat, "Administrator" on Discord).
 */
export interface RoleDefinition {
  id: string;
  name: string;
  permissions: readonly string[];
}

/**
 * Markers that promote a role to admin or moderator.
 */
export interface PermissionMarkers {
  admin: string;
  moderator: string;
}

export interface GroupMember {
  userId: string;
  displayName: string;
  roleIds: readonly string[];
}

/**
 * A VRChat group as collected during one run.
 */
export interface Group {
  id: string;
  name: string;
  members: GroupMember[];
  roles: RoleDefinition[];
}

export interface LinkedUser {
  vrcUserId: string;
  displayName: string;
  roleIds: readonly string[];
}

/**
 * A Discord server as collected during one run. `roles` only holds the
 * roles observed among linked users.
 */
export interface ChatServer {
  id: string;
  name: string;
  roles: RoleDefinition[];
  linkedUsers: LinkedUser[];
}

export interface World {
  id: string;
  name: string;
  visits: number;
  favorites: number;
  occupants: number;
}

/**
 * Persisted document shapes.
 */
export interface TrackedRole {
  name: string;
  isAdmin: boolean;
  isModerator: boolean;
  vrcUsers: number[];
}

export interface TrackedVrcGroup {
  name: string;
  vrcUsers: number[];
  roles: Record<string, TrackedRole>;
}

export interface TrackedDiscordServer {
  name: string;
  vrcUsers: number[];
  roles: Record<string, TrackedRole>;
}

export interface TrackedVrcWorld {
  name: string;
  visits: number;
  favorites: number;
  occupants: number;
}

export interface TrackedData {
  vrcUserDisplayNames: string[];
  vrcGroupsById: Record<string, TrackedVrcGroup>;
  discordServersById: Record<string, TrackedDiscordServer>;
  vrcWorldsById: Record<string, TrackedVrcWorld>;
}

/**
 * Delays and limits applied by the tracker. All durations in milliseconds.
 */
export interface PacingSettings {
  /** Delay after each Discord listing call */
  chatListingDelay: number;
  /** Delay after each VRChat group member page */
  listingDelay: number;
  /** Delay after each per-user or per-world lookup */
  lookupDelay: number;
  /** Fixed delay between message listing attempts */
  retryDelay: number;
  /** Attempt ceiling for message listing */
  maxAttempts: number;
  /** Cap on messages read from one channel */
  maxMessages: number;
}

/**
 * Fully parsed command line / environment configuration.
 */
export interface TrackerConfig {
  workspace: string;
  output: string;
  username: string;
  password: string;
  totpKey: string;
  groupIds: string[];
  worldIds: string[];
  discord?: {
    botToken: string;
    servers: Array<{ serverId: string; channelId: string }>;
  };
}
