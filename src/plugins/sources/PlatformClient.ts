/**
 * @fileoverview Defines the upstream client interfaces the tracker depends on.
 * Implementations talk to Discord and the VRChat web API; tests substitute
 * in-process fakes.
 */

import { ChatMessage, RoleDefinition } from "../../types";

/**
 * Discord member as seen by the tracker: id and the role ids it holds.
 */
export interface ChatMember {
  id: string;
  roleIds: string[];
}

/**
 * Chat platform (Discord bot) operations
 * @interface ChatPlatformClient
 */
export interface ChatPlatformClient {
  /** Logs the bot in and waits until it is ready */
  connect(): Promise<void>;

  /** @returns the server display name */
  getServerName(serverId: string): Promise<string>;

  /** Role definitions of a server, with permission flag names */
  listRoles(serverId: string): Promise<RoleDefinition[]>;

  /** Every member of a server */
  listMembers(serverId: string): Promise<ChatMember[]>;

  /**
   * Message history of a channel, oldest first.
   * @param limit - maximum number of messages to read
   */
  listChannelMessages(serverId: string, channelId: string, limit: number): Promise<ChatMessage[]>;

  disconnect(): Promise<void>;
}

export interface VrcCurrentUser {
  id: string;
  displayName: string;
}

export interface VrcGroupMembership {
  id: string;
  groupId: string;
  userId: string;
  roleIds: string[];
}

export interface VrcGroupInfo {
  id: string;
  name: string;
  memberCount: number;
  /** Caller's own membership; null when the caller is not a member */
  myMember: VrcGroupMembership | null;
}

export interface VrcGroupMember {
  userId: string;
  displayName: string;
  roleIds: string[];
}

export interface VrcGroupRole {
  id: string;
  name: string;
  permissions: string[];
}

export interface VrcUser {
  id: string;
  displayName: string;
}

export interface VrcWorld {
  id: string;
  name: string;
  visits: number;
  favorites: number;
  occupants: number;
}

/**
 * VRChat web API operations
 * @interface VrcPlatformClient
 */
export interface VrcPlatformClient {
  /** Authenticates, completing two-factor verification when required */
  login(): Promise<VrcCurrentUser>;
  getGroup(groupId: string): Promise<VrcGroupInfo>;
  /** One page of group members, excluding the caller */
  getGroupMembers(groupId: string, n: number, offset: number): Promise<VrcGroupMember[]>;
  getGroupRoles(groupId: string): Promise<VrcGroupRole[]>;
  getUser(userId: string): Promise<VrcUser>;
  getWorld(worldId: string): Promise<VrcWorld>;
}
