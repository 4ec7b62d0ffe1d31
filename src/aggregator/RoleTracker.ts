// src/aggregator/RoleTracker.ts

/**
 * Drives one tracker run: Discord role maps, VRChat groups, user and world
 * lookups, then aggregation into the snapshot document.
 *
 * Everything runs sequentially. A pacing delay follows every listing call and
 * every lookup; only channel message listing is retried. The abort signal is
 * checked between servers, groups, users and worlds.
 *
 * @module aggregator
 */

import { ChatPlatformClient, VrcCurrentUser, VrcGroupMember, VrcPlatformClient } from "../plugins/sources/PlatformClient";
import { assembleSnapshot } from "../plugins/exporters/SnapshotExporter";
import { aggregateDirectory } from "./DirectoryAggregator";
import { reconcile } from "./MessageReconciler";
import { logger, createProgressBar, formatNumber } from "../helpers/cliHelper";
import { TrackerError, toUpstreamError } from "../helpers/errors";
import { delay, retryOperation } from "../helpers/generalHelper";
import { DEFAULT_PACING } from "../helpers/configHelper";
import {
  ChatServer,
  Group,
  PacingSettings,
  RoleDefinition,
  RoleMap,
  TrackedData,
  TrackerConfig,
  World
} from "../types";

/** Page size for VRChat group member listing */
const GROUP_MEMBER_PAGE_SIZE = 100;

export interface RoleTrackerOptions {
  config: TrackerConfig;
  vrc: VrcPlatformClient;
  /** Required when the configuration enables the Discord integration */
  chat?: ChatPlatformClient;
  pacing?: Partial<PacingSettings>;
  signal?: AbortSignal;
}

/**
 * Discord data collected before VRChat ids are resolved to display names.
 */
export interface CollectedServer {
  id: string;
  name: string;
  roles: RoleDefinition[];
  roleMap: RoleMap;
}

export class RoleTracker {
  private config: TrackerConfig;
  private vrc: VrcPlatformClient;
  private chat: ChatPlatformClient | undefined;
  private pacing: PacingSettings;
  private signal: AbortSignal | undefined;
  /** Display names already looked up during this run */
  private displayNames = new Map<string, string>();

  constructor(options: RoleTrackerOptions) {
    this.config = options.config;
    this.vrc = options.vrc;
    this.chat = options.chat;
    this.pacing = { ...DEFAULT_PACING, ...options.pacing };
    this.signal = options.signal;

    if (this.config.discord && !this.chat) {
      throw new TrackerError('Discord integration is configured but no chat client was provided', 'configuration');
    }
  }

  /**
   * Stops the run at a safe point once the signal is aborted.
   */
  private checkpoint(): void {
    if (this.signal?.aborted) {
      throw new TrackerError('Run interrupted', 'interrupted');
    }
  }

  private async call<T>(context: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw toUpstreamError(error, context);
    }
  }

  /**
   * Collects everything and returns the assembled snapshot. Nothing is
   * written here; a thrown error means no snapshot exists.
   */
  public async run(): Promise<TrackedData> {
    const collectedServers = await this.collectDiscordServers();

    const currentUser = await this.call('VRChat login', () => this.vrc.login());

    const groups: Group[] = [];
    for (const groupId of this.config.groupIds) {
      this.checkpoint();
      groups.push(await this.collectGroup(groupId, currentUser));
    }

    const servers = await this.resolveLinkedUsers(collectedServers);
    const worlds = await this.collectWorlds();

    const directory = aggregateDirectory(groups, servers);
    logger.success(`Tracked ${formatNumber(directory.users.size)} users across ${groups.length} groups and ${servers.length} servers`);
    return assembleSnapshot(directory, worlds);
  }

  // ============================================
  // DISCORD
  // ============================================

  public async collectDiscordServers(): Promise<CollectedServer[]> {
    const discord = this.config.discord;
    const chat = this.chat;
    if (!discord || !chat) {
      logger.info('Skipping Discord Integration...');
      return [];
    }

    await this.call('Discord login', () => chat.connect());
    try {
      const servers: CollectedServer[] = [];
      for (const { serverId, channelId } of discord.servers) {
        this.checkpoint();
        servers.push(await this.collectDiscordServer(chat, serverId, channelId));
      }
      return servers;
    } finally {
      await chat.disconnect();
    }
  }

  private async collectDiscordServer(chat: ChatPlatformClient, serverId: string, channelId: string): Promise<CollectedServer> {
    logger.info(`Getting Discord Users from server ${serverId}...`);
    const name = await this.call(`Discord server ${serverId}`, () => chat.getServerName(serverId));
    await delay(this.pacing.chatListingDelay);
    const roles = await this.call(`Discord roles of ${serverId}`, () => chat.listRoles(serverId));
    await delay(this.pacing.chatListingDelay);
    const members = await this.call(`Discord members of ${serverId}`, () => chat.listMembers(serverId));
    await delay(this.pacing.chatListingDelay);
    logger.info(`Got Discord Users: ${formatNumber(members.length)}`);

    logger.info(`Getting VRC-Discord connections from server ${serverId} channel ${channelId}...`);
    const messages = await this.listMessagesWithRetry(chat, serverId, channelId);

    const roster = new Map(members.map(member => [member.id, member.roleIds]));
    const roleMap = reconcile(messages, roster);
    logger.info(`Got VRC-Discord connections: ${roleMap.size}`);

    const observedRoleIds = new Set<string>();
    for (const roleIds of roleMap.values()) {
      roleIds.forEach(roleId => observedRoleIds.add(roleId));
    }

    return {
      id: serverId,
      name,
      roles: roles.filter(role => observedRoleIds.has(role.id)),
      roleMap
    };
  }

  private async listMessagesWithRetry(chat: ChatPlatformClient, serverId: string, channelId: string) {
    const { maxAttempts, retryDelay, maxMessages } = this.pacing;
    try {
      return await retryOperation(
        () => chat.listChannelMessages(serverId, channelId, maxMessages),
        {
          attempts: maxAttempts,
          delayMs: retryDelay,
          label: `Getting messages from channel ${channelId}`,
          signal: this.signal,
          // TrackerErrors from the client are permanent
          retryable: error => !(error instanceof TrackerError)
        }
      );
    } catch (error) {
      this.checkpoint();
      throw toUpstreamError(error, `Getting messages from channel ${channelId} failed after ${maxAttempts} attempts`);
    }
  }

  /**
   * Turns each server's VRChat ids into display names, one lookup per id.
   */
  private async resolveLinkedUsers(collected: readonly CollectedServer[]): Promise<ChatServer[]> {
    if (collected.length === 0) {
      return [];
    }

    logger.info('Getting Discord Users...');
    const servers: ChatServer[] = [];
    for (const server of collected) {
      const linkedUsers: ChatServer['linkedUsers'] = [];
      for (const [vrcUserId, roleIds] of server.roleMap) {
        this.checkpoint();
        linkedUsers.push({
          vrcUserId,
          displayName: await this.lookupDisplayName(vrcUserId),
          roleIds: Array.from(roleIds)
        });
      }
      servers.push({ id: server.id, name: server.name, roles: server.roles, linkedUsers });
    }
    return servers;
  }

  private async lookupDisplayName(vrcUserId: string): Promise<string> {
    const known = this.displayNames.get(vrcUserId);
    if (known !== undefined) {
      return known;
    }
    const user = await this.call(`VRChat user ${vrcUserId}`, () => this.vrc.getUser(vrcUserId));
    await delay(this.pacing.lookupDelay);
    this.displayNames.set(vrcUserId, user.displayName);
    return user.displayName;
  }

  // ============================================
  // VRCHAT
  // ============================================

  private async collectGroup(groupId: string, currentUser: VrcCurrentUser): Promise<Group> {
    const group = await this.call(`VRChat group ${groupId}`, () => this.vrc.getGroup(groupId));
    logger.info(`Got Group ${group.name}, Members: ${formatNumber(group.memberCount)}`);

    const self = group.myMember;
    if (!self) {
      throw new TrackerError(`User must be a member of the group! (${group.name})`, 'membership');
    }

    // The listing leaves out the caller, who is added from myMember below
    logger.info('Getting Group Members...');
    const members: VrcGroupMember[] = [];
    while (members.length < group.memberCount - 1) {
      this.checkpoint();
      const page = await this.call(
        `VRChat members of ${groupId}`,
        () => this.vrc.getGroupMembers(groupId, GROUP_MEMBER_PAGE_SIZE, members.length)
      );
      await delay(this.pacing.listingDelay);
      if (page.length === 0) {
        break;
      }
      members.push(...page);
      logger.progress(`${group.name}: ${createProgressBar(members.length, group.memberCount - 1)}`);
    }
    logger.clearLine();

    if (!members.some(member => member.userId === currentUser.id)) {
      members.push({ userId: currentUser.id, displayName: currentUser.displayName, roleIds: self.roleIds });
    }
    logger.info(`Got Group Members: ${formatNumber(members.length)}`);

    logger.info('Getting Group Roles...');
    const roles = await this.call(`VRChat roles of ${groupId}`, () => this.vrc.getGroupRoles(groupId));
    await delay(this.pacing.listingDelay);
    logger.info(`Got Group Roles: ${roles.length}`);

    return {
      id: group.id,
      name: group.name,
      members: members.map(member => ({
        userId: member.userId,
        displayName: member.displayName,
        roleIds: member.roleIds
      })),
      roles
    };
  }

  private async collectWorlds(): Promise<World[]> {
    const worlds: World[] = [];
    for (const worldId of this.config.worldIds) {
      this.checkpoint();
      const world = await this.call(`VRChat world ${worldId}`, () => this.vrc.getWorld(worldId));
      await delay(this.pacing.lookupDelay);
      logger.info(`Got World ${world.name}`);
      worlds.push(world);
    }
    return worlds;
  }
}
