/**
 * @fileoverview Discord side of the tracker: reads server roles, members and
 * the identity-link channel history through a discord.js bot client.
 */

import { ChannelType, Client, Events, GatewayIntentBits, Guild, GuildBasedChannel, Message } from 'discord.js';
import { ChatMember, ChatPlatformClient } from './PlatformClient';
import { ChatMessage, RoleDefinition } from '../../types';
import { logger, createProgressBar, formatNumber } from '../../helpers/cliHelper';
import { TrackerError, toUpstreamError } from '../../helpers/errors';

/** Maximum page size of the Discord message listing endpoint */
const MESSAGE_PAGE_SIZE = 100;

export interface DiscordRoleSourceConfig {
  botToken: string;
}

const compareSnowflakes = (a: string, b: string): number => {
  const left = BigInt(a);
  const right = BigInt(b);
  return left < right ? -1 : left > right ? 1 : 0;
};

/**
 * Oldest first; equal timestamps ordered by snowflake.
 */
const compareMessages = (a: ChatMessage, b: ChatMessage): number =>
  a.timestamp !== b.timestamp ? a.timestamp - b.timestamp : compareSnowflakes(a.id, b.id);

const toChatMessage = (message: Message): ChatMessage => ({
  id: message.id,
  authorId: message.author.id,
  timestamp: message.createdTimestamp,
  content: message.content
});

/**
 * DiscordRoleSource implements ChatPlatformClient on top of a discord.js bot.
 * @implements {ChatPlatformClient}
 */
export class DiscordRoleSource implements ChatPlatformClient {
  public readonly name = 'DiscordRoleSource';
  /** Discord.js client instance */
  private client: Client;
  /** Discord bot token for authentication */
  private botToken: string;
  /** Guilds already fetched during this run */
  private guilds = new Map<string, Guild>();

  constructor(config: DiscordRoleSourceConfig) {
    this.botToken = config.botToken;
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMembers,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent
      ]
    });

    this.client.on('error', (error) => {
      if (error.message.includes('disallowed intents')) {
        logger.error('Bot requires the "Server Members" and "Message Content" privileged intents. Enable them in the Discord Developer Portal.');
      } else {
        logger.error(`Discord client error: ${error.message}`);
      }
    });
  }

  public async connect(): Promise<void> {
    if (this.client.isReady()) {
      return;
    }

    logger.info('Logging in to Discord Bot...');
    const ready = new Promise<void>(resolve => {
      this.client.once(Events.ClientReady, () => resolve());
    });

    try {
      await this.client.login(this.botToken);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TrackerError(`Discord login failed: ${message}`, 'authentication', undefined, { cause: error });
    }

    await ready;
    logger.success(`Logged in to Discord Bot as ${this.client.user?.tag ?? 'unknown'}`);
  }

  private async getGuild(serverId: string): Promise<Guild> {
    const cached = this.guilds.get(serverId);
    if (cached) {
      return cached;
    }

    try {
      const guild = await this.client.guilds.fetch(serverId);
      this.guilds.set(serverId, guild);
      return guild;
    } catch (error) {
      throw toUpstreamError(error, `Failed to fetch Discord server ${serverId}`);
    }
  }

  public async getServerName(serverId: string): Promise<string> {
    const guild = await this.getGuild(serverId);
    return guild.name;
  }

  public async listRoles(serverId: string): Promise<RoleDefinition[]> {
    const guild = await this.getGuild(serverId);
    try {
      const roles = await guild.roles.fetch();
      return roles.map(role => ({
        id: role.id,
        name: role.name,
        permissions: role.permissions.toArray()
      }));
    } catch (error) {
      throw toUpstreamError(error, `Failed to list roles of Discord server ${serverId}`);
    }
  }

  public async listMembers(serverId: string): Promise<ChatMember[]> {
    const guild = await this.getGuild(serverId);
    try {
      const members = await guild.members.fetch();
      // The @everyone role shares the guild id and is held implicitly by everyone
      return members.map(member => ({
        id: member.id,
        roleIds: member.roles.cache.filter(role => role.id !== guild.id).map(role => role.id)
      }));
    } catch (error) {
      throw toUpstreamError(error, `Failed to list members of Discord server ${serverId}`);
    }
  }

  public async listChannelMessages(serverId: string, channelId: string, limit: number): Promise<ChatMessage[]> {
    const guild = await this.getGuild(serverId);

    let channel: GuildBasedChannel | null;
    try {
      channel = await guild.channels.fetch(channelId);
    } catch (error) {
      throw toUpstreamError(error, `Failed to fetch Discord channel ${channelId}`);
    }

    if (!channel || (channel.type !== ChannelType.GuildText && channel.type !== ChannelType.GuildAnnouncement)) {
      throw new TrackerError(`Channel ${channelId} is not a text channel of server ${serverId}`, 'upstream');
    }

    logger.channel(`Reading messages from #${channel.name} (${channelId})`);
    const collected: ChatMessage[] = [];
    let before: string | undefined;

    while (collected.length < limit) {
      const pageSize = Math.min(MESSAGE_PAGE_SIZE, limit - collected.length);
      const batch = await channel.messages.fetch({ limit: pageSize, before });
      if (batch.size === 0) {
        break;
      }

      for (const message of batch.values()) {
        collected.push(toChatMessage(message));
      }
      before = Array.from(batch.keys()).sort(compareSnowflakes)[0];
      logger.progress(`#${channel.name}: ${formatNumber(collected.length)} messages ${createProgressBar(collected.length, limit)}`);

      if (batch.size < pageSize) {
        break;
      }
    }

    logger.clearLine();
    return collected.sort(compareMessages);
  }

  public async disconnect(): Promise<void> {
    this.guilds.clear();
    await this.client.destroy();
  }
}
