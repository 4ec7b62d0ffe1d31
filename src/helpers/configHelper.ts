/**
 * Configuration helper utilities for the role tracker.
 * This module turns command line arguments (with environment fallbacks) into
 * a validated TrackerConfig before any network call is made.
 *
 * @module helpers
 */

import { PacingSettings, TrackerConfig } from "../types";
import { TrackerError } from "./errors";
import { isNonEmptyString, time } from "./generalHelper";
import { logger } from "./cliHelper";

/**
 * Default delays and limits for a run against the live APIs.
 */
export const DEFAULT_PACING: PacingSettings = {
  chatListingDelay: 5 * time.milliseconds.second,
  listingDelay: time.milliseconds.second,
  lookupDelay: time.milliseconds.second,
  retryDelay: 30 * time.milliseconds.second,
  maxAttempts: 5,
  maxMessages: 100000
};

interface OptionDefinition {
  long: string;
  short: string;
  env: string;
  required: boolean;
  description: string;
}

export const OPTIONS = {
  workspace: { long: 'workspace', short: 'w', env: 'TRACKER_WORKSPACE', required: true, description: 'Workspace directory' },
  output: { long: 'output', short: 'o', env: 'TRACKER_OUTPUT', required: true, description: 'Output subdirectory inside the workspace' },
  username: { long: 'username', short: 'u', env: 'VRC_USERNAME', required: true, description: 'VRChat username' },
  password: { long: 'password', short: 'p', env: 'VRC_PASSWORD', required: true, description: 'VRChat password' },
  key: { long: 'key', short: 'k', env: 'VRC_TOTP_KEY', required: true, description: 'VRChat 2FA (TOTP) secret' },
  groups: { long: 'groups', short: 'g', env: 'VRC_GROUP_IDS', required: false, description: 'Comma-delimited VRChat group ids' },
  worlds: { long: 'worlds', short: 'r', env: 'VRC_WORLD_IDS', required: false, description: 'Comma-delimited VRChat world ids' },
  bot: { long: 'bot', short: 'b', env: 'DISCORD_BOT_TOKEN', required: false, description: 'Discord bot token' },
  discords: { long: 'discords', short: 'd', env: 'DISCORD_SERVER_IDS', required: false, description: 'Comma-delimited Discord server ids' },
  channels: { long: 'channels', short: 'c', env: 'DISCORD_CHANNEL_IDS', required: false, description: 'Comma-delimited Discord channel ids, one per server' }
} satisfies Record<string, OptionDefinition>;

export type OptionName = keyof typeof OPTIONS;

export interface ParsedArgs {
  help: boolean;
  values: Partial<Record<OptionName, string>>;
}

const isOptionName = (value: string): value is OptionName => Object.prototype.hasOwnProperty.call(OPTIONS, value);

const OPTION_NAMES: OptionName[] = Object.keys(OPTIONS).filter(isOptionName);

const findOption = (flag: string): OptionName | undefined => {
  if (flag.startsWith('--')) {
    const name = flag.slice(2);
    return isOptionName(name) ? name : undefined;
  }
  const short = flag.slice(1);
  return OPTION_NAMES.find(name => OPTIONS[name].short === short);
};

/**
 * Parses `--name=value`, `--name value`, `-n=value` and `-n value` flags.
 */
export const parseArgs = (argv: readonly string[]): ParsedArgs => {
  const parsed: ParsedArgs = { help: false, values: {} };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
      continue;
    }
    if (!arg.startsWith('-')) {
      throw new TrackerError(`Unexpected argument: ${arg}`, 'configuration');
    }

    const separator = arg.indexOf('=');
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    const option = findOption(flag);
    if (!option) {
      throw new TrackerError(`Unknown option: ${flag}`, 'configuration');
    }

    if (separator !== -1) {
      parsed.values[option] = arg.slice(separator + 1);
    } else {
      const next = argv[i + 1];
      if (next === undefined || next === '--help' || next === '-h' || (next.startsWith('-') && findOption(next.split('=')[0]) !== undefined)) {
        throw new TrackerError(`Option ${flag} requires a value`, 'configuration');
      }
      parsed.values[option] = next;
      i++;
    }
  }

  return parsed;
};

/**
 * Splits a comma-delimited list, trimming entries and dropping empty ones.
 */
export const splitList = (value: string | undefined): string[] =>
  (value ?? '').split(',').map(entry => entry.trim()).filter(entry => entry.length > 0);

const SNOWFLAKE_PATTERN = /^\d+$/;

const parseSnowflakes = (value: string | undefined, option: OptionName): string[] => {
  const ids = splitList(value);
  const invalid = ids.find(id => !SNOWFLAKE_PATTERN.test(id));
  if (invalid !== undefined) {
    throw new TrackerError(`--${OPTIONS[option].long} contains a non-numeric Discord id: ${invalid}`, 'configuration');
  }
  return ids;
};

/**
 * Builds the tracker configuration from parsed arguments, falling back to
 * environment variables for anything not given on the command line.
 *
 * @throws TrackerError of kind "configuration"
 */
export const loadConfig = (args: ParsedArgs, env: NodeJS.ProcessEnv = process.env): TrackerConfig => {
  const value = (name: OptionName): string | undefined => {
    const fromArgs = args.values[name];
    if (fromArgs !== undefined) return fromArgs;
    const fromEnv = env[OPTIONS[name].env];
    return isNonEmptyString(fromEnv) ? fromEnv : undefined;
  };

  const required = (name: OptionName): string => {
    const resolved = value(name);
    if (!isNonEmptyString(resolved)) {
      throw new TrackerError(`Missing required option --${OPTIONS[name].long} (or ${OPTIONS[name].env})`, 'configuration');
    }
    return resolved;
  };

  const config: TrackerConfig = {
    workspace: required('workspace'),
    output: required('output'),
    username: required('username'),
    password: required('password'),
    totpKey: required('key'),
    groupIds: splitList(value('groups')),
    worldIds: splitList(value('worlds'))
  };

  const botToken = value('bot');
  const serverList = value('discords');
  const channelList = value('channels');
  const useDiscord = isNonEmptyString(botToken) && isNonEmptyString(serverList) && isNonEmptyString(channelList);

  if (!useDiscord) {
    if (botToken || serverList || channelList) {
      logger.warning('Discord integration needs --bot, --discords and --channels; skipping it.');
    }
    return config;
  }

  const serverIds = parseSnowflakes(serverList, 'discords');
  const channelIds = parseSnowflakes(channelList, 'channels');
  if (serverIds.length !== channelIds.length) {
    throw new TrackerError(
      `Discord Servers Array and Channels Array must have the same Length! (${serverIds.length} servers, ${channelIds.length} channels)`,
      'configuration'
    );
  }

  config.discord = {
    botToken,
    servers: serverIds.map((serverId, i) => ({ serverId, channelId: channelIds[i] }))
  };
  return config;
};

/**
 * Usage text for --help.
 */
export const usage = (): string => {
  const lines = OPTION_NAMES.map(name => {
    const option = OPTIONS[name];
    const flag = `  -${option.short}, --${option.long}=<value>`.padEnd(32);
    return `${flag}${option.description} [${option.env}]${option.required ? ' (required)' : ''}`;
  });
  return [
    'VRChat / Discord Role Tracker',
    '',
    'Usage:',
    '  npm start -- --workspace=<dir> --output=<subdir> --username=<name> --password=<secret> --key=<totp secret> [options]',
    '',
    'Options:',
    ...lines,
    '  -h, --help                    Show this help message.'
  ].join('\n');
};
