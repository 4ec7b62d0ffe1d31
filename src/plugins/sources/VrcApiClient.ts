/**
 * @fileoverview VRChat web API client: cookie-based session with TOTP
 * two-factor verification, group, user and world lookups.
 */

import fetch, { RequestInit, Response } from "node-fetch";
import { authenticator } from "otplib";
import {
  VrcCurrentUser,
  VrcGroupInfo,
  VrcGroupMember,
  VrcGroupMembership,
  VrcGroupRole,
  VrcPlatformClient,
  VrcUser,
  VrcWorld
} from "./PlatformClient";
import { logger } from "../../helpers/cliHelper";
import { TrackerError, TrackerErrorKind } from "../../helpers/errors";
import { delay, isRecord, time } from "../../helpers/generalHelper";
import { isVrcUserId } from "../../helpers/identityHelper";

export const VRC_API_BASE_URL = 'https://api.vrchat.cloud/api/1';
export const DEFAULT_USER_AGENT = 'vrc-role-tracker/1.0.0';
/** A TOTP code with less time left than this is not used */
const MIN_TOTP_SECONDS_LEFT = 5;

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * TOTP provider, otplib's authenticator by default
 */
export interface TotpProvider {
  generate(secret: string): string;
  timeRemaining(): number;
}

export interface VrcApiClientConfig {
  username: string;
  password: string;
  /** Base32 TOTP secret; spaces are ignored */
  totpKey: string;
  userAgent?: string;
  baseUrl?: string;
  fetchFn?: FetchFn;
  totp?: TotpProvider;
}

interface RequestOptions {
  method?: 'GET' | 'POST';
  body?: unknown;
  basicAuth?: boolean;
  errorKind?: TrackerErrorKind;
}

// ============================================
// RESPONSE READERS
// ============================================

const invalid = (context: string, field: string): never => {
  throw new TrackerError(`Unexpected VRChat response for ${context}: missing or invalid "${field}"`, 'upstream');
};

const expectRecord = (value: unknown, context: string): Record<string, unknown> =>
  isRecord(value) ? value : invalid(context, '<root>');

const readString = (obj: Record<string, unknown>, field: string, context: string): string => {
  const value = obj[field];
  return typeof value === 'string' ? value : invalid(context, field);
};

const readNumber = (obj: Record<string, unknown>, field: string, context: string): number => {
  const value = obj[field];
  if (value === undefined || value === null) return 0;
  return typeof value === 'number' ? value : invalid(context, field);
};

const readStringArray = (obj: Record<string, unknown>, field: string, context: string): string[] => {
  const value = obj[field];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === 'string')) {
    return invalid(context, field);
  }
  return value;
};

const readArray = (value: unknown, context: string): unknown[] =>
  Array.isArray(value) ? value : invalid(context, '<root>');

const readMembership = (value: unknown, context: string): VrcGroupMembership | null => {
  if (value === undefined || value === null) return null;
  const member = expectRecord(value, context);
  return {
    id: readString(member, 'id', context),
    groupId: readString(member, 'groupId', context),
    userId: readString(member, 'userId', context),
    roleIds: readStringArray(member, 'roleIds', context)
  };
};

/**
 * Pulls a human readable message out of a VRChat error body.
 */
export const describeErrorBody = (body: string): string => {
  try {
    const parsed: unknown = JSON.parse(body);
    if (isRecord(parsed) && isRecord(parsed.error) && typeof parsed.error.message === 'string') {
      return parsed.error.message;
    }
  } catch {
    // not JSON; fall through to the raw text
  }
  return body.slice(0, 200);
};

/**
 * VrcApiClient implements VrcPlatformClient over the VRChat REST API.
 * @implements {VrcPlatformClient}
 */
export class VrcApiClient implements VrcPlatformClient {
  public readonly name = 'VrcApiClient';

  private username: string;
  private password: string;
  private totpKey: string;
  private userAgent: string;
  private baseUrl: string;
  private fetchFn: FetchFn;
  private totp: TotpProvider;
  /** Session cookies by name */
  private cookies = new Map<string, string>();

  constructor(config: VrcApiClientConfig) {
    this.username = config.username;
    this.password = config.password;
    this.totpKey = config.totpKey.replace(/\s+/g, '').toUpperCase();
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    this.baseUrl = config.baseUrl ?? VRC_API_BASE_URL;
    this.fetchFn = config.fetchFn ?? ((url, init) => fetch(url, init));
    this.totp = config.totp ?? authenticator;
  }

  private storeCookies(response: Response): void {
    // raw() keeps header names in the case they were created with
    const setCookies = Object.entries(response.headers.raw())
      .filter(([name]) => name.toLowerCase() === 'set-cookie')
      .flatMap(([, values]) => values);
    for (const header of setCookies) {
      const pair = header.split(';')[0];
      const separator = pair.indexOf('=');
      if (separator > 0) {
        this.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
      }
    }
  }

  private cookieHeader(): string | undefined {
    if (this.cookies.size === 0) return undefined;
    return Array.from(this.cookies.entries()).map(([name, value]) => `${name}=${value}`).join('; ');
  }

  private async request(path: string, { method = 'GET', body, basicAuth = false, errorKind = 'upstream' }: RequestOptions = {}): Promise<unknown> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      'Accept': 'application/json'
    };
    const cookie = this.cookieHeader();
    if (cookie) {
      headers['Cookie'] = cookie;
    }
    if (basicAuth) {
      const credentials = `${encodeURIComponent(this.username)}:${encodeURIComponent(this.password)}`;
      headers['Authorization'] = `Basic ${Buffer.from(credentials).toString('base64')}`;
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body)
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TrackerError(`VRChat API ${method} ${path} failed: ${message}`, errorKind, undefined, { cause: error });
    }

    this.storeCookies(response);

    if (!response.ok) {
      const text = await response.text();
      throw new TrackerError(
        `VRChat API ${method} ${path} failed with status ${response.status}: ${describeErrorBody(text)}`,
        errorKind,
        response.status
      );
    }

    return response.json();
  }

  private async getCurrentUser(basicAuth: boolean): Promise<VrcCurrentUser | null> {
    const user = expectRecord(
      await this.request('/auth/user', { basicAuth, errorKind: 'authentication' }),
      'current user'
    );
    if (Array.isArray(user.requiresTwoFactorAuth)) {
      return null;
    }
    return {
      id: readString(user, 'id', 'current user'),
      displayName: readString(user, 'displayName', 'current user')
    };
  }

  private async generateTotpCode(): Promise<string> {
    const remaining = this.totp.timeRemaining();
    if (remaining < MIN_TOTP_SECONDS_LEFT) {
      logger.info('Waiting for new token...');
      await delay((remaining + 1) * time.milliseconds.second);
    }
    return this.totp.generate(this.totpKey);
  }

  public async login(): Promise<VrcCurrentUser> {
    logger.info('Logging in to VRChat...');
    let currentUser = await this.getCurrentUser(true);

    if (!currentUser) {
      logger.info('2FA needed...');
      const code = await this.generateTotpCode();
      logger.info('Using 2FA code...');
      const verification = expectRecord(
        await this.request('/auth/twofactorauth/totp/verify', {
          method: 'POST',
          body: { code },
          errorKind: 'authentication'
        }),
        '2FA verification'
      );
      if (verification.verified !== true) {
        throw new TrackerError('Failed to validate 2FA!', 'authentication');
      }

      currentUser = await this.getCurrentUser(false);
      if (!currentUser) {
        throw new TrackerError('Failed to validate 2FA!', 'authentication');
      }
    }

    logger.success(`Logged in as ${currentUser.displayName}`);
    return currentUser;
  }

  public async getGroup(groupId: string): Promise<VrcGroupInfo> {
    const context = `group ${groupId}`;
    const group = expectRecord(await this.request(`/groups/${encodeURIComponent(groupId)}`), context);
    return {
      id: readString(group, 'id', context),
      name: readString(group, 'name', context),
      memberCount: readNumber(group, 'memberCount', context),
      myMember: readMembership(group.myMember, `${context} myMember`)
    };
  }

  public async getGroupMembers(groupId: string, n: number, offset: number): Promise<VrcGroupMember[]> {
    const context = `members of group ${groupId}`;
    const query = new URLSearchParams({ n: String(n), offset: String(offset) });
    const members = readArray(await this.request(`/groups/${encodeURIComponent(groupId)}/members?${query}`), context);
    return members.map(entry => {
      const member = expectRecord(entry, context);
      const user = expectRecord(member.user, context);
      return {
        userId: readString(member, 'userId', context),
        displayName: readString(user, 'displayName', context),
        roleIds: readStringArray(member, 'roleIds', context)
      };
    });
  }

  public async getGroupRoles(groupId: string): Promise<VrcGroupRole[]> {
    const context = `roles of group ${groupId}`;
    const roles = readArray(await this.request(`/groups/${encodeURIComponent(groupId)}/roles`), context);
    return roles.map(entry => {
      const role = expectRecord(entry, context);
      return {
        id: readString(role, 'id', context),
        name: readString(role, 'name', context),
        permissions: readStringArray(role, 'permissions', context)
      };
    });
  }

  public async getUser(userId: string): Promise<VrcUser> {
    if (!isVrcUserId(userId)) {
      throw new TrackerError(`Not a VRChat user id: ${userId}`, 'upstream');
    }
    const context = `user ${userId}`;
    const user = expectRecord(await this.request(`/users/${userId}`), context);
    return {
      id: readString(user, 'id', context),
      displayName: readString(user, 'displayName', context)
    };
  }

  public async getWorld(worldId: string): Promise<VrcWorld> {
    const context = `world ${worldId}`;
    const world = expectRecord(await this.request(`/worlds/${encodeURIComponent(worldId)}`), context);
    return {
      id: readString(world, 'id', context),
      name: readString(world, 'name', context),
      visits: readNumber(world, 'visits', context),
      favorites: readNumber(world, 'favorites', context),
      occupants: readNumber(world, 'occupants', context)
    };
  }
}
