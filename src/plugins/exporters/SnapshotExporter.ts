/**
 * @fileoverview Snapshot exporter: shapes the aggregated directory into the
 * persisted document, serializes it sparsely and writes `data.json`.
 * Also reads a written snapshot back and resolves its indices to names.
 */

import { Directory } from "../../aggregator/DirectoryAggregator";
import { logger } from "../../helpers/cliHelper";
import { TrackerError } from "../../helpers/errors";
import { writeTextFile } from "../../helpers/fileHelper";
import { isRecord } from "../../helpers/generalHelper";
import {
  TrackedData,
  TrackedDiscordServer,
  TrackedRole,
  TrackedVrcGroup,
  TrackedVrcWorld,
  World
} from "../../types";

export const SNAPSHOT_FILE_NAME = 'data.json';

/**
 * Builds the persisted document from the aggregated directory and world data.
 */
export function assembleSnapshot(directory: Directory, worlds: readonly World[] = []): TrackedData {
  const vrcWorldsById: Record<string, TrackedVrcWorld> = {};
  for (const world of worlds) {
    vrcWorldsById[world.id] = {
      name: world.name,
      visits: world.visits,
      favorites: world.favorites,
      occupants: world.occupants
    };
  }

  return {
    vrcUserDisplayNames: [...directory.users.displayNames],
    vrcGroupsById: directory.groups,
    discordServersById: directory.servers,
    vrcWorldsById
  };
}

const isDefaultValue = (value: unknown): boolean =>
  value === undefined ||
  value === null ||
  value === false ||
  value === 0 ||
  value === '' ||
  (Array.isArray(value) && value.length === 0);

/**
 * JSON with default-valued properties left out. Array elements are always
 * written, so canonical index 0 survives.
 */
export function serializeSnapshot(data: TrackedData, pretty = false): string {
  return JSON.stringify(
    data,
    function (this: unknown, key: string, value: unknown) {
      if (key !== '' && !Array.isArray(this) && isDefaultValue(value)) {
        return undefined;
      }
      return value;
    },
    pretty ? 2 : undefined
  );
}

// ============================================
// READ BACK
// ============================================

const fail = (path: string, expected: string): never => {
  throw new TrackerError(`Invalid snapshot: ${path} must be ${expected}`, 'output');
};

const readString = (value: unknown, path: string): string => {
  if (value === undefined) return '';
  return typeof value === 'string' ? value : fail(path, 'a string');
};

const readBoolean = (value: unknown, path: string): boolean => {
  if (value === undefined) return false;
  return typeof value === 'boolean' ? value : fail(path, 'a boolean');
};

const readCount = (value: unknown, path: string): number => {
  if (value === undefined) return 0;
  return typeof value === 'number' && Number.isInteger(value) ? value : fail(path, 'an integer');
};

const readIndices = (value: unknown, path: string): number[] => {
  if (value === undefined) return [];
  if (!Array.isArray(value)) return fail(path, 'an array');
  return value.map((entry, i) => readCount(entry, `${path}[${i}]`));
};

const readMap = <T>(value: unknown, path: string, readEntry: (entry: unknown, entryPath: string) => T): Record<string, T> => {
  if (value === undefined) return {};
  if (!isRecord(value)) return fail(path, 'an object');
  const result: Record<string, T> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = readEntry(entry, `${path}.${key}`);
  }
  return result;
};

const readObject = (value: unknown, path: string): Record<string, unknown> =>
  isRecord(value) ? value : fail(path, 'an object');

const readRole = (value: unknown, path: string): TrackedRole => {
  const role = readObject(value, path);
  return {
    name: readString(role.name, `${path}.name`),
    isAdmin: readBoolean(role.isAdmin, `${path}.isAdmin`),
    isModerator: readBoolean(role.isModerator, `${path}.isModerator`),
    vrcUsers: readIndices(role.vrcUsers, `${path}.vrcUsers`)
  };
};

const readMembership = (value: unknown, path: string): TrackedVrcGroup & TrackedDiscordServer => {
  const entry = readObject(value, path);
  return {
    name: readString(entry.name, `${path}.name`),
    vrcUsers: readIndices(entry.vrcUsers, `${path}.vrcUsers`),
    roles: readMap(entry.roles, `${path}.roles`, readRole)
  };
};

const readWorld = (value: unknown, path: string): TrackedVrcWorld => {
  const world = readObject(value, path);
  return {
    name: readString(world.name, `${path}.name`),
    visits: readCount(world.visits, `${path}.visits`),
    favorites: readCount(world.favorites, `${path}.favorites`),
    occupants: readCount(world.occupants, `${path}.occupants`)
  };
};

/**
 * Parses and validates a snapshot, restoring the properties that sparse
 * serialization left out.
 */
export function parseSnapshot(json: string): TrackedData {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new TrackerError('Invalid snapshot: not valid JSON', 'output', undefined, { cause: error });
  }

  const root = readObject(raw, '$');
  const names = root.vrcUserDisplayNames;
  if (names !== undefined && !Array.isArray(names)) {
    fail('$.vrcUserDisplayNames', 'an array');
  }

  return {
    vrcUserDisplayNames: (Array.isArray(names) ? names : []).map((name, i) =>
      typeof name === 'string' ? name : fail(`$.vrcUserDisplayNames[${i}]`, 'a string')
    ),
    vrcGroupsById: readMap(root.vrcGroupsById, '$.vrcGroupsById', readMembership),
    discordServersById: readMap(root.discordServersById, '$.discordServersById', readMembership),
    vrcWorldsById: readMap(root.vrcWorldsById, '$.vrcWorldsById', readWorld)
  };
}

export interface ExpandedMembership {
  name: string;
  users: string[];
  roles: Record<string, { name: string; users: string[] }>;
}

export interface ExpandedSnapshot {
  groups: Record<string, ExpandedMembership>;
  servers: Record<string, ExpandedMembership>;
}

/**
 * Replaces canonical indices with display names.
 */
export function expandSnapshot(data: TrackedData): ExpandedSnapshot {
  const names = data.vrcUserDisplayNames;
  const resolve = (indices: readonly number[]): string[] =>
    indices.flatMap(index => (index >= 0 && index < names.length ? [names[index]] : []));

  const expand = (entries: Record<string, TrackedVrcGroup | TrackedDiscordServer>): Record<string, ExpandedMembership> => {
    const expanded: Record<string, ExpandedMembership> = {};
    for (const [id, entry] of Object.entries(entries)) {
      const roles: ExpandedMembership['roles'] = {};
      for (const [roleId, role] of Object.entries(entry.roles)) {
        roles[roleId] = { name: role.name, users: resolve(role.vrcUsers) };
      }
      expanded[id] = { name: entry.name, users: resolve(entry.vrcUsers), roles };
    }
    return expanded;
  };

  return { groups: expand(data.vrcGroupsById), servers: expand(data.discordServersById) };
}

// ============================================
// EXPORTER
// ============================================

export interface SnapshotExporterConfig {
  outputPath: string;
  fileName?: string;
  pretty?: boolean;
}

export interface SnapshotExportResult {
  filePath: string;
  bytesWritten: number;
}

/**
 * Writes one snapshot per run. Any failure is fatal for the run.
 */
export class SnapshotExporter {
  public readonly name = 'SnapshotExporter';

  private outputPath: string;
  private fileName: string;
  private pretty: boolean;

  constructor(config: SnapshotExporterConfig) {
    this.outputPath = config.outputPath;
    this.fileName = config.fileName ?? SNAPSHOT_FILE_NAME;
    this.pretty = config.pretty ?? false;
  }

  public export(data: TrackedData): SnapshotExportResult {
    let json: string;
    let filePath: string;
    try {
      json = serializeSnapshot(data, this.pretty);
      filePath = writeTextFile(this.outputPath, this.fileName, json);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TrackerError(`Failed to write snapshot: ${message}`, 'output', undefined, { cause: error });
    }

    logger.debug(json);
    logger.success(`[${this.name}] Wrote ${data.vrcUserDisplayNames.length} users to ${filePath}`);
    return { filePath, bytesWritten: Buffer.byteLength(json, 'utf8') };
  }
}
