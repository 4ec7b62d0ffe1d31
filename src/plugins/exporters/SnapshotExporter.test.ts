import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  assembleSnapshot,
  expandSnapshot,
  parseSnapshot,
  serializeSnapshot,
  SNAPSHOT_FILE_NAME,
  SnapshotExporter
} from './SnapshotExporter';
import { aggregateDirectory } from '../../aggregator/DirectoryAggregator';
import { TrackerError } from '../../helpers/errors';
import { TrackedData } from '../../types';

const directory = aggregateDirectory(
  [
    {
      id: 'grp_1',
      name: 'Group One',
      members: [
        { userId: 'usr_1', displayName: 'Zed', roleIds: ['grol_owner'] },
        { userId: 'usr_2', displayName: 'Amy', roleIds: [] }
      ],
      roles: [
        { id: 'grol_owner', name: 'Owner', permissions: ['*'] },
        { id: 'grol_member', name: 'Member', permissions: [] }
      ]
    }
  ],
  [
    {
      id: '123',
      name: 'Guild',
      roles: [{ id: '900', name: 'Linked', permissions: [] }],
      linkedUsers: [{ vrcUserId: 'usr_2', displayName: 'Amy', roleIds: ['900'] }]
    }
  ]
);

const worlds = [{ id: 'wrld_1', name: 'Hub', visits: 10, favorites: 2, occupants: 0 }];

const data: TrackedData = assembleSnapshot(directory, worlds);

const captureError = (fn: () => unknown): TrackerError => {
  try {
    fn();
  } catch (error) {
    if (error instanceof TrackerError) return error;
    throw error;
  }
  throw new Error('expected a TrackerError');
};

describe('assembleSnapshot', () => {
  it('copies the directory and keys worlds by id', () => {
    expect(data).toEqual({
      vrcUserDisplayNames: ['Amy', 'Zed'],
      vrcGroupsById: {
        grp_1: {
          name: 'Group One',
          vrcUsers: [1, 0],
          roles: {
            grol_owner: { name: 'Owner', isAdmin: true, isModerator: true, vrcUsers: [1] },
            grol_member: { name: 'Member', isAdmin: false, isModerator: false, vrcUsers: [] }
          }
        }
      },
      discordServersById: {
        '123': {
          name: 'Guild',
          vrcUsers: [0],
          roles: { '900': { name: 'Linked', isAdmin: false, isModerator: false, vrcUsers: [0] } }
        }
      },
      vrcWorldsById: {
        wrld_1: { name: 'Hub', visits: 10, favorites: 2, occupants: 0 }
      }
    });
  });
});

describe('serializeSnapshot', () => {
  it('omits default-valued properties but keeps index 0 in arrays', () => {
    expect(serializeSnapshot(data)).toBe(
      '{"vrcUserDisplayNames":["Amy","Zed"],' +
      '"vrcGroupsById":{"grp_1":{"name":"Group One","vrcUsers":[1,0],"roles":{' +
      '"grol_owner":{"name":"Owner","isAdmin":true,"isModerator":true,"vrcUsers":[1]},' +
      '"grol_member":{"name":"Member"}}}},' +
      '"discordServersById":{"123":{"name":"Guild","vrcUsers":[0],"roles":{"900":{"name":"Linked","vrcUsers":[0]}}}},' +
      '"vrcWorldsById":{"wrld_1":{"name":"Hub","visits":10,"favorites":2}}}'
    );
  });

  it('always writes the top-level maps', () => {
    const empty = assembleSnapshot(aggregateDirectory([], []));
    expect(serializeSnapshot(empty)).toBe('{"vrcGroupsById":{},"discordServersById":{},"vrcWorldsById":{}}');
  });

  it('indents when asked to', () => {
    const empty = assembleSnapshot(aggregateDirectory([], []));
    expect(serializeSnapshot(empty, true).split('\n')[1]).toBe('  "vrcGroupsById": {},');
  });
});

describe('parseSnapshot', () => {
  it('restores omitted defaults', () => {
    expect(parseSnapshot(serializeSnapshot(data))).toEqual(data);
  });

  it('accepts an empty object', () => {
    expect(parseSnapshot('{}')).toEqual({
      vrcUserDisplayNames: [],
      vrcGroupsById: {},
      discordServersById: {},
      vrcWorldsById: {}
    });
  });

  it('rejects text that is not JSON', () => {
    const error = captureError(() => parseSnapshot('not json'));
    expect(error.kind).toBe('output');
    expect(error.message).toBe('Invalid snapshot: not valid JSON');
  });

  it('names the path of an invalid value', () => {
    expect(captureError(() => parseSnapshot('{"vrcUserDisplayNames":"Amy"}')).message)
      .toBe('Invalid snapshot: $.vrcUserDisplayNames must be an array');
    expect(captureError(() => parseSnapshot('{"vrcGroupsById":{"grp_1":{"vrcUsers":[0,"x"]}}}')).message)
      .toBe('Invalid snapshot: $.vrcGroupsById.grp_1.vrcUsers[1] must be an integer');
    expect(captureError(() => parseSnapshot('{"vrcWorldsById":{"wrld_1":{"visits":1.5}}}')).message)
      .toBe('Invalid snapshot: $.vrcWorldsById.wrld_1.visits must be an integer');
  });
});

describe('expandSnapshot', () => {
  it('resolves indices to display names', () => {
    expect(expandSnapshot(data)).toEqual({
      groups: {
        grp_1: {
          name: 'Group One',
          users: ['Zed', 'Amy'],
          roles: {
            grol_owner: { name: 'Owner', users: ['Zed'] },
            grol_member: { name: 'Member', users: [] }
          }
        }
      },
      servers: {
        '123': { name: 'Guild', users: ['Amy'], roles: { '900': { name: 'Linked', users: ['Amy'] } } }
      }
    });
  });

  it('skips indices outside the user list', () => {
    const broken: TrackedData = {
      vrcUserDisplayNames: ['Amy'],
      vrcGroupsById: { grp_1: { name: 'Group One', vrcUsers: [0, 5, -1], roles: {} } },
      discordServersById: {},
      vrcWorldsById: {}
    };
    expect(expandSnapshot(broken).groups.grp_1.users).toEqual(['Amy']);
  });
});

describe('SnapshotExporter', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'snapshot-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('writes data.json into the output directory', () => {
    const outputPath = path.join(tempDir, 'out');
    const result = new SnapshotExporter({ outputPath }).export(data);

    expect(result.filePath).toBe(path.join(outputPath, SNAPSHOT_FILE_NAME));
    const written = fs.readFileSync(result.filePath, 'utf8');
    expect(written).toBe(serializeSnapshot(data));
    expect(result.bytesWritten).toBe(Buffer.byteLength(written, 'utf8'));
    expect(parseSnapshot(written)).toEqual(data);
  });

  it('replaces an earlier snapshot', () => {
    const exporter = new SnapshotExporter({ outputPath: tempDir });
    exporter.export(data);
    const empty = assembleSnapshot(aggregateDirectory([], []));
    const { filePath } = exporter.export(empty);
    expect(fs.readFileSync(filePath, 'utf8')).toBe(serializeSnapshot(empty));
  });

  it('reports a write failure as an output error', () => {
    const blocker = path.join(tempDir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory');
    const exporter = new SnapshotExporter({ outputPath: path.join(blocker, 'out') });

    const error = captureError(() => exporter.export(data));
    expect(error.kind).toBe('output');
    expect(error.message).toMatch(/^Failed to write snapshot: /);
  });
});
