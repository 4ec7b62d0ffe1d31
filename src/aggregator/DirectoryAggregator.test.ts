import {
  aggregateDirectory,
  CanonicalUserList,
  classifyRole,
  compareDisplayNames,
  compareOrdinal,
  DISCORD_PERMISSION_MARKERS,
  VRC_PERMISSION_MARKERS
} from './DirectoryAggregator';
import { ChatServer, Group } from '../types';

const groups: Group[] = [
  {
    id: 'grp_1',
    name: 'Group One',
    members: [
      { userId: 'usr_1', displayName: 'Zed', roleIds: ['grol_owner'] },
      { userId: 'usr_2', displayName: 'Amy', roleIds: ['grol_mod'] },
      { userId: 'usr_3', displayName: 'bob', roleIds: [] }
    ],
    roles: [
      { id: 'grol_owner', name: 'Owner', permissions: ['*'] },
      { id: 'grol_mod', name: 'Moderator', permissions: ['group-instance-moderate', 'group-bans-manage'] },
      { id: 'grol_member', name: 'Member', permissions: [] }
    ]
  },
  {
    id: 'grp_2',
    name: 'Group Two',
    members: [
      { userId: 'usr_1', displayName: 'Zed', roleIds: ['grol_staff'] },
      { userId: 'usr_4', displayName: 'Cy', roleIds: [] }
    ],
    roles: [
      { id: 'grol_staff', name: 'Staff', permissions: ['group-announcement-manage'] }
    ]
  }
];

const servers: ChatServer[] = [
  {
    id: '123',
    name: 'Guild',
    roles: [
      { id: '900', name: 'Admins', permissions: ['Administrator'] },
      { id: '901', name: 'Mods', permissions: ['ModerateMembers', 'KickMembers'] }
    ],
    linkedUsers: [
      { vrcUserId: 'usr_2', displayName: 'Amy', roleIds: ['900'] },
      { vrcUserId: 'usr_5', displayName: 'Dee', roleIds: ['900', '901'] }
    ]
  }
];

describe('compareDisplayNames', () => {
  it('orders names alphabetically with lower case first', () => {
    expect(['bob', 'Alice', 'Zed', 'alice', 'Émile'].sort(compareDisplayNames))
      .toEqual(['alice', 'Alice', 'bob', 'Émile', 'Zed']);
  });

  it('differs from plain code unit order', () => {
    expect(['bob', 'Zed'].sort(compareOrdinal)).toEqual(['Zed', 'bob']);
    expect(['bob', 'Zed'].sort(compareDisplayNames)).toEqual(['bob', 'Zed']);
  });
});

describe('CanonicalUserList', () => {
  const users = new CanonicalUserList(['Zed', 'Amy', 'Zed', 'bob']);

  it('sorts and deduplicates names', () => {
    expect(users.displayNames).toEqual(['Amy', 'bob', 'Zed']);
    expect(users.size).toBe(3);
  });

  it('keeps case variants of a name next to each other', () => {
    const mixed = new CanonicalUserList(['bob', 'Alice', 'Zed', 'alice', 'Émile']);
    expect(mixed.displayNames).toEqual(['alice', 'Alice', 'bob', 'Émile', 'Zed']);
    expect(mixed.indexOf('Alice')).toBe(1);
  });

  it('returns -1 for unknown names', () => {
    expect(users.indexOf('Zed')).toBe(2);
    expect(users.indexOf('Nobody')).toBe(-1);
  });

  it('skips unknown names and repeated indices', () => {
    expect(users.indicesOf(['bob', 'Nobody', 'Amy', 'bob'])).toEqual([1, 0]);
  });
});

describe('classifyRole', () => {
  it('flags VRChat roles by permission marker', () => {
    expect(classifyRole({ id: 'a', name: 'Owner', permissions: ['*'] }, VRC_PERMISSION_MARKERS))
      .toEqual({ isAdmin: true, isModerator: true });
    expect(classifyRole({ id: 'b', name: 'Mod', permissions: ['group-instance-moderate'] }, VRC_PERMISSION_MARKERS))
      .toEqual({ isAdmin: false, isModerator: true });
    expect(classifyRole({ id: 'c', name: 'Member', permissions: ['group-bans-manage'] }, VRC_PERMISSION_MARKERS))
      .toEqual({ isAdmin: false, isModerator: false });
  });

  it('flags Discord roles by permission name', () => {
    expect(classifyRole({ id: '1', name: 'Admins', permissions: ['Administrator'] }, DISCORD_PERMISSION_MARKERS))
      .toEqual({ isAdmin: true, isModerator: true });
    expect(classifyRole({ id: '2', name: 'Mods', permissions: ['ModerateMembers'] }, DISCORD_PERMISSION_MARKERS))
      .toEqual({ isAdmin: false, isModerator: true });
    expect(classifyRole({ id: '3', name: 'Stars', permissions: ['*'] }, DISCORD_PERMISSION_MARKERS))
      .toEqual({ isAdmin: false, isModerator: false });
  });
});

describe('aggregateDirectory', () => {
  const directory = aggregateDirectory(groups, servers);

  it('builds one sorted user list across groups and servers', () => {
    expect(directory.users.displayNames).toEqual(['Amy', 'bob', 'Cy', 'Dee', 'Zed']);
  });

  it('projects group members and roles onto canonical indices', () => {
    expect(directory.groups).toEqual({
      grp_1: {
        name: 'Group One',
        vrcUsers: [4, 0, 1],
        roles: {
          grol_owner: { name: 'Owner', isAdmin: true, isModerator: true, vrcUsers: [4] },
          grol_mod: { name: 'Moderator', isAdmin: false, isModerator: true, vrcUsers: [0] },
          grol_member: { name: 'Member', isAdmin: false, isModerator: false, vrcUsers: [] }
        }
      },
      grp_2: {
        name: 'Group Two',
        vrcUsers: [4, 2],
        roles: {
          grol_staff: { name: 'Staff', isAdmin: false, isModerator: false, vrcUsers: [4] }
        }
      }
    });
  });

  it('projects linked server users and roles onto the same indices', () => {
    expect(directory.servers).toEqual({
      '123': {
        name: 'Guild',
        vrcUsers: [0, 3],
        roles: {
          '900': { name: 'Admins', isAdmin: true, isModerator: true, vrcUsers: [0, 3] },
          '901': { name: 'Mods', isAdmin: false, isModerator: true, vrcUsers: [3] }
        }
      }
    });
  });

  it('never emits an index outside the user list', () => {
    const all = [
      ...Object.values(directory.groups).flatMap(group => [group.vrcUsers, ...Object.values(group.roles).map(role => role.vrcUsers)]),
      ...Object.values(directory.servers).flatMap(server => [server.vrcUsers, ...Object.values(server.roles).map(role => role.vrcUsers)])
    ].flat();
    expect(all.every(index => index >= 0 && index < directory.users.size)).toBe(true);
  });

  it('is deterministic for the same inputs', () => {
    const again = aggregateDirectory(groups, servers);
    expect(again.users.displayNames).toEqual(directory.users.displayNames);
    expect(again.groups).toEqual(directory.groups);
    expect(again.servers).toEqual(directory.servers);
  });

  it('handles no groups and no servers', () => {
    const empty = aggregateDirectory([], []);
    expect(empty.users.size).toBe(0);
    expect(empty.groups).toEqual({});
    expect(empty.servers).toEqual({});
  });
});
