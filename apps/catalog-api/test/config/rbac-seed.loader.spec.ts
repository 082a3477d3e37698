import { join } from 'node:path';
import { ConfigurationError } from '../../src/common/errors/catalog-errors';
import { loadRbacSeed, parseRbacSeed } from '../../src/config/rbac-seed.loader';

const seed = (overrides: Record<string, unknown> = {}) => ({
  permissions: ['book:view', 'book:edit'],
  roles: { Viewers: ['book:view'], Editors: ['book:edit', 'book:view', 'book:view'] },
  principals: [{ id: 'editor', email: 'editor@example.test', roles: ['Editors'] }],
  ...overrides
});

describe('parseRbacSeed', () => {
  it('returns roles with sorted unique permissions and principal defaults', () => {
    const parsed = parseRbacSeed(seed(), 'Viewers');

    expect(parsed.permissions).toEqual(['book:view', 'book:edit']);
    expect(parsed.roles).toEqual([
      { name: 'Viewers', permissions: ['book:view'] },
      { name: 'Editors', permissions: ['book:edit', 'book:view'] }
    ]);
    expect(parsed.principals).toEqual([
      { id: 'editor', email: 'editor@example.test', superuser: false, roles: ['Editors'] }
    ]);
  });

  it('rejects malformed permission keys', () => {
    expect(() => parseRbacSeed(seed({ permissions: ['book:view', 'book view'] }))).toThrow(
      'Invalid RBAC seed. Missing/invalid: permissions.1.'
    );
  });

  it('collects every cross-reference problem', () => {
    const attempt = () =>
      parseRbacSeed(
        seed({
          roles: { Editors: ['book:edit', 'book:burn'] },
          principals: [
            { id: 'editor', email: 'editor@example.test', roles: ['Editors', 'Ghosts'] },
            { id: 'editor', email: 'again@example.test' }
          ]
        }),
        'Viewers'
      );

    expect(attempt).toThrow(ConfigurationError);
    expect(attempt).toThrow(
      'Invalid RBAC seed: role "Editors" references unknown permissions book:burn; ' +
        'principal "editor" references unknown roles Ghosts; ' +
        'principal "editor" is listed twice; ' +
        'public role "Viewers" is not defined.'
    );
  });
});

describe('loadRbacSeed', () => {
  it('loads the shipped seed file', () => {
    const loaded = loadRbacSeed(join(__dirname, '../../config/rbac.seed.json'));

    expect(loaded.roles.map((role) => role.name)).toEqual(['Viewers', 'Editors', 'Admins', 'RoleManagers']);
    expect(loaded.principals.find((p) => p.id === 'root')?.superuser).toBe(true);
  });

  it('reports an unreadable file as a configuration error', () => {
    expect(() => loadRbacSeed(join(__dirname, 'no-such-seed.json'))).toThrow(ConfigurationError);
  });
});
