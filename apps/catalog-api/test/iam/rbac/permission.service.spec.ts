import { ConfigurationError } from '../../../src/common/errors/catalog-errors';
import { ANONYMOUS, toUserPrincipal } from '../../../src/iam/principals/principal.types';
import { buildPermissionModel, fakeAudit, PERMISSIONS, PRINCIPALS } from '../../support/fixtures';

function user(id: string) {
  const record = PRINCIPALS.find((p) => p.id === id);
  if (!record) throw new Error(`no fixture principal ${id}`);
  return toUserPrincipal(record, () => true);
}

describe('PermissionService.authorize', () => {
  it('grants exactly the permissions of the held roles', () => {
    const { permissions } = buildPermissionModel();

    expect(permissions.authorize(user('viewer'), 'book:view')).toBe(true);
    expect(permissions.authorize(user('viewer'), 'book:create')).toBe(false);
    expect(permissions.authorize(user('editor'), 'book:edit')).toBe(true);
    expect(permissions.authorize(user('editor'), 'book:delete')).toBe(false);
    expect(permissions.authorize(user('admin'), 'book:delete')).toBe(true);
  });

  it('grants a superuser every permission, known or not', () => {
    const { permissions } = buildPermissionModel();

    for (const permission of PERMISSIONS) {
      expect(permissions.authorize(user('root'), permission)).toBe(true);
    }
    expect(permissions.authorize(user('root'), 'shelf:burn')).toBe(true);
  });

  it('denies unknown tokens to everyone else', () => {
    const { permissions } = buildPermissionModel();

    expect(permissions.authorize(user('admin'), 'book:burn')).toBe(false);
    expect(permissions.authorize(user('admin'), '')).toBe(false);
  });

  it('denies a principal without roles', () => {
    const { permissions } = buildPermissionModel();
    expect(permissions.authorize(user('nobody'), 'book:view')).toBe(false);
  });

  it('gives anonymous principals nothing unless a public role is configured', () => {
    expect(buildPermissionModel().permissions.authorize(ANONYMOUS, 'book:view')).toBe(false);

    const { permissions } = buildPermissionModel({ publicRole: 'Viewers' });
    expect(permissions.hasPublicRole()).toBe(true);
    expect(permissions.authorize(ANONYMOUS, 'book:view')).toBe(true);
    expect(permissions.authorize(ANONYMOUS, 'book:create')).toBe(false);
  });

  it('ignores role names that are not defined', () => {
    const { permissions } = buildPermissionModel();
    const ghost = toUserPrincipal({ id: 'g', email: 'g@example.test', superuser: false, roles: ['Ghosts'] }, () => true);

    expect(permissions.authorize(ghost, 'book:view')).toBe(false);
    expect(permissions.roleNames(ghost)).toEqual([]);
  });
});

describe('PermissionService.defineRole', () => {
  it('creates a role and reports it as new', async () => {
    const { logRbacAction, audit } = fakeAudit();
    const { permissions } = buildPermissionModel({ audit });

    await expect(permissions.defineRole('Reviewers', ['book:view', 'book:edit'], { actorId: 'admin' })).resolves.toBe(
      true
    );

    const reviewer = toUserPrincipal({ id: 'r', email: 'r@example.test', superuser: false, roles: ['Reviewers'] }, () => true);
    expect(permissions.authorize(reviewer, 'book:edit')).toBe(true);
    expect(logRbacAction).toHaveBeenCalledWith({
      actor: 'admin',
      action: 'role.define',
      targetType: 'role',
      targetId: 'Reviewers',
      before: null,
      after: { permissions: ['book:edit', 'book:view'] },
      requestId: undefined
    });
  });

  it('replaces the permission set instead of merging it', async () => {
    const { permissions } = buildPermissionModel();

    await expect(permissions.defineRole('Editors', ['book:view'])).resolves.toBe(false);

    expect(permissions.authorize(user('editor'), 'book:view')).toBe(true);
    expect(permissions.authorize(user('editor'), 'book:edit')).toBe(false);
    expect(permissions.listRoles().find((r) => r.name === 'Editors')).toEqual({
      name: 'Editors',
      permissions: ['book:view']
    });
  });

  it('is idempotent', async () => {
    const { permissions } = buildPermissionModel();

    await permissions.defineRole('Editors', ['book:view', 'book:create']);
    const once = permissions.listRoles();
    await permissions.defineRole('Editors', ['book:view', 'book:create']);

    expect(permissions.listRoles()).toEqual(once);
  });

  it('rejects permissions outside the catalog and leaves the role alone', async () => {
    const { logRbacAction, audit } = fakeAudit();
    const { permissions } = buildPermissionModel({ audit });

    await expect(permissions.defineRole('Editors', ['book:view', 'book:burn'])).rejects.toBeInstanceOf(
      ConfigurationError
    );
    expect(permissions.authorize(user('editor'), 'book:edit')).toBe(true);
    expect(logRbacAction).not.toHaveBeenCalled();
  });

  it('rejects a blank role name', async () => {
    const { permissions } = buildPermissionModel();
    await expect(permissions.defineRole('  ', ['book:view'])).rejects.toThrow('Role name cannot be empty.');
  });

  it('serializes concurrent definitions of the same role', async () => {
    const { logRbacAction, audit } = fakeAudit();
    let releaseFirstWrite: () => void = () => undefined;
    logRbacAction.mockImplementationOnce(
      () =>
        new Promise<void>((resolve) => {
          releaseFirstWrite = resolve;
        })
    );
    const { permissions } = buildPermissionModel({ audit });

    const first = permissions.defineRole('Editors', ['book:view']);
    const second = permissions.defineRole('Editors', ['book:delete']);

    await new Promise((resolve) => setImmediate(resolve));
    expect(logRbacAction).toHaveBeenCalledTimes(1);
    // Readers see the first replacement while the second one waits.
    expect(permissions.authorize(user('editor'), 'book:view')).toBe(true);
    expect(permissions.authorize(user('editor'), 'book:delete')).toBe(false);

    releaseFirstWrite();
    await Promise.all([first, second]);

    expect(logRbacAction).toHaveBeenCalledTimes(2);
    expect(logRbacAction.mock.calls[1][0].before).toEqual({ permissions: ['book:view'] });
    expect(permissions.authorize(user('editor'), 'book:delete')).toBe(true);
    expect(permissions.authorize(user('editor'), 'book:view')).toBe(false);
  });
});

describe('PermissionService.assignRole', () => {
  it('adds a role once and audits the change', async () => {
    const { logRbacAction, audit } = fakeAudit();
    const { permissions, directory } = buildPermissionModel({ audit });

    await expect(permissions.assignRole('viewer', 'Editors', { actorId: 'admin', requestId: 'req-1' })).resolves.toBe(
      true
    );
    await expect(permissions.assignRole('viewer', 'Editors')).resolves.toBe(false);

    expect(directory.find('viewer')?.roles).toEqual(['Editors', 'Viewers']);
    expect(logRbacAction).toHaveBeenCalledTimes(1);
    expect(logRbacAction).toHaveBeenCalledWith({
      actor: 'admin',
      action: 'role.assign',
      targetType: 'principal',
      targetId: 'viewer',
      before: { roles: ['Viewers'] },
      after: { roles: ['Editors', 'Viewers'] },
      requestId: 'req-1'
    });
  });

  it('rejects unknown roles and principals', async () => {
    const { permissions } = buildPermissionModel();

    await expect(permissions.assignRole('viewer', 'Ghosts')).rejects.toBeInstanceOf(ConfigurationError);
    await expect(permissions.assignRole('stranger', 'Viewers')).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('PermissionService.effectivePermissions', () => {
  it('flattens held roles, sorted', () => {
    const { permissions } = buildPermissionModel();

    expect(permissions.effectivePermissions(user('editor'))).toEqual(['book:create', 'book:edit', 'book:view']);
    expect(permissions.effectivePermissions(ANONYMOUS)).toEqual([]);
  });

  it('gives a superuser the whole catalog', () => {
    const { permissions, catalog } = buildPermissionModel();
    expect(permissions.effectivePermissions(user('root'))).toEqual(catalog.list());
  });
});
