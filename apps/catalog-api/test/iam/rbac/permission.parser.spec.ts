import {
  buildResourceAccessMap,
  isPermissionKey,
  parsePermissionKey
} from '../../../src/iam/rbac/permission.parser';

describe('parsePermissionKey', () => {
  it('parses <resource>:<action>', () => {
    expect(parsePermissionKey('book:edit')).toEqual({ resource: 'book', action: 'edit' });
  });

  it('rejects missing colon', () => {
    expect(parsePermissionKey('book')).toBeNull();
  });

  it('rejects empty resource or action', () => {
    expect(parsePermissionKey(':view')).toBeNull();
    expect(parsePermissionKey('book:')).toBeNull();
  });

  it('rejects extra colons and inner whitespace', () => {
    expect(parsePermissionKey('a:b:c')).toBeNull();
    expect(parsePermissionKey('book: view')).toBeNull();
  });
});

describe('isPermissionKey', () => {
  it('accepts only the exact, untrimmed form', () => {
    expect(isPermissionKey('book:view')).toBe(true);
    expect(isPermissionKey(' book:view')).toBe(false);
    expect(isPermissionKey('*')).toBe(false);
  });
});

describe('buildResourceAccessMap', () => {
  it('maps every known action and always reports view', () => {
    const resources = buildResourceAccessMap({
      allPermissionKeys: ['role:define', 'book:view', 'book:edit', 'role:assign'],
      grantedPermissionKeys: ['book:view', 'role:assign']
    });

    expect(resources).toEqual({
      book: { edit: false, view: true },
      role: { assign: true, define: false, view: false }
    });
    expect(Object.keys(resources)).toEqual(['book', 'role']);
  });

  it('ignores granted keys outside the universe', () => {
    const resources = buildResourceAccessMap({
      allPermissionKeys: ['book:view'],
      grantedPermissionKeys: ['shelf:view']
    });

    expect(resources).toEqual({ book: { view: false } });
  });
});
