/**
 * Caller without a verified identity
 */
export interface AnonymousPrincipal {
  readonly kind: 'anonymous';
}

/**
 * Caller whose identity was verified and found in the principal directory
 */
export interface UserPrincipal {
  readonly kind: 'user';
  readonly id: string;
  readonly email: string;
  /** Known role names held by the principal */
  readonly roles: ReadonlySet<string>;
  /** Holds every permission, including ones outside the catalog */
  readonly isSuperuser: boolean;
}

/**
 * Principal - The identity an operation is evaluated for
 */
export type Principal = AnonymousPrincipal | UserPrincipal;

/** Shared anonymous principal */
export const ANONYMOUS: AnonymousPrincipal = Object.freeze({ kind: 'anonymous' });

/**
 * PrincipalRecord - Stored form of a principal in the directory
 */
export interface PrincipalRecord {
  readonly id: string;
  readonly email: string;
  readonly superuser: boolean;
  readonly roles: readonly string[];
}

/**
 * Build a principal from its directory record
 * Role names are checked against the known roles once, here; unknown names are dropped
 * @param record - Directory record
 * @param isKnownRole - Predicate over role names
 */
export function toUserPrincipal(record: PrincipalRecord, isKnownRole: (name: string) => boolean): UserPrincipal {
  return Object.freeze({
    kind: 'user',
    id: record.id,
    email: record.email,
    roles: new Set(record.roles.filter(isKnownRole)),
    isSuperuser: record.superuser
  });
}
