// Import principal variant
import type { Principal } from './principal.types';

/**
 * PrincipalLookup - Resolves a bearer token to a principal
 *
 * A missing or unverifiable token resolves to the anonymous principal.
 * Rejects only when the identity backend itself fails.
 */
export abstract class PrincipalLookup {
  abstract resolve(token: string | null): Promise<Principal>;
}
