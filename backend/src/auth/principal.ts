import type { ValidatedClaims } from './tokenValidator.js';

export interface Principal {
  readonly subject: string;
  readonly username: string;
  /** Empty when the token carries no email claim. */
  readonly email: string;
  readonly roles: ReadonlySet<string>;
  readonly expiresAt: Date;
}

export interface PrincipalOptions {
  /** Dotted path(s) to the roles collection, e.g. `realm_access.roles`; `*` matches any key; `,` or `|` separates alternatives. */
  rolesClaimPath: string;
}

export function parseRolePaths(raw: string): string[] {
  const unique = new Set<string>();
  for (const value of raw.split(/[|,]/)) {
    const trimmed = value.trim();
    if (trimmed) unique.add(trimmed);
  }
  return [...unique];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function collectValues(node: unknown, segments: string[], index = 0): unknown[] {
  if (node === undefined || node === null) {
    return [];
  }

  if (index >= segments.length) {
    return [node];
  }

  if (!isRecord(node)) {
    return [];
  }

  const segment = segments[index];

  if (segment === '*') {
    const values: unknown[] = [];
    for (const value of Object.values(node)) {
      values.push(...collectValues(value, segments, index + 1));
    }
    return values;
  }

  if (!Object.prototype.hasOwnProperty.call(node, segment)) {
    return [];
  }

  return collectValues(node[segment], segments, index + 1);
}

export function resolveRoles(claims: Readonly<Record<string, unknown>>, rolePaths: string[]): Set<string> {
  const roles = new Set<string>();

  for (const path of rolePaths) {
    for (const entry of collectValues(claims, path.split('.'))) {
      if (typeof entry === 'string' && entry.length > 0) {
        roles.add(entry);
      } else if (Array.isArray(entry)) {
        for (const item of entry) {
          if (typeof item === 'string' && item.length > 0) {
            roles.add(item);
          }
        }
      }
    }
  }

  return roles;
}

function stringClaim(claims: Readonly<Record<string, unknown>>, name: string): string | undefined {
  const value = claims[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function extractPrincipal(claims: ValidatedClaims, options: PrincipalOptions): Principal {
  const raw = claims.rawClaims;
  return Object.freeze({
    subject: claims.subject,
    username: stringClaim(raw, 'preferred_username') ?? claims.subject,
    email: stringClaim(raw, 'email') ?? '',
    roles: resolveRoles(raw, parseRolePaths(options.rolesClaimPath)),
    expiresAt: claims.expiresAt,
  });
}
