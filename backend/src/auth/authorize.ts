import type { Principal } from './principal.js';

export interface RouteRequirement {
  /** Empty means any authenticated principal. */
  readonly requiredRoles: ReadonlySet<string>;
}

export type AuthorizationDecision =
  | { allowed: true }
  | { allowed: false; reason: 'InsufficientRole'; requiredRoles: string[] };

export const anyAuthenticated: RouteRequirement = Object.freeze({ requiredRoles: new Set<string>() });

export function requireAnyRole(...roles: string[]): RouteRequirement {
  return Object.freeze({ requiredRoles: new Set(roles) });
}

/**
 * Grants access when the requirement is empty or the principal holds at least one
 * of the required roles. Works on the already-extracted principal only.
 */
export function authorize(principal: Principal, requirement: RouteRequirement): AuthorizationDecision {
  if (requirement.requiredRoles.size === 0) {
    return { allowed: true };
  }

  for (const role of requirement.requiredRoles) {
    if (principal.roles.has(role)) {
      return { allowed: true };
    }
  }

  return { allowed: false, reason: 'InsufficientRole', requiredRoles: [...requirement.requiredRoles] };
}
