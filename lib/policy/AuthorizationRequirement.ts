import { AuthorizationConfigurationError } from '../errors';
import type { AuthorizationHandlerContext } from './AuthorizationHandlerContext';

/**
 * Caller-supplied check. Returning true satisfies the requirement; calling
 * `context.fail()` fails the whole evaluation.
 */
export type AssertionHandler = (context: AuthorizationHandlerContext) => boolean | Promise<boolean>;

export interface AuthenticatedUserRequirement {
  readonly kind: 'authenticatedUser';
}

export interface ClaimRequirement {
  readonly kind: 'claim';
  readonly claimType: string;
  /** Empty means any value of `claimType` will do. */
  readonly allowedValues: readonly string[];
}

export interface RoleRequirement {
  readonly kind: 'role';
  readonly roles: readonly string[];
}

export interface UserNameRequirement {
  readonly kind: 'userName';
  readonly userName: string;
}

export interface AssertionRequirement {
  readonly kind: 'assertion';
  readonly handler: AssertionHandler;
}

export type AuthorizationRequirement =
  | AuthenticatedUserRequirement
  | ClaimRequirement
  | RoleRequirement
  | UserNameRequirement
  | AssertionRequirement;

const AUTHENTICATED_USER: AuthenticatedUserRequirement = Object.freeze({ kind: 'authenticatedUser' });

export function authenticatedUser(): AuthenticatedUserRequirement {
  return AUTHENTICATED_USER;
}

export function claim(claimType: string, allowedValues: readonly string[] = []): ClaimRequirement {
  if (!claimType) {
    throw new AuthorizationConfigurationError('A claim requirement needs a claim type.');
  }
  return Object.freeze({ kind: 'claim', claimType, allowedValues: Object.freeze([...allowedValues]) });
}

export function role(roles: readonly string[]): RoleRequirement {
  if (roles.length === 0) {
    throw new AuthorizationConfigurationError('A role requirement needs at least one role.');
  }
  return Object.freeze({ kind: 'role', roles: Object.freeze([...roles]) });
}

export function userName(name: string): UserNameRequirement {
  if (!name) {
    throw new AuthorizationConfigurationError('A user name requirement needs a user name.');
  }
  return Object.freeze({ kind: 'userName', userName: name });
}

export function assertion(handler: AssertionHandler): AssertionRequirement {
  return Object.freeze({ kind: 'assertion', handler });
}

export function describeRequirement(requirement: AuthorizationRequirement): string {
  switch (requirement.kind) {
    case 'authenticatedUser':
      return 'authenticated user';
    case 'claim':
      return requirement.allowedValues.length > 0
        ? `claim ${requirement.claimType} in [${requirement.allowedValues.join(', ')}]`
        : `claim ${requirement.claimType}`;
    case 'role':
      return `role in [${requirement.roles.join(', ')}]`;
    case 'userName':
      return `user name ${requirement.userName}`;
    case 'assertion':
      return 'assertion';
  }
}
