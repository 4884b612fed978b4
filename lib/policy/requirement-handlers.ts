import { sameClaimType } from '../claims';
import { AuthorizationHandlerContext } from './AuthorizationHandlerContext';
import { AuthorizationRequirement } from './AuthorizationRequirement';

/**
 * Evaluate one requirement against the context and mark it succeeded when
 * met. An unmet requirement is simply left pending.
 */
export async function handleRequirement(
  requirement: AuthorizationRequirement,
  context: AuthorizationHandlerContext,
): Promise<void> {
  if (await isSatisfied(requirement, context)) {
    context.succeed(requirement);
  }
}

async function isSatisfied(
  requirement: AuthorizationRequirement,
  context: AuthorizationHandlerContext,
): Promise<boolean> {
  const user = context.user;
  switch (requirement.kind) {
    case 'authenticatedUser':
      return user.isAuthenticated;
    case 'claim':
      return user.claims.some(
        (c) =>
          sameClaimType(c.type, requirement.claimType) &&
          (requirement.allowedValues.length === 0 || requirement.allowedValues.includes(c.value)),
      );
    case 'role':
      return requirement.roles.some((r) => user.isInRole(r));
    case 'userName': {
      const expected = requirement.userName.toLowerCase();
      return user.identities.some((identity) => identity.name?.toLowerCase() === expected);
    }
    case 'assertion':
      return (await requirement.handler(context)) === true;
  }
}
