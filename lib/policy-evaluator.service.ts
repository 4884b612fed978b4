import { Injectable, Logger } from '@nestjs/common';
import { AuthenticationService } from './authentication.service';
import { ClaimsPrincipal } from './claims';
import { AuthorizationHandlerContext } from './policy/AuthorizationHandlerContext';
import { AuthorizationPolicy } from './policy/AuthorizationPolicy';
import { describeRequirement } from './policy/AuthorizationRequirement';
import { handleRequirement } from './policy/requirement-handlers';
import {
  AuthenticateResult,
  AuthenticateResults,
  AuthorizationHttpContext,
  PolicyAuthorizationResult,
} from './types';

@Injectable()
export class PolicyEvaluator {
  private readonly logger = new Logger(PolicyEvaluator.name);

  constructor(private readonly authenticationService: AuthenticationService) {}

  /**
   * Authenticate the request for the policy's schemes, one after another.
   * Every successful principal is merged; when none succeeds the request user
   * is replaced by an anonymous principal. Without schemes the current user
   * is reported as is.
   */
  async authenticate(
    policy: AuthorizationPolicy,
    context: AuthorizationHttpContext,
  ): Promise<AuthenticateResult> {
    if (policy.authenticationSchemes.length === 0) {
      return context.user.isAuthenticated
        ? AuthenticateResults.success(context.user, 'context.user')
        : AuthenticateResults.noResult();
    }

    let merged: ClaimsPrincipal | undefined;
    for (const scheme of policy.authenticationSchemes) {
      const result = await this.authenticationService.authenticate(context, scheme);
      if (result.succeeded) {
        merged = mergePrincipals(merged, result.principal);
      }
    }

    if (merged) {
      context.user = merged;
      return AuthenticateResults.success(merged, policy.authenticationSchemes.join(';'));
    }
    context.user = ClaimsPrincipal.anonymous();
    return AuthenticateResults.noResult();
  }

  /**
   * Evaluate every requirement of the policy in order.
   *
   * - all met: SUCCESS
   * - a requirement called context.fail(): FORBID, remaining ones skipped
   * - otherwise FORBID for an authenticated principal, CHALLENGE for an
   *   anonymous one. `authenticateResult`, when given, decides which.
   */
  async evaluate(
    policy: AuthorizationPolicy,
    user: ClaimsPrincipal,
    resource?: unknown,
    authenticateResult?: AuthenticateResult,
  ): Promise<PolicyAuthorizationResult> {
    const context = new AuthorizationHandlerContext(policy.requirements, user, resource);

    for (const requirement of policy.requirements) {
      await handleRequirement(requirement, context);
      if (context.hasFailed) {
        this.logger.debug(`Evaluation failed explicitly on requirement: ${describeRequirement(requirement)}`);
        return {
          outcome: 'FORBID',
          failure: { failCalled: true, failedRequirements: context.pendingRequirements },
        };
      }
    }

    if (context.hasSucceeded) {
      return { outcome: 'SUCCESS' };
    }

    const failedRequirements = context.pendingRequirements;
    this.logger.debug(`Unmet requirements: ${failedRequirements.map(describeRequirement).join('; ')}`);
    const authenticated = authenticateResult ? authenticateResult.succeeded : user.isAuthenticated;
    return {
      outcome: authenticated ? 'FORBID' : 'CHALLENGE',
      failure: { failCalled: false, failedRequirements },
    };
  }
}

function mergePrincipals(existing: ClaimsPrincipal | undefined, added: ClaimsPrincipal): ClaimsPrincipal {
  if (!existing) {
    return new ClaimsPrincipal(added.identities);
  }
  const merged = new ClaimsPrincipal(existing.identities);
  merged.addIdentities(added.identities);
  return merged;
}
