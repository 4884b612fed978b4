import { Injectable } from '@nestjs/common';
import { AuthorizationPolicyProvider } from './authorization-policy.provider';
import { ClaimsPrincipal } from './claims';
import { PolicyNotFoundError } from './errors';
import { PolicyEvaluator } from './policy-evaluator.service';
import { AuthorizationPolicy } from './policy/AuthorizationPolicy';
import { PolicyAuthorizationResult } from './types';

/**
 * Imperative, resource-based authorization for code that only knows the
 * resource once it has loaded it.
 *
 * Example:
 *   const result = await this.authorization.authorize(user, document, 'documents:edit');
 *   if (result.outcome !== 'SUCCESS') throw new ForbiddenException();
 */
@Injectable()
export class AuthorizationService {
  constructor(
    private readonly policyProvider: AuthorizationPolicyProvider,
    private readonly policyEvaluator: PolicyEvaluator,
  ) {}

  async authorize(
    user: ClaimsPrincipal,
    resource: unknown,
    policy: AuthorizationPolicy | string,
  ): Promise<PolicyAuthorizationResult> {
    const resolved = typeof policy === 'string' ? await this.policyNamed(policy) : policy;
    return this.policyEvaluator.evaluate(resolved, user, resource);
  }

  private async policyNamed(name: string): Promise<AuthorizationPolicy> {
    const policy = await this.policyProvider.getPolicy(name);
    if (!policy) {
      throw new PolicyNotFoundError(name);
    }
    return policy;
  }
}
