import { AuthorizationPolicy } from './AuthorizationPolicy';
import {
  AssertionHandler,
  AuthorizationRequirement,
  assertion,
  authenticatedUser,
  claim,
  role,
  userName,
} from './AuthorizationRequirement';

/**
 * Fluent builder for AuthorizationPolicy.
 *
 * Example:
 *   new AuthorizationPolicyBuilder('Bearer')
 *     .requireClaim('permission', 'reports:read')
 *     .build();
 */
export class AuthorizationPolicyBuilder {
  private readonly requirements: AuthorizationRequirement[] = [];
  private readonly schemes: string[] = [];

  constructor(...authenticationSchemes: string[]) {
    this.schemes.push(...authenticationSchemes);
  }

  addAuthenticationSchemes(...schemes: string[]): this {
    this.schemes.push(...schemes);
    return this;
  }

  addRequirements(...requirements: AuthorizationRequirement[]): this {
    this.requirements.push(...requirements);
    return this;
  }

  requireAuthenticatedUser(): this {
    return this.addRequirements(authenticatedUser());
  }

  requireClaim(claimType: string, ...allowedValues: string[]): this {
    return this.addRequirements(claim(claimType, allowedValues));
  }

  requireRole(...roles: string[]): this {
    return this.addRequirements(role(roles));
  }

  requireUserName(name: string): this {
    return this.addRequirements(userName(name));
  }

  requireAssertion(handler: AssertionHandler): this {
    return this.addRequirements(assertion(handler));
  }

  combine(policy: AuthorizationPolicy): this {
    this.addAuthenticationSchemes(...policy.authenticationSchemes);
    return this.addRequirements(...policy.requirements);
  }

  build(): AuthorizationPolicy {
    return new AuthorizationPolicy(this.requirements, this.schemes);
  }
}
