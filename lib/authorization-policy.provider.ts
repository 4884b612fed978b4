import { Inject, Injectable, Logger } from '@nestjs/common';
import { AUTHORIZATION_MODULE_OPTIONS } from './authorization.constants';
import { AuthorizationModuleOptions } from './authorization.interfaces';
import { AuthorizationConfigurationError } from './errors';
import { AuthorizationPolicy } from './policy/AuthorizationPolicy';
import { AuthorizationPolicyBuilder } from './policy/AuthorizationPolicyBuilder';

/**
 * Supplies policies to the middleware. Override this provider to load
 * policies from somewhere other than the module options.
 */
export abstract class AuthorizationPolicyProvider {
  abstract getDefaultPolicy(): Promise<AuthorizationPolicy>;
  /** Resolves to undefined when no policy has that name. */
  abstract getPolicy(name: string): Promise<AuthorizationPolicy | undefined>;
}

@Injectable()
export class DefaultAuthorizationPolicyProvider extends AuthorizationPolicyProvider {
  private readonly logger = new Logger(DefaultAuthorizationPolicyProvider.name);
  private readonly policies: Map<string, AuthorizationPolicy>;
  private readonly defaultPolicy: AuthorizationPolicy;

  constructor(
    @Inject(AUTHORIZATION_MODULE_OPTIONS)
    options: AuthorizationModuleOptions,
  ) {
    super();
    this.policies = new Map();
    for (const [name, policy] of Object.entries(options.policies ?? {})) {
      if (!(policy instanceof AuthorizationPolicy)) {
        throw new AuthorizationConfigurationError(
          `Policy '${name}' is not an AuthorizationPolicy. Build it with AuthorizationPolicyBuilder.`,
        );
      }
      this.policies.set(name, policy);
    }
    this.defaultPolicy =
      options.defaultPolicy ?? new AuthorizationPolicyBuilder().requireAuthenticatedUser().build();
    this.logger.log(`Configured ${this.policies.size} named authorization policies`);
  }

  async getDefaultPolicy(): Promise<AuthorizationPolicy> {
    return this.defaultPolicy;
  }

  async getPolicy(name: string): Promise<AuthorizationPolicy | undefined> {
    return this.policies.get(name);
  }
}
