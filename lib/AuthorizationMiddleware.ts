import { Injectable, Logger } from '@nestjs/common';
import { AuthenticationService } from './authentication.service';
import { AuthorizationPolicyProvider } from './authorization-policy.provider';
import { PolicyNotFoundError } from './errors';
import { PolicyEvaluator } from './policy-evaluator.service';
import { AuthorizationPolicy } from './policy/AuthorizationPolicy';
import { role } from './policy/AuthorizationRequirement';
import {
  AuthorizationHttpContext,
  AuthorizeMarker,
  Endpoint,
  RequestDelegate,
} from './types';

export function isAllowAnonymous(endpoint: Endpoint | undefined): boolean {
  return endpoint?.metadata.some((m) => m.kind === 'allowAnonymous') ?? false;
}

export function authorizeMarkersOf(endpoint: Endpoint | undefined): AuthorizeMarker[] {
  const markers: AuthorizeMarker[] = [];
  for (const m of endpoint?.metadata ?? []) {
    if (m.kind === 'authorize') markers.push(m);
  }
  return markers;
}

/**
 * Combine the policies referenced by the authorize markers into one. A
 * marker without a policy name pulls in the default policy (once). Every
 * named reference is looked up anew; an unknown name is fatal.
 */
export async function combinePolicies(
  provider: AuthorizationPolicyProvider,
  markers: readonly AuthorizeMarker[],
): Promise<AuthorizationPolicy> {
  if (markers.length === 0) {
    return provider.getDefaultPolicy();
  }

  const parts: AuthorizationPolicy[] = [];
  let useDefault = false;
  for (const marker of markers) {
    if (marker.policy) {
      const policy = await provider.getPolicy(marker.policy);
      if (!policy) {
        throw new PolicyNotFoundError(marker.policy);
      }
      parts.push(policy);
    }

    // A marker naming neither a policy nor roles stands for the default policy.
    const roles = nonBlank(marker.roles);
    if (roles.length > 0) {
      parts.push(new AuthorizationPolicy([role(roles)]));
    } else if (!marker.policy) {
      useDefault = true;
    }

    const schemes = nonBlank(marker.authenticationSchemes);
    if (schemes.length > 0) {
      parts.push(new AuthorizationPolicy([], schemes));
    }
  }

  if (useDefault) {
    parts.push(await provider.getDefaultPolicy());
  }
  return AuthorizationPolicy.combine(...parts);
}

/**
 * Decides whether a request may reach its handler.
 *
 * 1. allow-anonymous on the endpoint: pass through
 * 2. resolve the effective policy from the authorize markers (default policy
 *    when there are none)
 * 3. authenticate for the policy's schemes
 * 4. evaluate with the endpoint as resource
 * 5. SUCCESS calls next; CHALLENGE / FORBID go to the AuthenticationService
 */
@Injectable()
export class AuthorizationMiddleware {
  private readonly logger = new Logger(AuthorizationMiddleware.name);

  constructor(
    private readonly policyProvider: AuthorizationPolicyProvider,
    private readonly policyEvaluator: PolicyEvaluator,
    private readonly authenticationService: AuthenticationService,
  ) {}

  async invoke(context: AuthorizationHttpContext, next: RequestDelegate): Promise<void> {
    const endpoint = context.endpoint;
    const name = endpoint?.displayName ?? '(no endpoint)';

    if (isAllowAnonymous(endpoint)) {
      this.logger.debug(`${name}: anonymous access allowed`);
      return this.callNext(context, next);
    }

    const policy = await combinePolicies(this.policyProvider, authorizeMarkersOf(endpoint));
    const authenticateResult = await this.policyEvaluator.authenticate(policy, context);
    const result = await this.policyEvaluator.evaluate(policy, context.user, endpoint, authenticateResult);
    this.logger.debug(`${name}: authorization result ${result.outcome}`);

    switch (result.outcome) {
      case 'SUCCESS':
        return this.callNext(context, next);
      case 'CHALLENGE':
        this.logger.warn(`${name}: challenging unauthenticated request`);
        for (const scheme of schemesOrDefault(policy)) {
          await this.authenticationService.challenge(context, scheme);
        }
        return;
      case 'FORBID':
        this.logger.warn(`${name}: access forbidden`);
        for (const scheme of schemesOrDefault(policy)) {
          await this.authenticationService.forbid(context, scheme);
        }
        return;
    }
  }

  private async callNext(context: AuthorizationHttpContext, next: RequestDelegate): Promise<void> {
    context.signal?.throwIfAborted();
    await next(context);
  }
}

function nonBlank(values: readonly string[] | undefined): string[] {
  return values?.map((v) => v.trim()).filter(Boolean) ?? [];
}

function schemesOrDefault(policy: AuthorizationPolicy): Array<string | undefined> {
  return policy.authenticationSchemes.length > 0 ? [...policy.authenticationSchemes] : [undefined];
}
