import { AuthorizationRequirement } from './AuthorizationRequirement';

/**
 * Immutable bundle of requirements plus the authentication schemes whose
 * principals the requirements are checked against. An empty scheme list
 * means "use whatever principal is already on the request".
 */
export class AuthorizationPolicy {
  readonly requirements: readonly AuthorizationRequirement[];
  readonly authenticationSchemes: readonly string[];

  constructor(
    requirements: readonly AuthorizationRequirement[],
    authenticationSchemes: readonly string[] = [],
  ) {
    this.requirements = Object.freeze([...requirements]);
    this.authenticationSchemes = Object.freeze(unique(authenticationSchemes));
    Object.freeze(this);
  }

  /** Requirements concatenated in order; schemes unioned in first-seen order. */
  static combine(...policies: AuthorizationPolicy[]): AuthorizationPolicy {
    return new AuthorizationPolicy(
      policies.flatMap((policy) => policy.requirements),
      policies.flatMap((policy) => policy.authenticationSchemes),
    );
  }
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}
