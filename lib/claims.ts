export const ClaimTypes = {
  Name: 'name',
  NameIdentifier: 'sub',
  Role: 'role',
} as const;

export interface Claim {
  readonly type: string;
  readonly value: string;
  readonly issuer?: string;
}

export interface ClaimsIdentityOptions {
  nameClaimType?: string;
  roleClaimType?: string;
}

/**
 * One set of claims produced by one authentication scheme.
 *
 * An identity counts as authenticated iff it has a non-empty
 * authentication type (e.g. 'Bearer', 'Basic').
 */
export class ClaimsIdentity {
  readonly claims: readonly Claim[];
  readonly nameClaimType: string;
  readonly roleClaimType: string;

  constructor(
    claims: readonly Claim[] = [],
    readonly authenticationType?: string,
    options: ClaimsIdentityOptions = {},
  ) {
    this.claims = Object.freeze([...claims]);
    this.nameClaimType = options.nameClaimType ?? ClaimTypes.Name;
    this.roleClaimType = options.roleClaimType ?? ClaimTypes.Role;
  }

  get isAuthenticated(): boolean {
    return !!this.authenticationType;
  }

  get name(): string | undefined {
    return this.findFirst(this.nameClaimType)?.value;
  }

  findFirst(type: string): Claim | undefined {
    return this.claims.find((claim) => sameClaimType(claim.type, type));
  }

  hasClaim(type: string, value: string): boolean {
    return this.claims.some((claim) => sameClaimType(claim.type, type) && claim.value === value);
  }

  isInRole(role: string): boolean {
    return this.hasClaim(this.roleClaimType, role);
  }
}

/**
 * The user of the current request: zero or more stacked identities.
 *
 * The primary identity is the first authenticated one, or the first one
 * when none is authenticated.
 */
export class ClaimsPrincipal {
  private readonly _identities: ClaimsIdentity[];

  constructor(identities: ClaimsIdentity | readonly ClaimsIdentity[] = []) {
    this._identities = identities instanceof ClaimsIdentity ? [identities] : [...identities];
  }

  /** An unauthenticated principal with a single empty identity. */
  static anonymous(): ClaimsPrincipal {
    return new ClaimsPrincipal(new ClaimsIdentity());
  }

  /**
   * Build a principal from a decoded token payload such as the one a
   * passport strategy leaves on request.user. Strings, numbers and booleans
   * become one claim each; arrays become one claim per element.
   */
  static fromPayload(
    payload: Record<string, unknown>,
    authenticationType = 'Bearer',
    options: ClaimsIdentityOptions = {},
  ): ClaimsPrincipal {
    const claims: Claim[] = [];
    for (const [type, raw] of Object.entries(payload)) {
      const values = Array.isArray(raw) ? raw : [raw];
      for (const value of values) {
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
          claims.push({ type, value: String(value) });
        }
      }
    }
    return new ClaimsPrincipal(new ClaimsIdentity(claims, authenticationType, options));
  }

  get identities(): readonly ClaimsIdentity[] {
    return this._identities;
  }

  get identity(): ClaimsIdentity | undefined {
    return this._identities.find((identity) => identity.isAuthenticated) ?? this._identities[0];
  }

  get claims(): Claim[] {
    return this._identities.flatMap((identity) => [...identity.claims]);
  }

  get isAuthenticated(): boolean {
    return this._identities.some((identity) => identity.isAuthenticated);
  }

  addIdentity(identity: ClaimsIdentity): void {
    this._identities.push(identity);
  }

  addIdentities(identities: readonly ClaimsIdentity[]): void {
    this._identities.push(...identities);
  }

  findFirst(type: string): Claim | undefined {
    return this.claims.find((claim) => sameClaimType(claim.type, type));
  }

  hasClaim(type: string, value: string): boolean {
    return this._identities.some((identity) => identity.hasClaim(type, value));
  }

  isInRole(role: string): boolean {
    return this._identities.some((identity) => identity.isInRole(role));
  }
}

export function sameClaimType(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
