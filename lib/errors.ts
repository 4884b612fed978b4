/**
 * Raised for faults in how authorization is set up rather than in who is
 * asking: an unknown policy name, a role requirement without roles, an
 * authentication scheme nobody registered. Never translated into 401/403.
 */
export class AuthorizationConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthorizationConfigurationError';
  }
}

export class PolicyNotFoundError extends AuthorizationConfigurationError {
  constructor(readonly policyName: string) {
    super(`The authorization policy '${policyName}' was not found.`);
    this.name = 'PolicyNotFoundError';
  }
}

export class SchemeNotFoundError extends AuthorizationConfigurationError {
  constructor(readonly scheme: string | undefined) {
    super(
      scheme === undefined
        ? 'No authentication scheme was specified and no defaultScheme is configured.'
        : `No authentication handler is registered for the scheme '${scheme}'.`,
    );
    this.name = 'SchemeNotFoundError';
  }
}
