import { ClaimsPrincipal } from './claims';
import { AuthorizationRequirement } from './policy/AuthorizationRequirement';

export type AuthorizationOutcome = 'SUCCESS' | 'CHALLENGE' | 'FORBID';

/**
 * Why an evaluation did not succeed. `failCalled` is set when a requirement
 * explicitly failed the evaluation; `failedRequirements` lists those still
 * pending when evaluation stopped.
 */
export interface AuthorizationFailure {
  failCalled: boolean;
  failedRequirements: AuthorizationRequirement[];
}

export interface PolicyAuthorizationResult {
  outcome: AuthorizationOutcome;
  failure?: AuthorizationFailure;
}

export type AuthenticateResult =
  | { succeeded: true; principal: ClaimsPrincipal; scheme: string }
  | { succeeded: false; none: true }
  | { succeeded: false; failure: Error };

export const AuthenticateResults = {
  success: (principal: ClaimsPrincipal, scheme: string): AuthenticateResult =>
    ({ succeeded: true, principal, scheme }),
  noResult: (): AuthenticateResult => ({ succeeded: false, none: true }),
  fail: (failure: Error | string): AuthenticateResult =>
    ({ succeeded: false, failure: typeof failure === 'string' ? new Error(failure) : failure }),
};

export interface AuthenticationProperties {
  redirectUri?: string;
  items?: Record<string, string>;
}

/**
 * Structural type for the HTTP request. Compatible with both Express and
 * Fastify request objects.
 */
export interface AuthorizationRequest {
  user?: unknown;
  method?: string;
  url?: string;
  headers?: Record<string, string | string[] | undefined>;
  [key: string]: unknown;
}

export interface AuthorizeMarker {
  readonly kind: 'authorize';
  /** Named policy; omitted means the default policy. */
  readonly policy?: string;
  /** The user must hold at least one of these roles. */
  readonly roles?: readonly string[];
  readonly authenticationSchemes?: readonly string[];
}

export interface AllowAnonymousMarker {
  readonly kind: 'allowAnonymous';
}

export type EndpointMetadata = AuthorizeMarker | AllowAnonymousMarker;

/**
 * The routed target of a request. Handed to requirements as the
 * evaluation resource.
 */
export interface Endpoint {
  readonly displayName: string;
  readonly metadata: readonly EndpointMetadata[];
}

/**
 * Per-request state the middleware works on. `user` is always set: an
 * anonymous request carries an unauthenticated principal.
 */
export interface AuthorizationHttpContext {
  request: AuthorizationRequest;
  user: ClaimsPrincipal;
  endpoint?: Endpoint;
  signal?: AbortSignal;
  /** Set when the request is answered by a challenge (401) or forbid (403). */
  statusCode?: number;
}

export type RequestDelegate = (context: AuthorizationHttpContext) => Promise<void>;
