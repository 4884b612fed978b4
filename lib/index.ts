import 'reflect-metadata';

// Module
export { AuthorizationModule } from './authorization.module';
export { AUTHORIZATION_MODULE_OPTIONS, AUTHORIZATION_METADATA_KEY } from './authorization.constants';
export {
  AuthorizationModuleOptions,
  AuthorizationModuleAsyncOptions,
  AuthenticationHandler,
} from './authorization.interfaces';

// Types
export {
  AuthorizationOutcome,
  AuthorizationFailure,
  PolicyAuthorizationResult,
  AuthenticateResult,
  AuthenticateResults,
  AuthenticationProperties,
  AuthorizationRequest,
  AuthorizeMarker,
  AllowAnonymousMarker,
  EndpointMetadata,
  Endpoint,
  AuthorizationHttpContext,
  RequestDelegate,
} from './types';
export { Claim, ClaimTypes, ClaimsIdentity, ClaimsIdentityOptions, ClaimsPrincipal } from './claims';
export {
  AuthorizationConfigurationError,
  PolicyNotFoundError,
  SchemeNotFoundError,
} from './errors';

// Policies
export { AuthorizationPolicy } from './policy/AuthorizationPolicy';
export { AuthorizationPolicyBuilder } from './policy/AuthorizationPolicyBuilder';
export { AuthorizationHandlerContext } from './policy/AuthorizationHandlerContext';
export {
  AuthorizationRequirement,
  AssertionHandler,
  AuthenticatedUserRequirement,
  ClaimRequirement,
  RoleRequirement,
  UserNameRequirement,
  AssertionRequirement,
  authenticatedUser,
  claim,
  role,
  userName,
  assertion,
} from './policy/AuthorizationRequirement';

// Services
export { AuthorizationPolicyProvider, DefaultAuthorizationPolicyProvider } from './authorization-policy.provider';
export { AuthenticationService, DefaultAuthenticationService } from './authentication.service';
export { PolicyEvaluator } from './policy-evaluator.service';
export { AuthorizationService } from './authorization.service';
export { AuthorizationMiddleware, combinePolicies } from './AuthorizationMiddleware';

// NestJS integration
export { Authorize, AllowAnonymous, AuthorizeOptions } from './Authorize';
export { AuthorizeMethod, AuthorizeMethodOptions } from './AuthorizeMethod';
export { AuthorizationInterceptor, principalFromUser } from './AuthorizationInterceptor';
export { EndpointResolver, HandlerEndpoint } from './EndpointResolver';
