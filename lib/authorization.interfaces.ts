import { InjectionToken, ModuleMetadata, OptionalFactoryDependency } from '@nestjs/common';
import { ClsModuleOptions } from 'nestjs-cls';
import { AuthorizationPolicy } from './policy/AuthorizationPolicy';
import { AuthenticateResult, AuthenticationProperties, AuthorizationHttpContext } from './types';

/**
 * Per-scheme authentication logic plugged into DefaultAuthenticationService.
 * `challenge` and `forbid` are side-effect hooks (e.g. setting a
 * WWW-Authenticate header); the 401/403 is raised once all of them ran.
 */
export interface AuthenticationHandler {
  authenticate(context: AuthorizationHttpContext): Promise<AuthenticateResult>;
  challenge?(context: AuthorizationHttpContext, properties?: AuthenticationProperties): Promise<void>;
  forbid?(context: AuthorizationHttpContext, properties?: AuthenticationProperties): Promise<void>;
}

export interface AuthorizationModuleOptions {
  /** Named policies referenced by `@Authorize('name')`. Names are case-sensitive. */
  policies?: Record<string, AuthorizationPolicy>;
  /** Policy used by `@Authorize()` without a name and by unmarked endpoints. Default: require an authenticated user. */
  defaultPolicy?: AuthorizationPolicy;
  /** Authentication handlers keyed by scheme name. */
  schemes?: Record<string, AuthenticationHandler>;
  /** Scheme used when a policy names none. Must be a key of `schemes`. */
  defaultScheme?: string;
  /** Register AuthorizationInterceptor as a global interceptor (default: false). */
  useGlobalInterceptor?: boolean;
  /** Options merged into ClsModule.forRoot(). Default: { global: true, middleware: { mount: true } } */
  cls?: Partial<ClsModuleOptions>;
}

export interface AuthorizationModuleAsyncOptions
  extends Pick<ModuleMetadata, 'imports'> {
  useFactory: (
    ...args: any[]
  ) => Promise<AuthorizationModuleOptions> | AuthorizationModuleOptions;
  inject?: Array<InjectionToken | OptionalFactoryDependency>;
  /** Evaluated before the factory runs, so it cannot come from the factory result. */
  useGlobalInterceptor?: boolean;
}
