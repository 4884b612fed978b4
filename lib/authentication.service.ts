import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { AUTHORIZATION_MODULE_OPTIONS } from './authorization.constants';
import { AuthenticationHandler, AuthorizationModuleOptions } from './authorization.interfaces';
import { SchemeNotFoundError } from './errors';
import { AuthenticateResult, AuthenticationProperties, AuthorizationHttpContext } from './types';

/**
 * Authentication collaborator of the authorization middleware. An omitted
 * scheme means the configured default scheme.
 */
export abstract class AuthenticationService {
  abstract authenticate(context: AuthorizationHttpContext, scheme?: string): Promise<AuthenticateResult>;
  abstract challenge(
    context: AuthorizationHttpContext,
    scheme?: string,
    properties?: AuthenticationProperties,
  ): Promise<void>;
  abstract forbid(
    context: AuthorizationHttpContext,
    scheme?: string,
    properties?: AuthenticationProperties,
  ): Promise<void>;
}

/**
 * Dispatches to the AuthenticationHandler registered for a scheme.
 *
 * `challenge` and `forbid` run the handler's hook (if any) and record 401 /
 * 403 on the context. They return normally so that every scheme of a policy
 * gets its hook; AuthorizationInterceptor raises the HTTP exception once.
 */
@Injectable()
export class DefaultAuthenticationService extends AuthenticationService {
  private readonly logger = new Logger(DefaultAuthenticationService.name);
  private readonly handlers: Map<string, AuthenticationHandler>;
  private readonly defaultScheme?: string;

  constructor(
    @Inject(AUTHORIZATION_MODULE_OPTIONS)
    options: AuthorizationModuleOptions,
  ) {
    super();
    this.handlers = new Map(Object.entries(options.schemes ?? {}));
    this.defaultScheme = options.defaultScheme;
    if (this.defaultScheme !== undefined && !this.handlers.has(this.defaultScheme)) {
      throw new SchemeNotFoundError(this.defaultScheme);
    }
  }

  async authenticate(context: AuthorizationHttpContext, scheme?: string): Promise<AuthenticateResult> {
    const [name, handler] = this.handlerFor(scheme);
    const result = await handler.authenticate(context);
    if (!result.succeeded && 'failure' in result) {
      this.logger.warn(`Authentication with scheme '${name}' failed: ${result.failure.message}`);
    }
    return result;
  }

  async challenge(
    context: AuthorizationHttpContext,
    scheme?: string,
    properties?: AuthenticationProperties,
  ): Promise<void> {
    const handler = this.optionalHandlerFor(scheme);
    if (handler?.challenge) {
      await handler.challenge(context, properties);
    }
    context.statusCode = HttpStatus.UNAUTHORIZED;
  }

  async forbid(
    context: AuthorizationHttpContext,
    scheme?: string,
    properties?: AuthenticationProperties,
  ): Promise<void> {
    const handler = this.optionalHandlerFor(scheme);
    if (handler?.forbid) {
      await handler.forbid(context, properties);
    }
    context.statusCode = HttpStatus.FORBIDDEN;
  }

  private handlerFor(scheme: string | undefined): [string, AuthenticationHandler] {
    const name = scheme ?? this.defaultScheme;
    const handler = name === undefined ? undefined : this.handlers.get(name);
    if (name === undefined || !handler) {
      throw new SchemeNotFoundError(name);
    }
    return [name, handler];
  }

  private optionalHandlerFor(scheme: string | undefined): AuthenticationHandler | undefined {
    const name = scheme ?? this.defaultScheme;
    return name === undefined ? undefined : this.handlers.get(name);
  }
}
