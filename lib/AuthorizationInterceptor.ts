import {
  CallHandler,
  ExecutionContext,
  ForbiddenException,
  HttpStatus,
  Injectable,
  Logger,
  NestInterceptor,
  UnauthorizedException,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { AuthorizationMiddleware } from './AuthorizationMiddleware';
import { EndpointResolver } from './EndpointResolver';
import { ClaimsPrincipal } from './claims';
import { AuthorizationHttpContext, AuthorizationRequest } from './types';

/**
 * Principal for whatever an upstream guard left on request.user: a
 * ClaimsPrincipal as is, a claims payload converted, anything else anonymous.
 * A payload without a single claim counts as anonymous.
 */
export function principalFromUser(user: unknown): ClaimsPrincipal {
  if (user instanceof ClaimsPrincipal) {
    return user;
  }
  if (isPayload(user)) {
    const principal = ClaimsPrincipal.fromPayload(user);
    if (principal.claims.length > 0) {
      return principal;
    }
  }
  return ClaimsPrincipal.anonymous();
}

function isPayload(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Runs AuthorizationMiddleware in front of every route handler it is
 * applied to. The handler only runs when the middleware calls next;
 * otherwise the status recorded by the challenge / forbid decides between
 * 401 and 403.
 */
@Injectable()
export class AuthorizationInterceptor implements NestInterceptor {
  private readonly logger = new Logger(AuthorizationInterceptor.name);

  constructor(
    private readonly middleware: AuthorizationMiddleware,
    private readonly endpointResolver: EndpointResolver,
  ) {}

  async intercept(context: ExecutionContext, next: CallHandler): Promise<Observable<unknown>> {
    const request = context.switchToHttp().getRequest<AuthorizationRequest>();
    const httpContext: AuthorizationHttpContext = {
      request,
      user: principalFromUser(request.user),
      endpoint: this.endpointResolver.resolve(context),
    };
    const originalUser = httpContext.user;

    const passed: { result$?: Observable<unknown> } = {};
    try {
      await this.middleware.invoke(httpContext, async () => {
        passed.result$ = next.handle();
      });
    } finally {
      if (httpContext.user !== originalUser) {
        request.user = httpContext.user;
      }
    }

    if (!passed.result$) {
      throw this.denial(httpContext);
    }
    return passed.result$;
  }

  private denial(httpContext: AuthorizationHttpContext): Error {
    if (httpContext.statusCode === HttpStatus.UNAUTHORIZED) {
      return new UnauthorizedException('Authentication required');
    }
    if (httpContext.statusCode !== HttpStatus.FORBIDDEN) {
      this.logger.warn(`Request to ${httpContext.endpoint?.displayName} was not passed on and has no status`);
    }
    return new ForbiddenException('Access denied by policy');
  }
}
