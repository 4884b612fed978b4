import { ForbiddenException, Logger, UnauthorizedException } from '@nestjs/common';
import { Aspect, LazyDecorator, WrapParams } from '@toss/nestjs-aop';
import { ClsService, CLS_REQ } from 'nestjs-cls';
import { AUTHORIZE_METHOD_SYMBOL, AuthorizeMethodOptions } from './AuthorizeMethod';
import { principalFromUser } from './AuthorizationInterceptor';
import { AuthorizationPolicyProvider } from './authorization-policy.provider';
import { AuthorizationService } from './authorization.service';

type GuardedMethod = (...args: unknown[]) => unknown;

@Aspect(AUTHORIZE_METHOD_SYMBOL)
export class AuthorizeMethodAspect implements LazyDecorator<GuardedMethod, AuthorizeMethodOptions> {
  private readonly logger = new Logger(AuthorizeMethodAspect.name);

  constructor(
    private readonly authorizationService: AuthorizationService,
    private readonly policyProvider: AuthorizationPolicyProvider,
    private readonly cls: ClsService,
  ) {}

  wrap({ method, metadata, methodName, instance }: WrapParams<GuardedMethod, AuthorizeMethodOptions>) {
    const aspect = this;
    const target = `${instance.constructor.name}.${methodName}`;

    return async (...args: unknown[]) => {
      const user = principalFromUser(aspect.currentUser());
      const resource = metadata.resource ? metadata.resource(...args) : args;
      const policy = metadata.policy ?? (await aspect.policyProvider.getDefaultPolicy());

      const result = await aspect.authorizationService.authorize(user, resource, policy);
      aspect.logger.debug(`${target}: authorization result ${result.outcome}`);

      if (result.outcome === 'CHALLENGE') {
        throw new UnauthorizedException('Authentication required');
      }
      if (result.outcome === 'FORBID') {
        aspect.logger.warn(`${target}: access forbidden`);
        throw new ForbiddenException('Access denied by policy');
      }
      return method(...args);
    };
  }

  private currentUser(): unknown {
    const request: unknown = this.cls.get(CLS_REQ);
    return typeof request === 'object' && request !== null && 'user' in request ? request.user : undefined;
  }
}
