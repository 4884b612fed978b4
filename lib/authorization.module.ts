import { DynamicModule, Module, Provider } from '@nestjs/common';
import { APP_INTERCEPTOR, DiscoveryModule } from '@nestjs/core';
import { AopModule } from '@toss/nestjs-aop';
import { ClsModule } from 'nestjs-cls';
import { AUTHORIZATION_MODULE_OPTIONS } from './authorization.constants';
import { AuthorizationModuleOptions, AuthorizationModuleAsyncOptions } from './authorization.interfaces';
import { AuthenticationService, DefaultAuthenticationService } from './authentication.service';
import {
  AuthorizationPolicyProvider,
  DefaultAuthorizationPolicyProvider,
} from './authorization-policy.provider';
import { AuthorizationInterceptor } from './AuthorizationInterceptor';
import { AuthorizationMiddleware } from './AuthorizationMiddleware';
import { AuthorizationService } from './authorization.service';
import { AuthorizeMethodAspect } from './AuthorizeMethodAspect';
import { EndpointResolver } from './EndpointResolver';
import { PolicyEvaluator } from './policy-evaluator.service';

const SHARED_PROVIDERS: Provider[] = [
  { provide: AuthorizationPolicyProvider, useClass: DefaultAuthorizationPolicyProvider },
  { provide: AuthenticationService, useClass: DefaultAuthenticationService },
  PolicyEvaluator,
  AuthorizationService,
  AuthorizationMiddleware,
  EndpointResolver,
  AuthorizationInterceptor,
  AuthorizeMethodAspect,
];

const EXPORTS = [
  AuthorizationPolicyProvider,
  AuthenticationService,
  PolicyEvaluator,
  AuthorizationService,
  AuthorizationMiddleware,
  AuthorizationInterceptor,
];

function globalInterceptor(enabled: boolean | undefined): Provider[] {
  return enabled ? [{ provide: APP_INTERCEPTOR, useExisting: AuthorizationInterceptor }] : [];
}

@Module({})
export class AuthorizationModule {
  static forRoot(options: AuthorizationModuleOptions = {}): DynamicModule {
    return {
      module: AuthorizationModule,
      imports: [
        DiscoveryModule,
        AopModule,
        ClsModule.forRoot({
          global: true,
          middleware: { mount: true },
          ...options.cls,
        }),
      ],
      providers: [
        { provide: AUTHORIZATION_MODULE_OPTIONS, useValue: options },
        ...SHARED_PROVIDERS,
        ...globalInterceptor(options.useGlobalInterceptor),
      ],
      exports: EXPORTS,
      global: true,
    };
  }

  // Custom CLS options are not supported here: module imports are resolved
  // before the async factory runs, so ClsModule always gets the defaults.
  static forRootAsync(asyncOptions: AuthorizationModuleAsyncOptions): DynamicModule {
    return {
      module: AuthorizationModule,
      imports: [
        DiscoveryModule,
        AopModule,
        ClsModule.forRoot({
          global: true,
          middleware: { mount: true },
        }),
        ...(asyncOptions.imports ?? []),
      ],
      providers: [
        {
          provide: AUTHORIZATION_MODULE_OPTIONS,
          useFactory: asyncOptions.useFactory,
          inject: asyncOptions.inject ?? [],
        },
        ...SHARED_PROVIDERS,
        ...globalInterceptor(asyncOptions.useGlobalInterceptor),
      ],
      exports: EXPORTS,
      global: true,
    };
  }
}
