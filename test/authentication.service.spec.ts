import { HttpStatus } from '@nestjs/common';
import { DefaultAuthenticationService } from '../lib/authentication.service';
import { AuthenticationHandler } from '../lib/authorization.interfaces';
import { ClaimsIdentity, ClaimsPrincipal } from '../lib/claims';
import { SchemeNotFoundError } from '../lib/errors';
import { AuthenticateResults } from '../lib/types';
import { createHttpContext } from './test-helpers';

describe('DefaultAuthenticationService', () => {
  const bearerPrincipal = new ClaimsPrincipal(new ClaimsIdentity([{ type: 'sub', value: '42' }], 'Bearer'));

  function createHandler(overrides: Partial<AuthenticationHandler> = {}): AuthenticationHandler {
    return {
      authenticate: jest.fn(async () => AuthenticateResults.success(bearerPrincipal, 'Bearer')),
      ...overrides,
    };
  }

  test('whenSchemeRegisteredThenDelegatesToItsHandler', async () => {
    const bearer = createHandler();
    const service = new DefaultAuthenticationService({ schemes: { Bearer: bearer } });
    const context = createHttpContext({ anonymous: true });

    const result = await service.authenticate(context, 'Bearer');

    expect(result).toEqual({ succeeded: true, principal: bearerPrincipal, scheme: 'Bearer' });
    expect(bearer.authenticate).toHaveBeenCalledWith(context);
  });

  test('whenNoSchemeGivenThenUsesDefaultScheme', async () => {
    const bearer = createHandler();
    const service = new DefaultAuthenticationService({ schemes: { Bearer: bearer }, defaultScheme: 'Bearer' });

    await service.authenticate(createHttpContext());

    expect(bearer.authenticate).toHaveBeenCalledTimes(1);
  });

  test('whenSchemeUnknownThenThrowsSchemeNotFoundError', async () => {
    const service = new DefaultAuthenticationService({ schemes: { Bearer: createHandler() } });

    await expect(service.authenticate(createHttpContext(), 'Cookie')).rejects.toThrow(SchemeNotFoundError);
    await expect(service.authenticate(createHttpContext())).rejects.toThrow(
      'No authentication scheme was specified and no defaultScheme is configured.',
    );
  });

  test('whenHandlerReportsFailureThenFailureIsReturned', async () => {
    const service = new DefaultAuthenticationService({
      schemes: { Basic: createHandler({ authenticate: async () => AuthenticateResults.fail('bad password') }) },
    });

    const result = await service.authenticate(createHttpContext(), 'Basic');

    expect(result.succeeded).toBe(false);
    expect('failure' in result && result.failure.message).toBe('bad password');
  });

  test('whenDefaultSchemeNotRegisteredThenConstructorThrows', () => {
    expect(() => new DefaultAuthenticationService({ defaultScheme: 'Bearer' })).toThrow(SchemeNotFoundError);
  });

  test('whenChallengedThenRunsHookAndRecordsUnauthorized', async () => {
    const challenge = jest.fn(async () => {});
    const service = new DefaultAuthenticationService({ schemes: { Bearer: createHandler({ challenge }) } });
    const context = createHttpContext();

    await service.challenge(context, 'Bearer');

    expect(challenge).toHaveBeenCalledWith(context, undefined);
    expect(context.statusCode).toBe(HttpStatus.UNAUTHORIZED);
  });

  test('whenChallengedWithoutAnySchemeThenStillRecordsUnauthorized', async () => {
    const service = new DefaultAuthenticationService({});
    const context = createHttpContext();

    await service.challenge(context);

    expect(context.statusCode).toBe(401);
  });

  test('whenChallengedForSeveralSchemesThenEveryHookRuns', async () => {
    const basicChallenge = jest.fn(async () => {});
    const bearerChallenge = jest.fn(async () => {});
    const service = new DefaultAuthenticationService({
      schemes: {
        Basic: createHandler({ challenge: basicChallenge }),
        Bearer: createHandler({ challenge: bearerChallenge }),
      },
    });
    const context = createHttpContext();

    await service.challenge(context, 'Basic');
    await service.challenge(context, 'Bearer');

    expect(basicChallenge).toHaveBeenCalledTimes(1);
    expect(bearerChallenge).toHaveBeenCalledTimes(1);
    expect(context.statusCode).toBe(401);
  });

  test('whenForbiddenThenRunsHookAndRecordsForbidden', async () => {
    const forbid = jest.fn(async () => {});
    const service = new DefaultAuthenticationService({
      schemes: { Bearer: createHandler({ forbid }) },
      defaultScheme: 'Bearer',
    });
    const context = createHttpContext();
    const properties = { redirectUri: '/denied' };

    await service.forbid(context, undefined, properties);

    expect(forbid).toHaveBeenCalledWith(context, properties);
    expect(context.statusCode).toBe(HttpStatus.FORBIDDEN);
  });
});
