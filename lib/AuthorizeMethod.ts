import { createDecorator } from '@toss/nestjs-aop';

export const AUTHORIZE_METHOD_SYMBOL = Symbol('authorization:authorize-method');

export interface AuthorizeMethodOptions {
  /** Named policy; omit to apply the default policy. */
  policy?: string;
  /** Derive the evaluation resource from the call arguments. Default: the arguments array. */
  resource?(...args: unknown[]): unknown;
}

/**
 * Authorize calls to any injectable method (services included) against the
 * user of the current request. Evaluated by AuthorizeMethodAspect before the
 * method runs; the method only executes on SUCCESS.
 *
 * Example:
 *   @AuthorizeMethod({ policy: 'documents:edit', resource: (doc) => doc })
 *   async update(doc: Document) { ... }
 */
export const AuthorizeMethod = (options: AuthorizeMethodOptions = {}) =>
  createDecorator(AUTHORIZE_METHOD_SYMBOL, options);
