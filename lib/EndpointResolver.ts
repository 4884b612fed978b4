import { ExecutionContext, Injectable, Type } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AUTHORIZATION_METADATA_KEY } from './authorization.constants';
import { Endpoint, EndpointMetadata } from './types';

export interface HandlerEndpoint extends Endpoint {
  readonly controller: Type<unknown>;
  readonly handler: Function;
}

/**
 * Turns the controller class and handler of an ExecutionContext into an
 * Endpoint. Class markers come before handler markers. Resolved once per
 * controller/handler pair.
 */
@Injectable()
export class EndpointResolver {
  private readonly cache = new WeakMap<Type<unknown>, WeakMap<Function, HandlerEndpoint>>();

  constructor(private readonly reflector: Reflector) {}

  resolve(context: ExecutionContext): HandlerEndpoint {
    const controller = context.getClass();
    const handler = context.getHandler();

    let byHandler = this.cache.get(controller);
    if (!byHandler) {
      byHandler = new WeakMap();
      this.cache.set(controller, byHandler);
    }

    let endpoint = byHandler.get(handler);
    if (!endpoint) {
      const collected = this.reflector.getAll<Array<EndpointMetadata[] | undefined>>(
        AUTHORIZATION_METADATA_KEY,
        [controller, handler],
      );
      endpoint = Object.freeze({
        displayName: `${controller.name}.${handler.name}`,
        metadata: Object.freeze(collected.flatMap((m) => m ?? [])),
        controller,
        handler,
      });
      byHandler.set(handler, endpoint);
    }
    return endpoint;
  }
}
