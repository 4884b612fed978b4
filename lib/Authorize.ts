import 'reflect-metadata';
import { AUTHORIZATION_METADATA_KEY } from './authorization.constants';
import { AllowAnonymousMarker, AuthorizeMarker, EndpointMetadata } from './types';

export interface AuthorizeOptions {
  /** Named policy; omit to apply the default policy. */
  policy?: string;
  /** The user must hold at least one of these roles. */
  roles?: string[];
  /** Authenticate with these schemes instead of the principal already on the request. */
  authenticationSchemes?: string[];
}

/**
 * Attach a marker to a controller class or handler method. Markers stack:
 * the top-most decorator ends up first in the endpoint's metadata.
 */
export function addEndpointMetadata(marker: EndpointMetadata): ClassDecorator & MethodDecorator {
  return (target: object, _key?: string | symbol, descriptor?: PropertyDescriptor) => {
    const site: object = descriptor?.value ?? target;
    const existing: EndpointMetadata[] = Reflect.getOwnMetadata(AUTHORIZATION_METADATA_KEY, site) ?? [];
    Reflect.defineMetadata(AUTHORIZATION_METADATA_KEY, [marker, ...existing], site);
  };
}

/**
 * Require authorization for a controller or a route handler.
 *
 * Example:
 *   @Authorize('reports:read')
 *   @Get('reports/:id')
 *   getReport(@Param('id') id: string) { ... }
 *
 *   @Authorize({ roles: ['admin'], authenticationSchemes: ['Bearer'] })
 *   @Delete('users/:id')
 *   removeUser(@Param('id') id: string) { ... }
 */
export const Authorize = (policyOrOptions: string | AuthorizeOptions = {}) => {
  const options: AuthorizeOptions = typeof policyOrOptions === 'string' ? { policy: policyOrOptions } : policyOrOptions;
  const marker: AuthorizeMarker = {
    kind: 'authorize',
    policy: options.policy,
    roles: options.roles ? [...options.roles] : undefined,
    authenticationSchemes: options.authenticationSchemes ? [...options.authenticationSchemes] : undefined,
  };
  return addEndpointMetadata(Object.freeze(marker));
};

/**
 * Skip authorization entirely. Wins over every `@Authorize` on the same
 * handler or its controller.
 */
export const AllowAnonymous = () => {
  const marker: AllowAnonymousMarker = { kind: 'allowAnonymous' };
  return addEndpointMetadata(Object.freeze(marker));
};
