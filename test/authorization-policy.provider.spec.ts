import { DefaultAuthorizationPolicyProvider } from '../lib/authorization-policy.provider';
import { AuthorizationConfigurationError } from '../lib/errors';
import { AuthorizationPolicy } from '../lib/policy/AuthorizationPolicy';
import { AuthorizationPolicyBuilder } from '../lib/policy/AuthorizationPolicyBuilder';

describe('DefaultAuthorizationPolicyProvider', () => {
  test('whenNoDefaultPolicyConfiguredThenDefaultRequiresAuthenticatedUser', async () => {
    const provider = new DefaultAuthorizationPolicyProvider({});

    const policy = await provider.getDefaultPolicy();

    expect(policy.requirements).toEqual([{ kind: 'authenticatedUser' }]);
    expect(policy.authenticationSchemes).toEqual([]);
  });

  test('whenDefaultPolicyConfiguredThenReturnsSameInstance', async () => {
    const defaultPolicy = new AuthorizationPolicyBuilder().requireRole('User').build();
    const provider = new DefaultAuthorizationPolicyProvider({ defaultPolicy });

    expect(await provider.getDefaultPolicy()).toBe(defaultPolicy);
  });

  test('whenPolicyNamedThenLookupIsExact', async () => {
    const admin = new AuthorizationPolicyBuilder().requireRole('Admin').build();
    const provider = new DefaultAuthorizationPolicyProvider({ policies: { admin } });

    expect(await provider.getPolicy('admin')).toBe(admin);
    expect(await provider.getPolicy('Admin')).toBeUndefined();
    expect(await provider.getPolicy('unknown')).toBeUndefined();
  });

  test('whenConfiguredPolicyIsNotAnAuthorizationPolicyThenThrows', () => {
    const notAPolicy = { requirements: [], authenticationSchemes: [] };
    const policies: Record<string, unknown> = { broken: notAPolicy };

    expect(
      () => new DefaultAuthorizationPolicyProvider({ policies: policies as Record<string, AuthorizationPolicy> }),
    ).toThrow(AuthorizationConfigurationError);
  });
});
