import { ClaimsPrincipal } from '../claims';
import { AuthorizationRequirement } from './AuthorizationRequirement';

/**
 * Accumulator for a single policy evaluation. Requirements start pending and
 * are marked off with `succeed`; `fail` poisons the whole evaluation.
 */
export class AuthorizationHandlerContext {
  private readonly pending: Set<AuthorizationRequirement>;
  private failCalled = false;

  constructor(
    readonly requirements: readonly AuthorizationRequirement[],
    readonly user: ClaimsPrincipal,
    readonly resource: unknown,
  ) {
    this.pending = new Set(requirements);
  }

  get pendingRequirements(): AuthorizationRequirement[] {
    return [...this.pending];
  }

  get hasFailed(): boolean {
    return this.failCalled;
  }

  get hasSucceeded(): boolean {
    return !this.failCalled && this.pending.size === 0;
  }

  succeed(requirement: AuthorizationRequirement): void {
    this.pending.delete(requirement);
  }

  fail(): void {
    this.failCalled = true;
  }
}
