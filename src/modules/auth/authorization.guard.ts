import { ROLE } from '../../constants/user.constants';
import { ForbiddenError } from '../../utils/errors';
import { RoleHierarchy } from './role-hierarchy';

/**
 * Rank-based permission checks shared by the user manager and the order
 * state machine.
 */
export class AuthorizationGuard {
  constructor(private readonly hierarchy: RoleHierarchy) {}

  get roles(): RoleHierarchy {
    return this.hierarchy;
  }

  /**
   * Granting or revoking a role needs at least that role's rank.
   * Equal rank is allowed; unknown target roles never are.
   */
  canAssign(actingRoles: readonly string[], targetRole: string): boolean {
    if (!this.hierarchy.isKnown(targetRole)) {
      return false;
    }
    return this.hierarchy.effectiveRank(actingRoles) >= this.hierarchy.rankOf(targetRole);
  }

  /**
   * Managing another account (delete, password reset) needs a strictly
   * higher rank, so peers cannot manage each other.
   */
  canManageUser(actingRoles: readonly string[], targetRoles: readonly string[]): boolean {
    return this.hierarchy.effectiveRank(actingRoles) > this.hierarchy.effectiveRank(targetRoles);
  }

  /** Profile edits need at least the target's rank, so peers and self are allowed. */
  canUpdateProfile(actingRoles: readonly string[], targetRoles: readonly string[]): boolean {
    return this.hierarchy.effectiveRank(actingRoles) >= this.hierarchy.effectiveRank(targetRoles);
  }

  /** True when the acting roles reach the rank of `role`. False for an unknown `role`. */
  hasRankOf(actingRoles: readonly string[], role: string): boolean {
    if (!this.hierarchy.isKnown(role)) {
      return false;
    }
    return this.hierarchy.effectiveRank(actingRoles) >= this.hierarchy.rankOf(role);
  }

  hasCoordinatorRank(actingRoles: readonly string[]): boolean {
    return this.hasRankOf(actingRoles, ROLE.COORDINATOR);
  }

  assertCanAssign(actingRoles: readonly string[], targetRole: string): void {
    if (!this.canAssign(actingRoles, targetRole)) {
      throw new ForbiddenError(`Insufficient rank to manage role '${targetRole}'`, { role: targetRole });
    }
  }

  assertCanManageUser(actingRoles: readonly string[], targetRoles: readonly string[]): void {
    if (!this.canManageUser(actingRoles, targetRoles)) {
      throw new ForbiddenError('Insufficient rank to manage this user');
    }
  }

  assertCanUpdateProfile(actingRoles: readonly string[], targetRoles: readonly string[]): void {
    if (!this.canUpdateProfile(actingRoles, targetRoles)) {
      throw new ForbiddenError('Insufficient rank to update this user');
    }
  }

  assertCoordinatorRank(actingRoles: readonly string[]): void {
    if (!this.hasCoordinatorRank(actingRoles)) {
      throw new ForbiddenError('Coordinator rank or higher is required');
    }
  }
}
