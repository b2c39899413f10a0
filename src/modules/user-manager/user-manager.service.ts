import bcrypt from 'bcryptjs';
import { DEFAULT_USER_ROLE } from '../../constants/user.constants';
import { PublicUser, User, UserProfilePatch, toPublicUser } from '../../connections/db/models/user.model';
import { DataSource, Repositories } from '../../connections/db/repositories/types';
import { ActingUser } from '../../types/request.types';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationFailedError,
} from '../../utils/errors';
import { auditLog } from '../../utils/logging';
import { AuthorizationGuard } from '../auth/authorization.guard';

export interface CreateUserRequest {
  username: string;
  email: string;
  full_name: string;
  password: string;
  role?: string;
}

/**
 * Account and role administration, gated by the role hierarchy.
 */
export class UserManagerService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly guard: AuthorizationGuard,
    private readonly bcryptRounds: number = 10
  ) {}

  private async findUser(repos: Repositories, userId: number): Promise<User> {
    const user = await repos.users.findById(userId);
    if (!user) {
      throw new NotFoundError('User not found', { userId });
    }
    return user;
  }

  private async findRole(repos: Repositories, roleName: string) {
    const role = await repos.roles.findByName(roleName);
    if (!role) {
      throw new NotFoundError(`Role '${roleName}' not found`, { role: roleName });
    }
    return role;
  }

  private async toPublic(repos: Repositories, user: User): Promise<PublicUser> {
    const roles = await repos.roles.findNamesByUserId(user.id);
    return toPublicUser({ ...user, roles });
  }

  /**
   * Check order: user, role, already held, rank.
   */
  async assignRole(actor: ActingUser, targetUserId: number, roleName: string): Promise<PublicUser> {
    const result = await this.dataSource.transaction(async (repos) => {
      const user = await this.findUser(repos, targetUserId);
      const role = await this.findRole(repos, roleName);

      if (await repos.userRoles.find(user.id, role.id)) {
        throw new ConflictError(`User already has role '${roleName}'`, { userId: user.id, role: roleName });
      }

      this.guard.assertCanAssign(actor.roles, roleName);

      await repos.userRoles.create(user.id, role.id, actor.id);
      return this.toPublic(repos, user);
    });

    auditLog('role.assigned', { actorId: actor.id, userId: targetUserId, role: roleName });
    return result;
  }

  /**
   * Check order: user, role, rank, held.
   */
  async removeRole(actor: ActingUser, targetUserId: number, roleName: string): Promise<PublicUser> {
    const result = await this.dataSource.transaction(async (repos) => {
      const user = await this.findUser(repos, targetUserId);
      const role = await this.findRole(repos, roleName);

      this.guard.assertCanAssign(actor.roles, roleName);

      if (!(await repos.userRoles.find(user.id, role.id))) {
        throw new NotFoundError(`User does not have role '${roleName}'`, { userId: user.id, role: roleName });
      }

      await repos.userRoles.delete(user.id, role.id);
      return this.toPublic(repos, user);
    });

    auditLog('role.removed', { actorId: actor.id, userId: targetUserId, role: roleName });
    return result;
  }

  /**
   * Check order: username, email, role known, rank. Without an initial role
   * the account starts as guest.
   */
  async createUser(actor: ActingUser, input: CreateUserRequest): Promise<PublicUser> {
    const roleName = input.role ?? DEFAULT_USER_ROLE;

    const created = await this.dataSource.transaction(async (repos) => {
      if (await repos.users.findByUsername(input.username)) {
        throw new ConflictError('Username is already taken', { username: input.username });
      }
      if (await repos.users.findByEmail(input.email)) {
        throw new ConflictError('Email is already registered', { email: input.email });
      }

      const role = await repos.roles.findByName(roleName);
      if (!role || !this.guard.roles.isKnown(roleName)) {
        throw new ValidationFailedError(`Unknown role '${roleName}'`, { role: roleName });
      }
      this.guard.assertCanAssign(actor.roles, roleName);

      const user = await repos.users.create({
        username: input.username,
        email: input.email,
        full_name: input.full_name,
        password_hash: await bcrypt.hash(input.password, this.bcryptRounds),
      });
      await repos.userRoles.create(user.id, role.id, actor.id);

      return this.toPublic(repos, user);
    });

    auditLog('user.created', { actorId: actor.id, userId: created.id, role: roleName });
    return created;
  }

  /**
   * Self-deletion is refused whatever the rank. Role rows go away with the
   * account, which is soft-deleted.
   */
  async deleteUser(actor: ActingUser, targetUserId: number): Promise<void> {
    await this.dataSource.transaction(async (repos) => {
      const user = await this.findUser(repos, targetUserId);

      if (user.id === actor.id) {
        throw new ForbiddenError('Users cannot delete their own account');
      }

      const targetRoles = await repos.roles.findNamesByUserId(user.id);
      this.guard.assertCanManageUser(actor.roles, targetRoles);

      await repos.userRoles.deleteByUserId(user.id);
      await repos.users.softDelete(user.id);
    });

    auditLog('user.deleted', { actorId: actor.id, userId: targetUserId });
  }

  /**
   * Activates or disables an account. Needs a strictly higher rank than the
   * target; disabling revokes the refresh token and the access token stops
   * resolving on the next request.
   */
  async updateUserStatus(actor: ActingUser, targetUserId: number, isActive: boolean): Promise<PublicUser> {
    const result = await this.dataSource.transaction(async (repos) => {
      const user = await this.findUser(repos, targetUserId);

      if (user.id === actor.id) {
        throw new ForbiddenError('Users cannot change the status of their own account');
      }

      const targetRoles = await repos.roles.findNamesByUserId(user.id);
      this.guard.assertCanManageUser(actor.roles, targetRoles);

      const updated = await repos.users.setActive(user.id, isActive);
      return toPublicUser({ ...updated, roles: targetRoles });
    });

    auditLog('user.status_changed', { actorId: actor.id, userId: targetUserId, isActive });
    return result;
  }

  /**
   * Updates full name and email. Equal rank is enough here, unlike the
   * account-level operations.
   */
  async updateUserProfile(actor: ActingUser, targetUserId: number, patch: UserProfilePatch): Promise<PublicUser> {
    const result = await this.dataSource.transaction(async (repos) => {
      const user = await this.findUser(repos, targetUserId);

      if (patch.email !== undefined && patch.email !== user.email) {
        const holder = await repos.users.findByEmail(patch.email);
        if (holder && holder.id !== user.id) {
          throw new ConflictError('Email is already registered', { email: patch.email });
        }
      }

      const targetRoles = await repos.roles.findNamesByUserId(user.id);
      this.guard.assertCanUpdateProfile(actor.roles, targetRoles);

      const updated = await repos.users.updateProfile(user.id, patch);
      return toPublicUser({ ...updated, roles: targetRoles });
    });

    auditLog('user.profile_updated', { actorId: actor.id, userId: targetUserId });
    return result;
  }

  /** Strictly higher rank than the target is required; equal rank is refused. */
  async resetPassword(actor: ActingUser, targetUserId: number, newPassword: string): Promise<void> {
    const { users, roles } = this.dataSource.repositories;
    const user = await users.findById(targetUserId);
    if (!user) {
      throw new NotFoundError('User not found', { userId: targetUserId });
    }

    const targetRoles = await roles.findNamesByUserId(user.id);
    this.guard.assertCanManageUser(actor.roles, targetRoles);

    const passwordHash = await bcrypt.hash(newPassword, this.bcryptRounds);
    await users.updatePassword(user.id, passwordHash);

    auditLog('user.password_reset', { actorId: actor.id, userId: targetUserId });
  }
}
