import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { PublicUser, User, toPublicUser } from '../../connections/db/models/user.model';
import { DataSource } from '../../connections/db/repositories/types';
import { ActingUser } from '../../types/request.types';
import { ForbiddenError, NotFoundError, UnauthorizedError } from '../../utils/errors';
import { auditLog, logger } from '../../utils/logging';
import { CoordinatorApprover, CoordinatorCredentials } from '../orders/orders.service';
import { AuthorizationGuard } from './authorization.guard';

export interface AuthTokenConfig {
  secret: string;
  expiresIn: number; // seconds
  refreshExpiresIn: number; // seconds
}

type TokenType = 'access' | 'refresh';

export interface TokenPair {
  token: string;
  refreshToken: string;
}

export interface LoginResult extends TokenPair {
  user: PublicUser;
}

export class AuthService implements CoordinatorApprover {
  constructor(
    private readonly dataSource: DataSource,
    private readonly guard: AuthorizationGuard,
    private readonly tokens: AuthTokenConfig
  ) {}

  private sign(userId: number, username: string, type: TokenType): string {
    return jwt.sign(
      { userId, username, type },
      this.tokens.secret,
      { expiresIn: type === 'access' ? this.tokens.expiresIn : this.tokens.refreshExpiresIn }
    );
  }

  /**
   * Verifies signature, expiry and token type; returns the user id claim.
   */
  private verify(token: string, type: TokenType): number {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.tokens.secret);
    } catch (error) {
      throw new UnauthorizedError(error instanceof jwt.TokenExpiredError ? 'Token expired' : 'Invalid token');
    }

    if (typeof decoded === 'string' || typeof decoded.userId !== 'number' || decoded.type !== type) {
      throw new UnauthorizedError('Invalid token');
    }
    return decoded.userId;
  }

  private async issueTokens(user: User): Promise<TokenPair> {
    const token = this.sign(user.id, user.username, 'access');
    const refreshToken = this.sign(user.id, user.username, 'refresh');
    await this.dataSource.repositories.users.setRefreshToken(user.id, refreshToken);
    return { token, refreshToken };
  }

  private async findActiveUser(userId: number): Promise<User> {
    const user = await this.dataSource.repositories.users.findById(userId);
    if (!user) {
      throw new UnauthorizedError('User no longer exists');
    }
    if (!user.is_active) {
      throw new ForbiddenError('Account is disabled');
    }
    return user;
  }

  async login(username: string, password: string): Promise<LoginResult> {
    const { users, roles } = this.dataSource.repositories;
    const user = await users.findByUsername(username);

    // Same message for unknown user and wrong password
    if (!user || !(await bcrypt.compare(password, user.password_hash))) {
      logger.warn('[Login] Invalid credentials', { username });
      throw new UnauthorizedError('Invalid username or password');
    }
    if (!user.is_active) {
      logger.warn('[Login] Account disabled', { userId: user.id });
      throw new ForbiddenError('Account is disabled');
    }

    const tokens = await this.issueTokens(user);
    const roleNames = await roles.findNamesByUserId(user.id);

    auditLog('USER_LOGIN', { userId: user.id, username: user.username });
    return { ...tokens, user: toPublicUser({ ...user, roles: roleNames }) };
  }

  /**
   * Rotates the pair. The presented refresh token must be the one stored on
   * the user, so a token is usable once.
   */
  async refresh(refreshToken: string): Promise<TokenPair> {
    const userId = this.verify(refreshToken, 'refresh');
    const user = await this.findActiveUser(userId);
    if (user.refresh_token !== refreshToken) {
      throw new UnauthorizedError('Refresh token has been revoked');
    }
    return this.issueTokens(user);
  }

  async logout(actor: ActingUser): Promise<void> {
    await this.dataSource.repositories.users.setRefreshToken(actor.id, null);
    logger.info('[Logout] User logged out', { userId: actor.id });
  }

  /**
   * Access token to acting user. Roles are read fresh on every request so a
   * revoked role stops working immediately.
   */
  async resolveActingUser(token: string): Promise<ActingUser> {
    const userId = this.verify(token, 'access');
    const user = await this.findActiveUser(userId);
    const roles = await this.dataSource.repositories.roles.findNamesByUserId(user.id);
    return { id: user.id, username: user.username, roles };
  }

  async me(actor: ActingUser): Promise<PublicUser> {
    const user = await this.dataSource.repositories.users.findById(actor.id);
    if (!user) {
      throw new NotFoundError('User not found', { userId: actor.id });
    }
    const roles = await this.dataSource.repositories.roles.findNamesByUserId(user.id);
    return toPublicUser({ ...user, roles });
  }

  async verifyCoordinatorApproval(credentials: CoordinatorCredentials): Promise<ActingUser> {
    const { users, roles } = this.dataSource.repositories;
    const coordinator = await users.findByUsername(credentials.username);

    if (!coordinator || !(await bcrypt.compare(credentials.password, coordinator.password_hash))) {
      throw new UnauthorizedError('Invalid coordinator credentials');
    }

    const roleNames = await roles.findNamesByUserId(coordinator.id);
    if (!coordinator.is_active || !this.guard.hasCoordinatorRank(roleNames)) {
      throw new ForbiddenError('Approver does not hold coordinator rank');
    }

    return { id: coordinator.id, username: coordinator.username, roles: roleNames };
  }
}
