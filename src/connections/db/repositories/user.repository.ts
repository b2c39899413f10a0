import { NotFoundError } from '../../../utils/errors';
import { CreateUserInput, Role, User, UserProfilePatch, UserRole } from '../models/user.model';
import { Queryable, RoleRepository, UserRepository, UserRoleRepository } from './types';

export class PgUserRepository implements UserRepository {
  constructor(private readonly db: Queryable) {}

  async findById(id: number): Promise<User | null> {
    const result = await this.db.query<User>(
      'SELECT * FROM users WHERE id = $1 AND deleted_at IS NULL',
      [id]
    );
    return result.rows[0] ?? null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.db.query<User>(
      'SELECT * FROM users WHERE username = $1 AND deleted_at IS NULL',
      [username]
    );
    return result.rows[0] ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.db.query<User>(
      'SELECT * FROM users WHERE email = $1 AND deleted_at IS NULL',
      [email]
    );
    return result.rows[0] ?? null;
  }

  async create(input: CreateUserInput): Promise<User> {
    const result = await this.db.query<User>(
      `INSERT INTO users (username, email, full_name, password_hash)
       VALUES ($1, $2, $3, $4)
       RETURNING *`,
      [input.username, input.email, input.full_name, input.password_hash]
    );
    return result.rows[0];
  }

  async updatePassword(id: number, passwordHash: string): Promise<void> {
    await this.db.query(
      `UPDATE users
       SET password_hash = $1, refresh_token = NULL, updated_at = CURRENT_TIMESTAMP
       WHERE id = $2`,
      [passwordHash, id]
    );
  }

  async setRefreshToken(id: number, refreshToken: string | null): Promise<void> {
    await this.db.query(
      'UPDATE users SET refresh_token = $1, updated_at = CURRENT_TIMESTAMP WHERE id = $2',
      [refreshToken, id]
    );
  }

  private requireRow(user: User | undefined, id: number): User {
    if (!user) {
      throw new NotFoundError('User not found', { userId: id });
    }
    return user;
  }

  async setActive(id: number, isActive: boolean): Promise<User> {
    const result = await this.db.query<User>(
      `UPDATE users
       SET is_active = $1,
           refresh_token = CASE WHEN $1 THEN refresh_token ELSE NULL END,
           updated_at = CURRENT_TIMESTAMP
       WHERE id = $2 AND deleted_at IS NULL
       RETURNING *`,
      [isActive, id]
    );
    return this.requireRow(result.rows[0], id);
  }

  async updateProfile(id: number, patch: UserProfilePatch): Promise<User> {
    const result = await this.db.query<User>(
      `UPDATE users
       SET full_name = COALESCE($1, full_name),
           email = COALESCE($2, email),
           updated_at = CURRENT_TIMESTAMP
       WHERE id = $3 AND deleted_at IS NULL
       RETURNING *`,
      [patch.full_name ?? null, patch.email ?? null, id]
    );
    return this.requireRow(result.rows[0], id);
  }

  async softDelete(id: number): Promise<void> {
    await this.db.query(
      'UPDATE users SET deleted_at = CURRENT_TIMESTAMP, is_active = false, refresh_token = NULL WHERE id = $1',
      [id]
    );
  }
}

export class PgRoleRepository implements RoleRepository {
  constructor(private readonly db: Queryable) {}

  async findByName(name: string): Promise<Role | null> {
    const result = await this.db.query<Role>('SELECT * FROM roles WHERE name = $1', [name]);
    return result.rows[0] ?? null;
  }

  async findNamesByUserId(userId: number): Promise<string[]> {
    const result = await this.db.query<{ name: string }>(
      `SELECT r.name
       FROM user_roles ur
       JOIN roles r ON r.id = ur.role_id
       WHERE ur.user_id = $1
       ORDER BY r.name ASC`,
      [userId]
    );
    return result.rows.map(row => row.name);
  }
}

export class PgUserRoleRepository implements UserRoleRepository {
  constructor(private readonly db: Queryable) {}

  async find(userId: number, roleId: number): Promise<UserRole | null> {
    const result = await this.db.query<UserRole>(
      'SELECT * FROM user_roles WHERE user_id = $1 AND role_id = $2',
      [userId, roleId]
    );
    return result.rows[0] ?? null;
  }

  async create(userId: number, roleId: number, assignedBy: number | null): Promise<UserRole> {
    const result = await this.db.query<UserRole>(
      'INSERT INTO user_roles (user_id, role_id, assigned_by) VALUES ($1, $2, $3) RETURNING *',
      [userId, roleId, assignedBy]
    );
    return result.rows[0];
  }

  async delete(userId: number, roleId: number): Promise<void> {
    await this.db.query('DELETE FROM user_roles WHERE user_id = $1 AND role_id = $2', [userId, roleId]);
  }

  async deleteByUserId(userId: number): Promise<void> {
    await this.db.query('DELETE FROM user_roles WHERE user_id = $1', [userId]);
  }
}
