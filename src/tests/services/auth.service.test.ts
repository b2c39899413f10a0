import { describe, it, expect, beforeEach } from '@jest/globals';
import jwt from 'jsonwebtoken';
import { AuthService } from '../../modules/auth/auth.service';
import { ActingUser } from '../../types/request.types';
import { ForbiddenError, UnauthorizedError } from '../../utils/errors';
import { MemoryDataSource } from '../support/memory-data-source';
import { TEST_PASSWORD, TEST_SECRET, createTestServices, deactivateUser, seedUser } from '../support/fixtures';

describe('AuthService', () => {
  let ds: MemoryDataSource;
  let auth: AuthService;
  let coordinator: ActingUser;
  let admin: ActingUser;

  beforeEach(async () => {
    ds = new MemoryDataSource();
    auth = createTestServices(ds).auth;
    coordinator = await seedUser(ds, 'coord', ['coordinator', 'picker']);
    admin = await seedUser(ds, 'admin1', ['admin']);
  });

  describe('login', () => {
    it('issues an access and a refresh token', async () => {
      const result = await auth.login('coord', TEST_PASSWORD);

      expect(result.user).toMatchObject({ id: coordinator.id, username: 'coord', roles: ['coordinator', 'picker'] });
      expect('password_hash' in result.user).toBe(false);

      const payload = jwt.verify(result.token, TEST_SECRET);
      expect(payload).toMatchObject({ userId: coordinator.id, username: 'coord', type: 'access' });
      expect((await ds.repositories.users.findById(coordinator.id))?.refresh_token).toBe(result.refreshToken);
    });

    it('gives the same answer for an unknown user and a wrong password', async () => {
      await expect(auth.login('nobody', TEST_PASSWORD)).rejects.toThrow('Invalid username or password');
      await expect(auth.login('coord', 'wrong-password')).rejects.toThrow('Invalid username or password');
    });

    it('refuses disabled accounts', async () => {
      await deactivateUser(ds, admin.id);

      const error = await auth.login('admin1', TEST_PASSWORD).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ForbiddenError);
      expect(error).toMatchObject({ message: 'Account is disabled' });
    });
  });

  describe('resolveActingUser', () => {
    it('returns the user with the roles held right now', async () => {
      const { token } = await auth.login('coord', TEST_PASSWORD);
      expect(await auth.resolveActingUser(token)).toEqual({
        id: coordinator.id,
        username: 'coord',
        roles: ['coordinator', 'picker'],
      });

      await ds.repositories.userRoles.deleteByUserId(coordinator.id);
      expect((await auth.resolveActingUser(token)).roles).toEqual([]);
    });

    it('rejects a refresh token used as an access token', async () => {
      const { refreshToken } = await auth.login('coord', TEST_PASSWORD);

      await expect(auth.resolveActingUser(refreshToken)).rejects.toThrow('Invalid token');
    });

    it('rejects a token signed with another secret', async () => {
      const forged = jwt.sign({ userId: admin.id, username: 'admin1', type: 'access' }, 'other-secret');

      const error = await auth.resolveActingUser(forged).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(UnauthorizedError);
      expect(error).toMatchObject({ message: 'Invalid token' });
    });

    it('reports expired tokens', async () => {
      const expired = jwt.sign({ userId: admin.id, username: 'admin1', type: 'access' }, TEST_SECRET, { expiresIn: -10 });

      await expect(auth.resolveActingUser(expired)).rejects.toThrow('Token expired');
    });

    it('rejects tokens of deleted users', async () => {
      const { token } = await auth.login('admin1', TEST_PASSWORD);
      await ds.repositories.users.softDelete(admin.id);

      await expect(auth.resolveActingUser(token)).rejects.toThrow('User no longer exists');
    });
  });

  describe('refresh', () => {
    it('issues a new pair and stores the new refresh token', async () => {
      const { refreshToken } = await auth.login('coord', TEST_PASSWORD);

      const rotated = await auth.refresh(refreshToken);

      expect(await auth.resolveActingUser(rotated.token)).toMatchObject({ id: coordinator.id });
      expect((await ds.repositories.users.findById(coordinator.id))?.refresh_token).toBe(rotated.refreshToken);
    });

    it('refuses a refresh token after logout', async () => {
      const { refreshToken } = await auth.login('coord', TEST_PASSWORD);
      await auth.logout(coordinator);

      expect((await ds.repositories.users.findById(coordinator.id))?.refresh_token).toBeNull();
      await expect(auth.refresh(refreshToken)).rejects.toThrow('Refresh token has been revoked');
    });

    it('refuses an access token', async () => {
      const { token } = await auth.login('coord', TEST_PASSWORD);

      await expect(auth.refresh(token)).rejects.toThrow(UnauthorizedError);
    });
  });

  it('me returns the public profile', async () => {
    const profile = await auth.me(admin);

    expect(profile).toMatchObject({ id: admin.id, username: 'admin1', email: 'admin1@example.test', roles: ['admin'] });
    expect('refresh_token' in profile).toBe(false);
  });

  describe('verifyCoordinatorApproval', () => {
    it('accepts coordinator credentials', async () => {
      expect(await auth.verifyCoordinatorApproval({ username: 'coord', password: TEST_PASSWORD })).toEqual({
        id: coordinator.id,
        username: 'coord',
        roles: ['coordinator', 'picker'],
      });
    });

    it('accepts anyone ranked above coordinator', async () => {
      const root = await seedUser(ds, 'root', ['superadmin']);

      const approver = await auth.verifyCoordinatorApproval({ username: 'root', password: TEST_PASSWORD });
      expect(approver.id).toBe(root.id);
    });

    it('rejects a lower rank', async () => {
      await expect(auth.verifyCoordinatorApproval({ username: 'admin1', password: TEST_PASSWORD })).rejects.toThrow(
        'Approver does not hold coordinator rank'
      );
    });

    it('rejects a disabled coordinator', async () => {
      await deactivateUser(ds, coordinator.id);

      await expect(auth.verifyCoordinatorApproval({ username: 'coord', password: TEST_PASSWORD })).rejects.toThrow(
        ForbiddenError
      );
    });

    it('rejects a wrong password', async () => {
      await expect(auth.verifyCoordinatorApproval({ username: 'coord', password: 'nope' })).rejects.toThrow(
        'Invalid coordinator credentials'
      );
    });
  });
});
