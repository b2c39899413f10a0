import bcrypt from 'bcryptjs';
import { PROCESSING_STATUS } from '../../constants/order.constants';
import {
  CreateOrderInput,
  Order,
  OrderDetailInput,
  OrderPatch,
} from '../../connections/db/models/order.model';
import { ActingUser } from '../../types/request.types';
import { NewOrderInput } from '../../modules/orders/orders.service';
import { Services, createServices } from '../../container';
import { MemoryDataSource } from './memory-data-source';

export const TEST_SECRET = 'test-secret';
export const TEST_PASSWORD = 'test-password';

// Low cost factor keeps the suite fast
export const TEST_BCRYPT_ROUNDS = 4;
const TEST_PASSWORD_HASH = bcrypt.hashSync(TEST_PASSWORD, TEST_BCRYPT_ROUNDS);

export const createTestServices = (
  dataSource: MemoryDataSource,
  roleHierarchy?: Readonly<Record<string, number>>
): Services =>
  createServices(dataSource, {
    roleHierarchy,
    tokens: { secret: TEST_SECRET, expiresIn: 3600, refreshExpiresIn: 7200 },
    bcryptRounds: TEST_BCRYPT_ROUNDS,
  });

/**
 * Creates an active user holding `roles` and returns it as an acting user.
 * Every seeded user's password is TEST_PASSWORD.
 */
export const seedUser = async (
  dataSource: MemoryDataSource,
  username: string,
  roles: string[] = []
): Promise<ActingUser> => {
  const { users, roles: roleRepo, userRoles } = dataSource.repositories;
  const user = await users.create({
    username,
    email: `${username}@example.test`,
    full_name: `${username} tester`,
    password_hash: TEST_PASSWORD_HASH,
  });

  for (const name of roles) {
    const role = await roleRepo.findByName(name);
    if (!role) {
      throw new Error(`unknown role in fixture: ${name}`);
    }
    await userRoles.create(user.id, role.id, null);
  }

  return { id: user.id, username, roles };
};

export const deactivateUser = async (dataSource: MemoryDataSource, userId: number): Promise<void> => {
  await dataSource.repositories.users.setActive(userId, false);
};

/**
 * Plain order row for the pure transition rules.
 */
export const createMockOrder = (overrides: Partial<Order> = {}): Order => ({
  id: 1,
  order_ginee_id: 'GINEE-1',
  tracking: 'TRK-1',
  processing_status: PROCESSING_STATUS.READY_TO_PICK,
  event_status: null,
  channel: 'Shopee',
  store: 'Main Store',
  buyer: 'Test Buyer',
  address: '1 Test Street',
  courier: 'JNE',
  sent_before: null,
  assigned_by: null,
  assigned_at: null,
  picked_by: null,
  picked_at: null,
  pending_by: null,
  pending_at: null,
  changed_by: null,
  changed_at: null,
  cancelled_by: null,
  cancelled_at: null,
  complained: false,
  created_at: new Date('2026-03-01T08:00:00Z'),
  updated_at: new Date('2026-03-01T08:00:00Z'),
  deleted_at: null,
  ...overrides,
});

export const buildDetail = (overrides: Partial<OrderDetailInput> = {}): OrderDetailInput => ({
  sku: 'SKU-RED',
  product_name: 'Satin Ribbon',
  variant: 'Red',
  quantity: 2,
  price: 15000,
  ...overrides,
});

export const buildOrderInput = (key: string, overrides: Partial<CreateOrderInput> = {}): CreateOrderInput => ({
  order_ginee_id: `GINEE-${key}`,
  tracking: `TRK-${key}`,
  processing_status: PROCESSING_STATUS.READY_TO_PICK,
  channel: 'Shopee',
  store: 'Main Store',
  buyer: 'Test Buyer',
  address: '1 Test Street',
  courier: 'JNE',
  sent_before: null,
  ...overrides,
});

/**
 * Inserts an order with its details, then applies `patch` to move it into
 * the state a test needs.
 */
export const seedOrder = async (
  dataSource: MemoryDataSource,
  key: string,
  patch: OrderPatch = {},
  details: OrderDetailInput[] = [buildDetail()]
): Promise<Order> => {
  const { orders } = dataSource.repositories;
  const order = await orders.create(buildOrderInput(key));
  for (const detail of details) {
    await orders.insertDetail(order.id, detail);
  }
  return Object.keys(patch).length > 0 ? orders.update(order.id, patch) : order;
};

/**
 * Intake payload as the bulk endpoint hands it to the service.
 */
export const buildNewOrder = (
  key: string,
  overrides: Partial<NewOrderInput> = {}
): NewOrderInput => ({
  order_ginee_id: `GINEE-${key}`,
  tracking: `TRK-${key}`,
  channel: 'Tokopedia',
  store: 'Main Store',
  buyer: 'Test Buyer',
  address: '1 Test Street',
  courier: 'SiCepat',
  sent_before: null,
  details: [buildDetail()],
  ...overrides,
});
