import { QueryResult, QueryResultRow } from 'pg';
import { FlowType } from '../../../constants/flow.constants';
import {
  CreateOrderInput,
  Order,
  OrderDetail,
  OrderDetailInput,
  OrderPatch,
  PickedOrder,
} from '../models/order.model';
import { Product } from '../models/product.model';
import { CreateUserInput, Role, User, UserProfilePatch, UserRole } from '../models/user.model';
import { Operator, OutboundRecord, QcRecord } from '../models/tracking.model';

/**
 * Anything that runs SQL: the pool itself or a client checked out for a transaction.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface OrderRepository {
  findById(id: number): Promise<Order | null>;
  /** Re-reads the row and holds a lock on it until the transaction ends. */
  lockById(id: number): Promise<Order | null>;
  findByGineeId(orderGineeId: string): Promise<Order | null>;
  findByTracking(tracking: string): Promise<Order | null>;
  create(input: CreateOrderInput): Promise<Order>;
  update(id: number, patch: OrderPatch): Promise<Order>;
  findDetails(orderId: number): Promise<OrderDetail[]>;
  insertDetail(orderId: number, input: OrderDetailInput): Promise<OrderDetail>;
  updateDetail(detailId: number, input: OrderDetailInput): Promise<OrderDetail>;
  deleteDetail(detailId: number): Promise<void>;
}

export interface PickedOrderRepository {
  create(orderId: number, pickedBy: number): Promise<PickedOrder>;
  findByOrderId(orderId: number): Promise<PickedOrder[]>;
}

export interface ProductRepository {
  findBySkus(skus: string[]): Promise<Product[]>;
}

export interface UserRepository {
  findById(id: number): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  create(input: CreateUserInput): Promise<User>;
  /** Stores the new hash and revokes the refresh token. */
  updatePassword(id: number, passwordHash: string): Promise<void>;
  setRefreshToken(id: number, refreshToken: string | null): Promise<void>;
  /** Deactivation also revokes the refresh token. */
  setActive(id: number, isActive: boolean): Promise<User>;
  updateProfile(id: number, patch: UserProfilePatch): Promise<User>;
  softDelete(id: number): Promise<void>;
}

export interface RoleRepository {
  findByName(name: string): Promise<Role | null>;
  /** Names of every role the user currently holds. */
  findNamesByUserId(userId: number): Promise<string[]>;
}

export interface UserRoleRepository {
  find(userId: number, roleId: number): Promise<UserRole | null>;
  create(userId: number, roleId: number, assignedBy: number | null): Promise<UserRole>;
  delete(userId: number, roleId: number): Promise<void>;
  deleteByUserId(userId: number): Promise<void>;
}

export interface QcStageEntry {
  record: QcRecord;
  operator: Operator | null;
}

export interface OutboundEntry {
  record: OutboundRecord;
  operator: Operator | null;
}

export interface TrackingFilter {
  /** Inclusive lower bound on the QC record's created_at. */
  from?: Date;
  /** Exclusive upper bound on the QC record's created_at. */
  before?: Date;
  search?: string;
}

export interface FlowRepository {
  findQcEntry(type: FlowType, tracking: string): Promise<QcStageEntry | null>;
  findOutboundEntry(tracking: string): Promise<OutboundEntry | null>;
  /** Distinct non-empty trackings of the QC family, ordered ascending. */
  listTrackings(
    type: FlowType,
    filter: TrackingFilter,
    limit: number,
    offset: number
  ): Promise<{ trackings: string[]; total: number }>;
}

export interface Repositories {
  orders: OrderRepository;
  pickedOrders: PickedOrderRepository;
  products: ProductRepository;
  users: UserRepository;
  roles: RoleRepository;
  userRoles: UserRoleRepository;
  flows: FlowRepository;
}

/**
 * Entry point for services. `repositories` runs statements on their own;
 * `transaction` hands out repositories bound to a single transaction and
 * rolls everything back when `work` rejects.
 */
export interface DataSource {
  readonly repositories: Repositories;
  transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
}
