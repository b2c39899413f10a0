import { describe, it, expect, beforeEach } from '@jest/globals';
import { OrderFulfillmentService } from '../../modules/orders/orders.service';
import { ActingUser } from '../../types/request.types';
import {
  ConflictError,
  ForbiddenError,
  InvalidStateError,
  NotFoundError,
  UnauthorizedError,
  ValidationFailedError,
} from '../../utils/errors';
import { MemoryDataSource } from '../support/memory-data-source';
import {
  TEST_PASSWORD,
  buildDetail,
  buildNewOrder,
  createTestServices,
  seedOrder,
  seedUser,
} from '../support/fixtures';

const FIXED_NOW = new Date('2026-03-02T09:30:00Z');

const failure = (promise: Promise<unknown>): Promise<unknown> =>
  promise.then(
    () => {
      throw new Error('expected the call to fail');
    },
    (error: unknown) => error
  );

describe('OrderFulfillmentService', () => {
  let ds: MemoryDataSource;
  let orders: OrderFulfillmentService;
  let coordinator: ActingUser;
  let picker: ActingUser;
  let otherPicker: ActingUser;
  let admin: ActingUser;

  beforeEach(async () => {
    ds = new MemoryDataSource();
    const services = createTestServices(ds);
    orders = new OrderFulfillmentService(ds, services.guard, services.auth, () => FIXED_NOW);

    coordinator = await seedUser(ds, 'coord', ['coordinator']);
    picker = await seedUser(ds, 'picker1', ['picker']);
    otherPicker = await seedUser(ds, 'picker2', ['picker']);
    admin = await seedUser(ds, 'admin1', ['admin']);
  });

  describe('assignPicker', () => {
    it('moves a ready order into picking process', async () => {
      const order = await seedOrder(ds, 'A');

      const updated = await orders.assignPicker(order.id, picker.id, coordinator);

      expect(updated).toMatchObject({
        processing_status: 'picking process',
        picked_by: picker.id,
        assigned_by: coordinator.id,
        assigned_at: FIXED_NOW,
      });
    });

    it('lets superadmin assign', async () => {
      const superadmin = await seedUser(ds, 'root', ['superadmin']);
      const order = await seedOrder(ds, 'A');

      const updated = await orders.assignPicker(order.id, picker.id, superadmin);
      expect(updated.assigned_by).toBe(superadmin.id);
    });

    it('re-assigns an order that already finished picking', async () => {
      const order = await seedOrder(ds, 'A', { processing_status: 'picking complete' });

      const updated = await orders.assignPicker(order.id, otherPicker.id, coordinator);
      expect(updated.processing_status).toBe('picking process');
      expect(updated.picked_by).toBe(otherPicker.id);
    });

    it('fails with NotFoundError for an unknown order', async () => {
      await expect(orders.assignPicker(999, picker.id, coordinator)).rejects.toThrow(NotFoundError);
      await expect(orders.assignPicker(999, picker.id, coordinator)).rejects.toThrow('Order not found');
    });

    it('fails with NotFoundError for an unknown picker before checking rank', async () => {
      const order = await seedOrder(ds, 'A');

      const error = await failure(orders.assignPicker(order.id, 999, admin));
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ message: 'Picker not found' });
    });

    it('refuses callers below coordinator rank', async () => {
      const order = await seedOrder(ds, 'A');

      const error = await failure(orders.assignPicker(order.id, picker.id, admin));
      expect(error).toBeInstanceOf(ForbiddenError);
      expect(error).toMatchObject({ message: 'Coordinator rank or higher is required' });
      expect((await ds.repositories.orders.findById(order.id))?.processing_status).toBe('ready to pick');
    });

    it('checks rank before order status', async () => {
      const order = await seedOrder(ds, 'A', { processing_status: 'completed' });

      await expect(orders.assignPicker(order.id, picker.id, admin)).rejects.toThrow(ForbiddenError);
    });

    it('refuses everyone when the rank table has no coordinator', async () => {
      const partial = createTestServices(ds, { superadmin: 9, picker: 2, guest: 1 });
      const order = await seedOrder(ds, 'A');

      await expect(partial.orders.assignPicker(order.id, picker.id, { id: 999, username: 'nobody', roles: [] })).rejects.toThrow(
        ForbiddenError
      );
      expect((await ds.repositories.orders.findById(order.id))?.processing_status).toBe('ready to pick');
    });

    it.each(['picking process', 'qc process', 'completed'])('refuses status %s', async (status) => {
      const order = await seedOrder(ds, 'A', { processing_status: status });

      const error = await failure(orders.assignPicker(order.id, picker.id, coordinator));
      expect(error).toBeInstanceOf(InvalidStateError);
      expect(error).toMatchObject({
        status,
        message: `Cannot assign a picker to order with status '${status}'`,
      });
    });

    it('lets exactly one of two racing assignments win', async () => {
      const order = await seedOrder(ds, 'A');

      const results = await Promise.allSettled([
        orders.assignPicker(order.id, picker.id, coordinator),
        orders.assignPicker(order.id, otherPicker.id, coordinator),
      ]);

      const fulfilled = results.filter(result => result.status === 'fulfilled');
      const rejected = results.filter(
        (result): result is PromiseRejectedResult => result.status === 'rejected'
      );
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(InvalidStateError);
      expect(rejected[0].reason).toMatchObject({ status: 'picking process' });

      const stored = await ds.repositories.orders.findById(order.id);
      expect(stored?.picked_by).toBe(picker.id);
    });
  });

  describe('pick', () => {
    it.each(['ready to pick', 'pending picking'])('takes an order in %s', async (status) => {
      const order = await seedOrder(ds, 'A', { processing_status: status });

      const updated = await orders.pick(order.id, picker);

      expect(updated).toMatchObject({
        processing_status: 'picking process',
        picked_by: picker.id,
        picked_at: FIXED_NOW,
      });
    });

    it('refuses an order already being picked', async () => {
      const order = await seedOrder(ds, 'A');
      await orders.pick(order.id, picker);

      const error = await failure(orders.pick(order.id, otherPicker));
      expect(error).toBeInstanceOf(InvalidStateError);
      expect(error).toMatchObject({ message: "Cannot pick order with status 'picking process'" });
    });

    it('serializes racing pickers', async () => {
      const order = await seedOrder(ds, 'A');

      const results = await Promise.allSettled([orders.pick(order.id, picker), orders.pick(order.id, otherPicker)]);

      expect(results.map(result => result.status).sort()).toEqual(['fulfilled', 'rejected']);
      expect((await ds.repositories.orders.findById(order.id))?.picked_by).toBe(picker.id);
    });
  });

  describe('completePicking', () => {
    it('completes the order and records one picked order', async () => {
      const order = await seedOrder(ds, 'A');
      await orders.pick(order.id, picker);

      const result = await orders.completePicking(order.id, picker);

      expect(result.order.processing_status).toBe('picking complete');
      expect(result.pickedOrder).toMatchObject({ order_id: order.id, picked_by: picker.id });
      expect(await ds.repositories.pickedOrders.findByOrderId(order.id)).toHaveLength(1);
    });

    it('fills picked_at for assigned orders', async () => {
      const order = await seedOrder(ds, 'A');
      await orders.assignPicker(order.id, picker.id, coordinator);
      expect((await ds.repositories.orders.findById(order.id))?.picked_at).toBeNull();

      const result = await orders.completePicking(order.id, picker);
      expect(result.order.picked_at).toEqual(FIXED_NOW);
    });

    it('refuses anyone but the picker holding the order', async () => {
      const order = await seedOrder(ds, 'A');
      await orders.pick(order.id, picker);

      const error = await failure(orders.completePicking(order.id, otherPicker));
      expect(error).toBeInstanceOf(ForbiddenError);
      expect(error).toMatchObject({ message: 'Only the assigned picker can complete this order' });
      expect(await ds.repositories.pickedOrders.findByOrderId(order.id)).toHaveLength(0);
      expect((await ds.repositories.orders.findById(order.id))?.processing_status).toBe('picking process');
    });

    it('refuses a second completion', async () => {
      const order = await seedOrder(ds, 'A');
      await orders.pick(order.id, picker);
      await orders.completePicking(order.id, picker);

      await expect(orders.completePicking(order.id, picker)).rejects.toThrow(
        "Cannot complete picking of order with status 'picking complete'"
      );
      expect(await ds.repositories.pickedOrders.findByOrderId(order.id)).toHaveLength(1);
    });

    it('checks status before ownership', async () => {
      const order = await seedOrder(ds, 'A');

      await expect(orders.completePicking(order.id, otherPicker)).rejects.toThrow(InvalidStateError);
    });
  });

  describe('setPending', () => {
    it('returns the order to the pool and clears attribution', async () => {
      const order = await seedOrder(ds, 'A');
      await orders.assignPicker(order.id, picker.id, coordinator);

      const updated = await orders.setPending(order.id, coordinator);

      expect(updated).toMatchObject({
        processing_status: 'pending picking',
        pending_by: coordinator.id,
        pending_at: FIXED_NOW,
        picked_by: null,
        assigned_by: null,
        assigned_at: null,
      });
    });

    it('allows another picker to take the order afterwards', async () => {
      const order = await seedOrder(ds, 'A');
      await orders.pick(order.id, picker);
      await orders.setPending(order.id, coordinator);

      const updated = await orders.pick(order.id, otherPicker);
      expect(updated.picked_by).toBe(otherPicker.id);
    });

    it('refuses orders that are not being picked', async () => {
      const order = await seedOrder(ds, 'A');

      await expect(orders.setPending(order.id, coordinator)).rejects.toThrow(
        "Cannot set pending order with status 'ready to pick'"
      );
    });
  });

  describe('setPendingWithApproval', () => {
    it('records the picker once a coordinator approves', async () => {
      const order = await seedOrder(ds, 'A');
      await orders.pick(order.id, picker);

      const updated = await orders.setPendingWithApproval(order.id, picker, {
        username: 'coord',
        password: TEST_PASSWORD,
      });

      expect(updated.processing_status).toBe('pending picking');
      expect(updated.pending_by).toBe(picker.id);
    });

    it('rejects wrong coordinator credentials and leaves the order alone', async () => {
      const order = await seedOrder(ds, 'A');
      await orders.pick(order.id, picker);

      const error = await failure(
        orders.setPendingWithApproval(order.id, picker, { username: 'coord', password: 'wrong-password' })
      );
      expect(error).toBeInstanceOf(UnauthorizedError);
      expect(error).toMatchObject({ message: 'Invalid coordinator credentials' });
      expect((await ds.repositories.orders.findById(order.id))?.processing_status).toBe('picking process');
    });

    it('rejects an approver without coordinator rank', async () => {
      const order = await seedOrder(ds, 'A');
      await orders.pick(order.id, picker);

      const error = await failure(
        orders.setPendingWithApproval(order.id, picker, { username: 'admin1', password: TEST_PASSWORD })
      );
      expect(error).toBeInstanceOf(ForbiddenError);
      expect(error).toMatchObject({ message: 'Approver does not hold coordinator rank' });
    });
  });

  describe('updateOrder', () => {
    const header = {
      tracking: 'TRK-A',
      channel: 'Lazada',
      store: 'Second Store',
      buyer: 'New Buyer',
      address: '2 Test Street',
      courier: 'J&T',
      sent_before: new Date(2026, 2, 5, 17, 0),
    };

    it('replaces the header and reconciles details', async () => {
      const order = await seedOrder(ds, 'A', {}, [
        buildDetail({ sku: 'SKU-RED' }),
        buildDetail({ sku: 'SKU-BLUE', variant: 'Blue' }),
      ]);
      const [red, blue] = await ds.repositories.orders.findDetails(order.id);

      const updated = await orders.updateOrder(
        order.id,
        {
          ...header,
          tracking: 'TRK-A-NEW',
          details: [
            { id: red.id, ...buildDetail({ sku: 'SKU-RED', quantity: 5 }) },
            { id: 0, ...buildDetail({ sku: 'SKU-GOLD', variant: 'Gold', price: 20000 }) },
          ],
        },
        admin
      );

      expect(updated).toMatchObject({
        tracking: 'TRK-A-NEW',
        order_ginee_id: 'GINEE-A',
        channel: 'Lazada',
        courier: 'J&T',
        sent_before: new Date(2026, 2, 5, 17, 0),
        event_status: 'changed',
        changed_by: admin.id,
        changed_at: FIXED_NOW,
      });
      expect(updated.details.map(detail => [detail.sku, detail.quantity, detail.price])).toEqual([
        ['SKU-RED', 5, 15000],
        ['SKU-GOLD', 2, 20000],
      ]);
      expect(updated.details[0].id).toBe(red.id);
      expect(updated.details.some(detail => detail.id === blue.id)).toBe(false);
    });

    it('rolls back every detail change when one detail id is unknown', async () => {
      const order = await seedOrder(ds, 'A', {}, [buildDetail({ sku: 'SKU-RED' }), buildDetail({ sku: 'SKU-BLUE' })]);

      const error = await failure(
        orders.updateOrder(
          order.id,
          {
            ...header,
            details: [
              { id: 0, ...buildDetail({ sku: 'SKU-GOLD' }) },
              { id: 9999, ...buildDetail({ sku: 'SKU-RED' }) },
            ],
          },
          admin
        )
      );

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ message: 'Order detail not found' });
      const details = await ds.repositories.orders.findDetails(order.id);
      expect(details.map(detail => detail.sku)).toEqual(['SKU-RED', 'SKU-BLUE']);
      expect((await ds.repositories.orders.findById(order.id))?.event_status).toBeNull();
    });

    it('refuses an empty detail list', async () => {
      const order = await seedOrder(ds, 'A');

      await expect(orders.updateOrder(order.id, { ...header, details: [] }, admin)).rejects.toThrow(
        ValidationFailedError
      );
    });

    it('refuses a tracking owned by another order', async () => {
      await seedOrder(ds, 'B');
      const order = await seedOrder(ds, 'A');

      const error = await failure(
        orders.updateOrder(order.id, { ...header, tracking: 'TRK-B', details: [{ id: 0, ...buildDetail() }] }, admin)
      );
      expect(error).toBeInstanceOf(ConflictError);
      expect(error).toMatchObject({ message: 'Tracking is already used by another order' });
    });

    it('refuses an external id owned by another order', async () => {
      await seedOrder(ds, 'B');
      const order = await seedOrder(ds, 'A');

      await expect(
        orders.updateOrder(
          order.id,
          { ...header, order_ginee_id: 'GINEE-B', details: [{ id: 0, ...buildDetail() }] },
          admin
        )
      ).rejects.toThrow('Order ginee id is already used by another order');
    });

    it('refuses orders being picked', async () => {
      const order = await seedOrder(ds, 'A', { processing_status: 'picking process' });

      await expect(
        orders.updateOrder(order.id, { ...header, details: [{ id: 0, ...buildDetail() }] }, admin)
      ).rejects.toThrow("Cannot update order with status 'picking process'");
    });
  });

  describe('cancelOrder', () => {
    it('marks the order cancelled without touching processing status', async () => {
      const order = await seedOrder(ds, 'A', { processing_status: 'picking complete' });

      const cancelled = await orders.cancelOrder(order.id, admin);

      expect(cancelled).toMatchObject({
        processing_status: 'picking complete',
        event_status: 'cancelled',
        cancelled_by: admin.id,
        cancelled_at: FIXED_NOW,
      });
    });

    it('refuses orders in QC', async () => {
      const order = await seedOrder(ds, 'A', { processing_status: 'qc process' });

      await expect(orders.cancelOrder(order.id, admin)).rejects.toThrow(InvalidStateError);
    });

    it('blocks every later transition', async () => {
      const order = await seedOrder(ds, 'A');
      await orders.cancelOrder(order.id, admin);

      const attempts: Array<() => Promise<unknown>> = [
        () => orders.assignPicker(order.id, picker.id, coordinator),
        () => orders.pick(order.id, picker),
        () => orders.completePicking(order.id, picker),
        () => orders.setPending(order.id, coordinator),
        () => orders.updateOrder(
          order.id,
          {
            tracking: 'TRK-A',
            channel: 'Shopee',
            store: 'Main Store',
            buyer: 'Test Buyer',
            address: '1 Test Street',
            courier: 'JNE',
            sent_before: null,
            details: [{ id: 0, ...buildDetail() }],
          },
          admin
        ),
        () => orders.cancelOrder(order.id, admin),
        () => orders.duplicateOrder(order.id, admin),
      ];

      for (const attempt of attempts) {
        const error = await failure(attempt());
        expect(error).toBeInstanceOf(InvalidStateError);
        expect(error).toMatchObject({ details: expect.objectContaining({ reason: 'ORDER_CANCELLED' }) });
      }
    });

    it('still allows the complaint flag', async () => {
      const order = await seedOrder(ds, 'A');
      await orders.cancelOrder(order.id, admin);

      const updated = await orders.markComplained(order.id, true);
      expect(updated.complained).toBe(true);
    });
  });

  describe('duplicateOrder', () => {
    it('renames the source and recreates the order under its identifiers', async () => {
      const order = await seedOrder(ds, 'A', { processing_status: 'picking complete' }, [
        buildDetail({ sku: 'SKU-RED', quantity: 1 }),
        buildDetail({ sku: 'SKU-BLUE', quantity: 3 }),
      ]);

      const { original, duplicate } = await orders.duplicateOrder(order.id, admin);

      expect(original).toMatchObject({ id: order.id, order_ginee_id: 'GINEE-A-X2', tracking: 'X-TRK-A' });
      expect(duplicate).toMatchObject({
        order_ginee_id: 'GINEE-A',
        tracking: 'TRK-A',
        processing_status: 'picking complete',
        event_status: 'duplicated',
        changed_by: admin.id,
        changed_at: FIXED_NOW,
        complained: false,
      });
      expect(duplicate.id).not.toBe(order.id);
      expect(duplicate.details.map(detail => [detail.order_id, detail.sku, detail.quantity])).toEqual([
        [duplicate.id, 'SKU-RED', 1],
        [duplicate.id, 'SKU-BLUE', 3],
      ]);
      expect(await ds.repositories.orders.findDetails(order.id)).toHaveLength(2);
    });

    it('refuses to duplicate twice under the same identifiers', async () => {
      const order = await seedOrder(ds, 'A');
      const { duplicate } = await orders.duplicateOrder(order.id, admin);

      const error = await failure(orders.duplicateOrder(duplicate.id, admin));
      expect(error).toBeInstanceOf(ConflictError);
      expect(error).toMatchObject({ message: 'Order has already been duplicated' });
      expect((await ds.repositories.orders.findById(duplicate.id))?.order_ginee_id).toBe('GINEE-A');
    });

    it('refuses orders being picked', async () => {
      const order = await seedOrder(ds, 'A', { processing_status: 'picking process' });

      await expect(orders.duplicateOrder(order.id, admin)).rejects.toThrow(
        "Cannot duplicate order with status 'picking process'"
      );
    });
  });

  describe('markComplained', () => {
    it('sets and clears the flag in any status', async () => {
      const order = await seedOrder(ds, 'A', { processing_status: 'qc process' });

      expect((await orders.markComplained(order.id, true)).complained).toBe(true);
      expect((await orders.markComplained(order.id, false)).complained).toBe(false);
    });

    it('fails for an unknown order', async () => {
      await expect(orders.markComplained(404, true)).rejects.toThrow('Order not found');
    });
  });

  describe('bulkCreateOrders', () => {
    it('creates new orders, skips known ones and reports failures', async () => {
      await seedOrder(ds, 'B1');

      const result = await orders.bulkCreateOrders([
        buildNewOrder('B1'),
        buildNewOrder('B2', { details: [buildDetail(), buildDetail({ sku: 'SKU-BLUE' })] }),
        buildNewOrder('B3', { tracking: 'TRK-B1' }),
        buildNewOrder('B4', { details: [] }),
      ]);

      expect(result.summary).toEqual({ total: 4, created: 1, skipped: 1, failed: 2 });
      expect(result.skipped).toEqual([{ index: 0, order_ginee_id: 'GINEE-B1', reason: 'Order already exists' }]);
      expect(result.failed).toEqual([
        {
          index: 2,
          order_ginee_id: 'GINEE-B3',
          error: 'duplicate key value violates unique constraint "orders_tracking_key"',
        },
        { index: 3, order_ginee_id: 'GINEE-B4', error: 'Order must have at least one detail' },
      ]);
      expect(result.created).toHaveLength(1);
      expect(result.created[0]).toMatchObject({
        order_ginee_id: 'GINEE-B2',
        processing_status: 'ready to pick',
        event_status: null,
      });
      expect(result.created[0].details.map(detail => detail.sku)).toEqual(['SKU-RED', 'SKU-BLUE']);
      expect(await ds.repositories.orders.findByGineeId('GINEE-B3')).toBeNull();
    });

    it('skips a repeated external id within the same batch', async () => {
      const result = await orders.bulkCreateOrders([buildNewOrder('C1'), buildNewOrder('C1')]);

      expect(result.summary).toEqual({ total: 2, created: 1, skipped: 1, failed: 0 });
      expect(result.skipped[0].index).toBe(1);
    });
  });

  describe('getOrder', () => {
    it('attaches the catalogue product to each detail by sku', async () => {
      const product = {
        id: 500,
        sku: 'SKU-RED',
        name: 'Satin Ribbon Red',
        image: null,
        variant: 'Red',
        location: 'A-01-03',
        barcode: '8990000000001',
        created_at: new Date('2026-01-01T00:00:00Z'),
        updated_at: new Date('2026-01-01T00:00:00Z'),
      };
      ds.store.products.push(product);
      const order = await seedOrder(ds, 'A', {}, [buildDetail({ sku: 'SKU-RED' }), buildDetail({ sku: 'SKU-NONE' })]);

      const view = await orders.getOrder(order.id);

      expect(view.id).toBe(order.id);
      expect(view.details.map(detail => detail.product)).toEqual([product, null]);
    });

    it('fails for an unknown order', async () => {
      await expect(orders.getOrder(12345)).rejects.toThrow(NotFoundError);
    });
  });
});
