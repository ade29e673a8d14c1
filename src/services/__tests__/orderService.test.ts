import { NotFoundError, ValidationError } from '../../lib/errors';
import { MemoryStore } from '../../__tests__/helpers/memoryStore';
import { FIXED_NOW, seedCategory, seedMenuItem, seedUser } from '../../__tests__/helpers/testApp';
import { ORDER_STATUS, Principal } from '../../types/domain';
import { CartService } from '../cartService';
import { convertCartToOrder } from '../orderConverter';
import { OrderService, statusFromName } from '../orderService';
import { RoleService, toPrincipal } from '../roles';

describe('OrderService', () => {
  let store: MemoryStore;
  let cart: CartService;
  let orders: OrderService;
  let customer: Principal;
  let otherCustomer: Principal;
  let crew: Principal;
  let manager: Principal;
  let burgerId: number;
  let friesId: number;

  beforeEach(async () => {
    store = new MemoryStore();
    cart = new CartService(store);
    orders = new OrderService(store, new RoleService(store.users), () => FIXED_NOW);

    const c = await seedUser(store, 'carol');
    const o = await seedUser(store, 'oscar');
    const d = await seedUser(store, 'dave', ['delivery-crew']);
    const m = await seedUser(store, 'mia', ['manager']);
    customer = toPrincipal(c.user, 'uid-carol');
    otherCustomer = toPrincipal(o.user, 'uid-oscar');
    crew = toPrincipal(d.user, 'uid-dave');
    manager = toPrincipal(m.user, 'uid-mia');

    const mains = await seedCategory(store, 'Mains');
    burgerId = (await seedMenuItem(store, mains, 'Burger', '10.00')).id;
    friesId = (await seedMenuItem(store, mains, 'Fries', '2.50')).id;
  });

  async function placeOrder(who: Principal) {
    await cart.add(who, { menuItemId: burgerId, quantity: 2 });
    await cart.add(who, { menuItemId: friesId, quantity: 3 });
    return orders.create(who);
  }

  describe('create', () => {
    test('snapshots every cart line and empties the cart', async () => {
      const order = await placeOrder(customer);

      expect(order).toMatchObject({
        userId: customer.id,
        deliveryCrewId: null,
        status: ORDER_STATUS.pending,
        totalCents: 2750,
        createdAt: FIXED_NOW,
      });
      expect(order.items.map((i) => [i.menuItemTitle, i.quantity, i.unitPriceCents, i.priceCents])).toEqual([
        ['Burger', 2, 1000, 2000],
        ['Fries', 3, 250, 750],
      ]);
      expect(await store.cart.findForUser(customer.id)).toEqual([]);
    });

    test('later menu price changes do not touch the order', async () => {
      const order = await placeOrder(customer);
      await store.menuItems.update(burgerId, { priceCents: 9900 });
      const stored = await orders.retrieve(customer, order.id);
      expect(stored.totalCents).toBe(2750);
      expect(stored.items[0].unitPriceCents).toBe(1000);
    });

    test('an empty cart is rejected without creating an order', async () => {
      await expect(orders.create(customer)).rejects.toThrow(ValidationError);
      expect(await store.orders.findAll()).toEqual([]);
    });

    test('a failure while clearing the cart rolls the order back', async () => {
      await cart.add(customer, { menuItemId: burgerId, quantity: 1 });
      jest.spyOn(store.cart, 'clearForUser').mockRejectedValueOnce(new Error('write conflict'));

      await expect(orders.create(customer)).rejects.toThrow('write conflict');

      expect(await store.orders.findAll()).toEqual([]);
      expect(await store.cart.findForUser(customer.id)).toHaveLength(1);
    });
  });

  describe('list and retrieve', () => {
    test('customers see only their own orders', async () => {
      const mine = await placeOrder(customer);
      const theirs = await placeOrder(otherCustomer);

      expect((await orders.list(customer)).map((o) => o.id)).toEqual([mine.id]);
      await expect(orders.retrieve(customer, theirs.id)).rejects.toThrow(NotFoundError);
    });

    test('delivery crew sees only assigned orders', async () => {
      const first = await placeOrder(customer);
      await placeOrder(otherCustomer);
      await orders.update(manager, first.id, { deliveryCrewId: crew.id });

      expect((await orders.list(crew)).map((o) => o.id)).toEqual([first.id]);
    });

    test('managers see everything and may filter and sort', async () => {
      const first = await placeOrder(customer);
      await cart.add(otherCustomer, { menuItemId: burgerId, quantity: 5 });
      const second = await orders.create(otherCustomer);
      await orders.update(manager, first.id, { deliveryCrewId: crew.id, status: ORDER_STATUS.delivered });

      expect((await orders.list(manager)).map((o) => o.id)).toEqual([first.id, second.id]);
      expect((await orders.list(manager, { status: ORDER_STATUS.pending })).map((o) => o.id)).toEqual([second.id]);
      expect((await orders.list(manager, { userId: customer.id })).map((o) => o.id)).toEqual([first.id]);
      expect(
        (await orders.list(manager, { sort: { field: 'total', direction: -1 } })).map((o) => o.totalCents)
      ).toEqual([5000, 2750]);
    });

    test('filters are ignored for non-managers', async () => {
      const mine = await placeOrder(customer);
      const listed = await orders.list(customer, { userId: otherCustomer.id, status: ORDER_STATUS.delivered });
      expect(listed.map((o) => o.id)).toEqual([mine.id]);
    });
  });

  describe('update', () => {
    test('unknown orders are not found, whoever asks', async () => {
      await expect(orders.update(customer, 404, { status: 1 })).rejects.toThrow(NotFoundError);
    });

    test('the assigned user must belong to the delivery crew', async () => {
      const order = await placeOrder(customer);
      let caught: unknown;
      try {
        await orders.update(manager, order.id, { deliveryCrewId: otherCustomer.id });
      } catch (err) {
        caught = err;
      }
      expect(caught instanceof ValidationError && caught.fields).toEqual({
        delivery_crew: [`User with id '${otherCustomer.id}' is not a member of the Delivery Crew group.`],
      });
      expect((await store.orders.findById(order.id))?.deliveryCrewId).toBeNull();
    });

    test('assign then deliver', async () => {
      const order = await placeOrder(customer);
      const assigned = await orders.update(manager, order.id, { deliveryCrewId: crew.id });
      expect(assigned.deliveryCrewId).toBe(crew.id);
      const delivered = await orders.update(crew, order.id, { status: ORDER_STATUS.delivered });
      expect(delivered.status).toBe(ORDER_STATUS.delivered);
    });
  });
});

describe('convertCartToOrder', () => {
  test('uses a placeholder title for a menu item deleted mid-flight', async () => {
    const store = new MemoryStore();
    const { user } = await seedUser(store, 'carol');
    await store.cart.insert({ userId: user.id, menuItemId: 77, quantity: 1, unitPriceCents: 300, priceCents: 300 });

    const order = await store.transaction((tx) => convertCartToOrder(tx, user.id, FIXED_NOW));

    expect(order.items).toEqual([
      { id: 1, menuItemId: 77, menuItemTitle: 'Menu item 77', quantity: 1, unitPriceCents: 300, priceCents: 300 },
    ]);
    expect(order.totalCents).toBe(300);
  });

  test('rejects a total above 9999.99 without writing anything', async () => {
    const store = new MemoryStore();
    const { user } = await seedUser(store, 'carol');
    await store.cart.insert({ userId: user.id, menuItemId: 1, quantity: 1, unitPriceCents: 900_000, priceCents: 900_000 });
    await store.cart.insert({ userId: user.id, menuItemId: 2, quantity: 1, unitPriceCents: 900_000, priceCents: 900_000 });

    const attempt = store.transaction((tx) => convertCartToOrder(tx, user.id, FIXED_NOW));

    await expect(attempt).rejects.toThrow(ValidationError);
    await expect(attempt).rejects.toMatchObject({
      fields: { cart: ['Order total (18000.00) would exceed maximum allowed value of 9999.99.'] },
    });
    expect(await store.orders.findAll()).toEqual([]);
    expect(await store.cart.findForUser(user.id)).toHaveLength(2);
  });

  test('accepts a total of exactly 9999.99', async () => {
    const store = new MemoryStore();
    const { user } = await seedUser(store, 'carol');
    await store.cart.insert({ userId: user.id, menuItemId: 1, quantity: 1, unitPriceCents: 900_000, priceCents: 900_000 });
    await store.cart.insert({ userId: user.id, menuItemId: 2, quantity: 3, unitPriceCents: 33_333, priceCents: 99_999 });

    const order = await store.transaction((tx) => convertCartToOrder(tx, user.id, FIXED_NOW));

    expect(order.totalCents).toBe(999_999);
  });
});

describe('statusFromName', () => {
  test('maps names case-sensitively', () => {
    expect(statusFromName('pending')).toBe(0);
    expect(statusFromName('delivered')).toBe(1);
    expect(statusFromName('Delivered')).toBeUndefined();
    expect(statusFromName(undefined)).toBeUndefined();
  });
});
