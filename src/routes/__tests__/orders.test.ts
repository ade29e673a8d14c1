/**
 * HTTP tests for /api/orders
 */
import request from 'supertest';
import { FIXED_NOW, buildTestApp, seedCategory, seedMenuItem, seedUser, SeededUser, TestApp } from '../../__tests__/helpers/testApp';

describe('Order Routes', () => {
  let t: TestApp;
  let customer: SeededUser;
  let otherCustomer: SeededUser;
  let crew: SeededUser;
  let otherCrew: SeededUser;
  let manager: SeededUser;
  let burgerId: number;
  let friesId: number;

  beforeEach(async () => {
    t = buildTestApp();
    customer = await seedUser(t.store, 'carol');
    otherCustomer = await seedUser(t.store, 'oscar');
    crew = await seedUser(t.store, 'yusuf', ['delivery-crew']);
    otherCrew = await seedUser(t.store, 'zara', ['delivery-crew']);
    manager = await seedUser(t.store, 'mia', ['manager']);
    const mains = await seedCategory(t.store, 'Mains');
    burgerId = (await seedMenuItem(t.store, mains, 'Burger', '10.00')).id;
    friesId = (await seedMenuItem(t.store, mains, 'Fries', '2.50')).id;
  });

  async function placeOrder(who: SeededUser): Promise<number> {
    await request(t.app).post('/api/cart').set(who.auth).send({ menuitem: burgerId, quantity: 1 });
    await request(t.app).post('/api/cart').set(who.auth).send({ menuitem: friesId, quantity: 2 });
    const response = await request(t.app).post('/api/orders').set(who.auth);
    expect(response.status).toBe(201);
    return response.body.id;
  }

  function patch(who: SeededUser, id: number, body: object) {
    return request(t.app).patch(`/api/orders/${id}`).set(who.auth).send(body);
  }

  describe('POST /api/orders', () => {
    test('should convert the cart into an order', async () => {
      await request(t.app).post('/api/cart').set(customer.auth).send({ menuitem: burgerId, quantity: 1 });
      await request(t.app).post('/api/cart').set(customer.auth).send({ menuitem: friesId, quantity: 2 });

      const response = await request(t.app).post('/api/orders').set(customer.auth);

      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        id: 1,
        user: customer.user.id,
        delivery_crew: null,
        status: 0,
        total: '15.00',
        created: FIXED_NOW.toISOString(),
        order_items: [
          { id: 1, menuitem: burgerId, menuitem_title: 'Burger', quantity: 1, unit_price: '10.00', price: '10.00' },
          { id: 2, menuitem: friesId, menuitem_title: 'Fries', quantity: 2, unit_price: '2.50', price: '5.00' },
        ],
      });
      expect((await request(t.app).get('/api/cart').set(customer.auth)).body).toEqual([]);
    });

    test('should reject an empty cart', async () => {
      const response = await request(t.app).post('/api/orders').set(customer.auth);
      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: 'Validation failed',
        fields: { cart: ['Cannot create order from empty cart.'] },
      });
      expect(await t.store.orders.findAll()).toEqual([]);
    });

    test('should reject a cart whose total exceeds 9999.99 and keep the cart', async () => {
      const specials = await seedCategory(t.store, 'Specials');
      const platter = await seedMenuItem(t.store, specials, 'Platter', '9000.00');
      const feast = await seedMenuItem(t.store, specials, 'Feast', '9000.00');
      await request(t.app).post('/api/cart').set(customer.auth).send({ menuitem: platter.id, quantity: 1 });
      await request(t.app).post('/api/cart').set(customer.auth).send({ menuitem: feast.id, quantity: 1 });
      const cartBefore = (await request(t.app).get('/api/cart').set(customer.auth)).body;

      const response = await request(t.app).post('/api/orders').set(customer.auth);

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: 'Validation failed',
        fields: { cart: ['Order total (18000.00) would exceed maximum allowed value of 9999.99.'] },
      });
      expect(await t.store.orders.findAll()).toEqual([]);
      expect(cartBefore).toHaveLength(2);
      expect((await request(t.app).get('/api/cart').set(customer.auth)).body).toEqual(cartBefore);
    });

    test('should accept a total of exactly 9999.99', async () => {
      const specials = await seedCategory(t.store, 'Specials');
      const platter = await seedMenuItem(t.store, specials, 'Platter', '9000.00');
      const wine = await seedMenuItem(t.store, specials, 'Wine', '999.99');
      await request(t.app).post('/api/cart').set(customer.auth).send({ menuitem: platter.id, quantity: 1 });
      await request(t.app).post('/api/cart').set(customer.auth).send({ menuitem: wine.id, quantity: 1 });

      const response = await request(t.app).post('/api/orders').set(customer.auth);

      expect(response.status).toBe(201);
      expect(response.body.total).toBe('9999.99');
    });
  });

  describe('GET /api/orders', () => {
    test('should scope the list to the caller', async () => {
      const mine = await placeOrder(customer);
      await placeOrder(otherCustomer);

      const response = await request(t.app).get('/api/orders').set(customer.auth);

      expect(response.status).toBe(200);
      expect(response.body.map((o: { id: number }) => o.id)).toEqual([mine]);
    });

    test('should let a manager filter by status and user', async () => {
      const first = await placeOrder(customer);
      const second = await placeOrder(otherCustomer);
      await patch(manager, first, { delivery_crew: crew.user.id, status: 1 });

      const delivered = await request(t.app).get('/api/orders?status=delivered').set(manager.auth);
      expect(delivered.body.map((o: { id: number }) => o.id)).toEqual([first]);

      const byUser = await request(t.app).get(`/api/orders?user_id=${otherCustomer.user.id}`).set(manager.auth);
      expect(byUser.body.map((o: { id: number }) => o.id)).toEqual([second]);

      const unknownStatus = await request(t.app).get('/api/orders?status=Delivered').set(manager.auth);
      expect(unknownStatus.body).toHaveLength(2);

      const descending = await request(t.app).get('/api/orders?ordering=-id').set(manager.auth);
      expect(descending.body.map((o: { id: number }) => o.id)).toEqual([second, first]);
    });

    test('should ignore manager filters from a customer', async () => {
      const mine = await placeOrder(customer);
      await placeOrder(otherCustomer);
      const response = await request(t.app).get(`/api/orders?user_id=${otherCustomer.user.id}`).set(customer.auth);
      expect(response.body.map((o: { id: number }) => o.id)).toEqual([mine]);
    });
  });

  describe('GET /api/orders/:id', () => {
    test('should hide another user order', async () => {
      const theirs = await placeOrder(otherCustomer);
      const response = await request(t.app).get(`/api/orders/${theirs}`).set(customer.auth);
      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Order not found' });
    });

    test('should reject a non-integer id', async () => {
      const response = await request(t.app).get('/api/orders/first').set(customer.auth);
      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'Invalid order ID format: first' });
    });

    test('should show the assigned crew its order', async () => {
      const id = await placeOrder(customer);
      await patch(manager, id, { delivery_crew: crew.user.id });
      expect((await request(t.app).get(`/api/orders/${id}`).set(crew.auth)).status).toBe(200);
      expect((await request(t.app).get(`/api/orders/${id}`).set(otherCrew.auth)).status).toBe(404);
    });
  });

  describe('PATCH /api/orders/:id', () => {
    test('manager assigns a delivery crew', async () => {
      const id = await placeOrder(customer);
      const response = await patch(manager, id, { delivery_crew: crew.user.id });
      expect(response.status).toBe(200);
      expect(response.body.delivery_crew).toBe(crew.user.id);
      expect(response.body.status).toBe(0);
    });

    test('customer cannot assign a delivery crew', async () => {
      const id = await placeOrder(customer);
      const response = await patch(customer, id, { delivery_crew: crew.user.id });
      expect(response.status).toBe(403);
      expect(response.body).toEqual({ error: 'Only managers can assign a delivery crew to an order.' });
      expect((await t.store.orders.findById(id))?.deliveryCrewId).toBeNull();
    });

    test('assigned crew marks the order delivered; other crew cannot', async () => {
      const id = await placeOrder(customer);
      await patch(manager, id, { delivery_crew: crew.user.id });

      const denied = await patch(otherCrew, id, { status: 1 });
      expect(denied.status).toBe(403);

      const response = await patch(crew, id, { status: 1 });
      expect(response.status).toBe(200);
      expect(response.body.status).toBe(1);
    });

    test('manager cannot deliver an unassigned order', async () => {
      const id = await placeOrder(customer);
      const response = await patch(manager, id, { status: 1 });
      expect(response.status).toBe(400);
      expect(response.body.fields).toEqual({
        status: ['Cannot mark an order as delivered before a delivery crew is assigned.'],
      });
    });

    test('manager may assign and deliver in one request', async () => {
      const id = await placeOrder(customer);
      const response = await patch(manager, id, { delivery_crew: crew.user.id, status: 1 });
      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ delivery_crew: crew.user.id, status: 1 });
    });

    test('a delivered order can no longer be changed', async () => {
      const id = await placeOrder(customer);
      await patch(manager, id, { delivery_crew: crew.user.id, status: 1 });

      const response = await patch(manager, id, { delivery_crew: otherCrew.user.id });
      expect(response.status).toBe(405);
      expect(response.headers.allow).toBe('GET');
      expect((await patch(customer, id, { status: 1 })).status).toBe(403);
    });

    test('delivery_crew must be a member of the delivery crew', async () => {
      const id = await placeOrder(customer);
      const response = await patch(manager, id, { delivery_crew: otherCustomer.user.id });
      expect(response.status).toBe(400);
      expect(response.body.fields).toEqual({
        delivery_crew: [`User with id '${otherCustomer.user.id}' is not a member of the Delivery Crew group.`],
      });
    });

    test.each([
      [{}, { non_field_errors: ['Provide delivery_crew and/or status.'] }],
      [{ status: 0 }, { status: ['Only status 1 (delivered) can be set.'] }],
      [{ status: 1, total: '0.00' }, { total: ['This field is not allowed.'] }],
    ])('rejects body %p', async (body, fields) => {
      const id = await placeOrder(customer);
      const response = await patch(manager, id, body);
      expect(response.status).toBe(400);
      expect(response.body.fields).toEqual(fields);
    });

    test('unknown order ids are not found', async () => {
      const response = await patch(customer, 999, { status: 1 });
      expect(response.status).toBe(404);
    });
  });

  test.each(['put', 'delete'] as const)('%s on an order is not allowed', async (method) => {
    const id = await placeOrder(customer);
    const response = await request(t.app)[method](`/api/orders/${id}`).set(manager.auth).send({ status: 1 });
    expect(response.status).toBe(405);
    expect(response.headers.allow).toBe('GET, PATCH');
  });
});
