import { INestApplication } from '@nestjs/common';
import sharp from 'sharp';
import request from 'supertest';
import { bearer, createTestApp, loginAs } from './utils/test-app';

describe('Admin (e2e)', () => {
  let app: INestApplication;
  let adminToken: string;
  let userToken: string;

  const addToCart = async (menuItemId: number, times = 1) => {
    for (let i = 0; i < times; i++) {
      await request(app.getHttpServer())
        .post(`/cart/items/${menuItemId}/increment`)
        .set(bearer(userToken))
        .expect(200);
    }
  };

  const placeOrder = (customerName: string, customerType: string) =>
    request(app.getHttpServer())
      .post('/orders')
      .set(bearer(userToken))
      .send({ customerName, customerType })
      .expect(201);

  beforeEach(async () => {
    app = await createTestApp();
    adminToken = await loginAs(app, 'admin', 'admin123');
    userToken = await loginAs(app, 'user', 'user123');
  });

  afterEach(async () => {
    await app.close();
  });

  describe('dashboard', () => {
    it('starts with no revenue', async () => {
      const response = await request(app.getHttpServer())
        .get('/admin/dashboard')
        .set(bearer(adminToken))
        .expect(200);

      expect(response.body.stats).toEqual({
        totalOrders: 0,
        revenue: 0,
        menuItems: 8,
        averageOrder: 0,
      });
    });

    it('sums placed orders', async () => {
      await addToCart(1, 2);
      await addToCart(2);
      await placeOrder('Asha', 'TEACHER');
      await addToCart(8);
      await placeOrder('Ravi', 'STUDENT');

      const response = await request(app.getHttpServer())
        .get('/admin/dashboard')
        .set(bearer(adminToken))
        .expect(200);

      expect(response.body.stats).toEqual({
        totalOrders: 2,
        revenue: 260.66,
        menuItems: 8,
        averageOrder: 130.33,
      });
    });
  });

  describe('menu management', () => {
    it('adds a dish with its image', async () => {
      const png = await sharp({
        create: {
          width: 640,
          height: 480,
          channels: 3,
          background: { r: 120, g: 80, b: 40 },
        },
      })
        .png()
        .toBuffer();

      const response = await request(app.getHttpServer())
        .post('/admin/menu')
        .set(bearer(adminToken))
        .field('name', 'Masala Tea')
        .field('price', '25.5')
        .field('category', 'Beverage')
        .field('tags', 'hot, sweet')
        .attach('image', png, 'tea.png')
        .expect(201);

      expect(response.body.message).toBe('Added Masala Tea');
      expect(response.body.item).toEqual({
        id: 9,
        name: 'Masala Tea',
        price: 25.5,
        rating: 4,
        category: 'Beverage',
        tags: ['hot', 'sweet'],
        imageUrl: '/menu/9/image',
      });

      const image = await request(app.getHttpServer())
        .get('/menu/9/image')
        .expect(200);
      expect(image.headers['content-type']).toBe('image/jpeg');
      expect((await sharp(image.body).metadata()).width).toBe(400);
    });

    it('adds a dish without an image', async () => {
      const response = await request(app.getHttpServer())
        .post('/admin/menu')
        .set(bearer(adminToken))
        .field('name', 'Brownie')
        .field('price', '45')
        .field('category', 'Dessert')
        .field('rating', '4.8')
        .expect(201);

      expect(response.body.item).toMatchObject({
        id: 9,
        rating: 4.8,
        tags: [],
        imageUrl: null,
      });
    });

    it('needs a name and a positive price', async () => {
      const response = await request(app.getHttpServer())
        .post('/admin/menu')
        .set(bearer(adminToken))
        .field('name', 'Brownie')
        .field('price', '0')
        .expect(400);

      expect(response.body.message).toBe('Fill required fields');
    });

    it('rejects unknown categories', async () => {
      await request(app.getHttpServer())
        .post('/admin/menu')
        .set(bearer(adminToken))
        .field('name', 'Brownie')
        .field('price', '45')
        .field('category', 'Snack')
        .expect(400);
    });

    it('rejects images of other types', async () => {
      const response = await request(app.getHttpServer())
        .post('/admin/menu')
        .set(bearer(adminToken))
        .field('name', 'Brownie')
        .field('price', '45')
        .attach('image', Buffer.from('GIF89a'), 'brownie.gif')
        .expect(400);

      expect(response.body.message).toBe(
        'Image must be a png, jpg or jpeg file',
      );
    });

    it('rejects undecodable images', async () => {
      const response = await request(app.getHttpServer())
        .post('/admin/menu')
        .set(bearer(adminToken))
        .field('name', 'Brownie')
        .field('price', '45')
        .attach('image', Buffer.from('definitely not a png'), 'brownie.png')
        .expect(400);

      expect(response.body.message).toBe('Invalid image');
      await request(app.getHttpServer()).get('/menu/9').expect(404);
    });

    it('deletes a dish and takes it out of carts', async () => {
      await addToCart(1);
      await addToCart(2);

      const response = await request(app.getHttpServer())
        .delete('/admin/menu/1')
        .set(bearer(adminToken))
        .expect(200);

      expect(response.body.message).toBe('Deleted Burger');
      await request(app.getHttpServer()).get('/menu/1').expect(404);
      const cart = await request(app.getHttpServer())
        .get('/cart')
        .set(bearer(userToken))
        .expect(200);
      expect(cart.body.cart.lines.map((line: { name: string }) => line.name)).toEqual([
        'Coffee',
      ]);
    });

    it('keeps order history of a deleted dish', async () => {
      await addToCart(1);
      await placeOrder('Asha', 'STUDENT');

      await request(app.getHttpServer())
        .delete('/admin/menu/1')
        .set(bearer(adminToken))
        .expect(200);

      const history = await request(app.getHttpServer())
        .get('/orders/mine')
        .set(bearer(userToken))
        .expect(200);
      expect(history.body.orders).toHaveLength(1);
      expect(history.body.orders[0].items).toEqual([
        {
          menuItemId: 1,
          name: 'Burger',
          price: 70.23,
          quantity: 1,
          subTotal: 70.23,
        },
      ]);

      const csv = await request(app.getHttpServer())
        .get('/admin/orders/export/csv')
        .set(bearer(adminToken))
        .expect(200);
      const lines = csv.text.split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[1]).toMatch(
        /^1,Asha,Student,Burger x1,70\.23,\d{2}-\d{2}-\d{4} \d{2}:\d{2}$/,
      );
    });

    it('reports unknown dishes on delete', async () => {
      await request(app.getHttpServer())
        .delete('/admin/menu/99')
        .set(bearer(adminToken))
        .expect(404);
    });
  });

  describe('orders', () => {
    beforeEach(async () => {
      await addToCart(1, 2);
      await addToCart(2);
      await placeOrder('Asha', 'TEACHER');
      await addToCart(8);
      await placeOrder('Lee, Sam', 'STUDENT');
    });

    it('lists recent orders newest first', async () => {
      const response = await request(app.getHttpServer())
        .get('/admin/orders')
        .set(bearer(adminToken))
        .expect(200);

      expect(response.body.orders.map((order: { id: number }) => order.id)).toEqual([
        2, 1,
      ]);

      const limited = await request(app.getHttpServer())
        .get('/admin/orders?limit=1')
        .set(bearer(adminToken))
        .expect(200);
      expect(limited.body.orders).toHaveLength(1);
      expect(limited.body.orders[0].id).toBe(2);
    });

    it('deletes an order', async () => {
      const response = await request(app.getHttpServer())
        .delete('/admin/orders/1')
        .set(bearer(adminToken))
        .expect(200);

      expect(response.body.message).toBe('Order #1 deleted');
      const again = await request(app.getHttpServer())
        .delete('/admin/orders/1')
        .set(bearer(adminToken))
        .expect(404);
      expect(again.body.message).toBe('Order not found');
    });

    it('reports analytics', async () => {
      const response = await request(app.getHttpServer())
        .get('/admin/analytics')
        .set(bearer(adminToken))
        .expect(200);

      expect(response.body.analytics).toEqual({
        popularItems: [
          { name: 'Burger', quantity: 2 },
          { name: 'Coffee', quantity: 1 },
          { name: 'Ice Cream', quantity: 1 },
        ],
        customerDistribution: { teachers: 1, students: 1 },
      });
    });

    it('exports orders as csv', async () => {
      const response = await request(app.getHttpServer())
        .get('/admin/orders/export/csv')
        .set(bearer(adminToken))
        .expect(200);

      expect(response.headers['content-type']).toBe('text/csv');
      expect(response.headers['content-disposition']).toBe(
        'attachment; filename="orders.csv"',
      );
      const lines = response.text.split('\n');
      expect(lines).toHaveLength(3);
      expect(lines[0]).toBe('Order ID,Customer,Type,Items,Total,Date');
      expect(lines[1]).toMatch(
        /^1,Asha,Teacher,Burger x2; Coffee x1,210\.66,\d{2}-\d{2}-\d{4} \d{2}:\d{2}$/,
      );
      expect(lines[2]).toMatch(
        /^2,"Lee, Sam",Student,Ice Cream x1,50\.00,\d{2}-\d{2}-\d{4} \d{2}:\d{2}$/,
      );
    });

    it('exports orders as pdf', async () => {
      const response = await request(app.getHttpServer())
        .get('/admin/orders/export/pdf')
        .set(bearer(adminToken))
        .responseType('blob')
        .expect(200);

      expect(response.headers['content-type']).toBe('application/pdf');
      expect(response.headers['content-disposition']).toBe(
        'attachment; filename="orders.pdf"',
      );
      expect(Buffer.isBuffer(response.body)).toBe(true);
      expect(response.body.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    });
  });

  describe('without orders', () => {
    it('reports empty analytics', async () => {
      const response = await request(app.getHttpServer())
        .get('/admin/analytics')
        .set(bearer(adminToken))
        .expect(200);

      expect(response.body).toEqual({
        status: 200,
        message: 'No data yet',
        analytics: {
          popularItems: [],
          customerDistribution: { teachers: 0, students: 0 },
        },
      });
    });

    it('has nothing to export', async () => {
      for (const format of ['csv', 'pdf']) {
        const response = await request(app.getHttpServer())
          .get(`/admin/orders/export/${format}`)
          .set(bearer(adminToken))
          .expect(404);

        expect(response.body.message).toBe('No orders yet');
      }
    });
  });
});
