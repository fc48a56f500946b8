import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { bearer, createTestApp, loginAs } from './utils/test-app';

const names = (items: { name: string }[]) => items.map(({ name }) => name);

describe('Recommendations (e2e)', () => {
  let app: INestApplication;
  let userToken: string;

  const order = async (lines: [menuItemId: number, quantity: number][]) => {
    for (const [menuItemId, quantity] of lines) {
      await request(app.getHttpServer())
        .put(`/cart/items/${menuItemId}`)
        .set(bearer(userToken))
        .send({ quantity })
        .expect(200);
    }
    await request(app.getHttpServer())
      .post('/orders')
      .set(bearer(userToken))
      .send({ customerName: 'Asha' })
      .expect(201);
  };

  const getRecommendations = async () => {
    const response = await request(app.getHttpServer())
      .get('/recommendations')
      .expect(200);
    return response.body.recommendations;
  };

  beforeEach(async () => {
    app = await createTestApp();
    userToken = await loginAs(app, 'user', 'user123');
  });

  afterEach(async () => {
    await app.close();
  });

  it('suggests top rated and budget dishes before any order', async () => {
    const recommendations = await getRecommendations();

    expect(recommendations.popular).toEqual([]);
    expect(names(recommendations.highlyRated)).toEqual([
      'Pizza',
      'Ice Cream',
      'Burger',
    ]);
    expect(names(recommendations.budgetFriendly)).toEqual([
      'Ice Cream',
      'Fries',
      'Coffee',
    ]);
  });

  it('ranks popular dishes and refreshes after new orders', async () => {
    await order([
      [7, 3],
      [6, 1],
    ]);
    expect(names((await getRecommendations()).popular)).toEqual([
      'Salad',
      'Fries',
    ]);

    await order([[4, 5]]);
    expect(names((await getRecommendations()).popular)).toEqual([
      'Pasta',
      'Salad',
      'Fries',
    ]);
  });

  it('forgets dishes removed from the menu', async () => {
    await order([
      [7, 3],
      [6, 1],
    ]);
    await getRecommendations();
    const adminToken = await loginAs(app, 'admin', 'admin123');

    await request(app.getHttpServer())
      .delete('/admin/menu/7')
      .set(bearer(adminToken))
      .expect(200);

    expect(names((await getRecommendations()).popular)).toEqual(['Fries']);
  });
});
