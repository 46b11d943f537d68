import request from 'supertest';
import jwt from 'jsonwebtoken';
import { Application } from 'express';
import { createApp } from '../../src/app';
import config from '../../src/config';
import { InMemoryCatalogStore } from '../support/InMemoryCatalogStore';
import { generateTestToken } from '../support/fixtures';

describe('Catalog API Integration Tests', () => {
  const adminToken = generateTestToken('ADMIN');

  let store: InMemoryCatalogStore;
  let app: Application;

  beforeEach(() => {
    store = new InMemoryCatalogStore();
    app = createApp(store);
  });

  describe('Health and service info', () => {
    it('should report a healthy database', async () => {
      const response = await request(app).get('/api/v1/health');

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.data).toMatchObject({
        status: 'healthy',
        service: 'catalog-service',
        checks: { database: true }
      });
    });

    it('should return 503 when the database is down', async () => {
      store.setHealthy(false);

      const response = await request(app).get('/api/v1/health');

      expect(response.status).toBe(503);
      expect(response.body.data.status).toBe('unhealthy');
    });

    it('should describe the service at the root', async () => {
      const response = await request(app).get('/');

      expect(response.body.data).toMatchObject({ service: 'catalog-service', health: '/api/v1/health' });
    });

    it('should answer unknown routes with 404', async () => {
      const response = await request(app).get('/unknown');

      expect(response.status).toBe(404);
      expect(response.body.error).toEqual({ code: 'ROUTE_NOT_FOUND', message: 'Route GET /unknown not found' });
    });

    it('should echo or assign a request id', async () => {
      const echoed = await request(app).get('/').set('X-Request-ID', 'req-test-1');
      const assigned = await request(app).get('/');

      expect(echoed.headers['x-request-id']).toBe('req-test-1');
      expect(assigned.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  describe('Authentication', () => {
    const attempt = (authorization: string) =>
      request(app)
        .post('/api/v1/authors')
        .set('Authorization', authorization)
        .send({ name: 'Ada Marlowe' });

    it('should reject a malformed authorization header', async () => {
      const response = await attempt(`Token ${adminToken}`);

      expect(response.status).toBe(401);
      expect(response.body.error.message).toBe('Invalid authorization header format. Use: Bearer <token>');
    });

    it('should reject an expired token', async () => {
      const expired = jwt.sign(
        { userId: 'test-user-id', email: 'test@example.com', role: 'ADMIN', exp: Math.floor(Date.now() / 1000) - 60 },
        config.jwt.secret,
        { issuer: config.jwt.issuer }
      );

      const response = await attempt(`Bearer ${expired}`);

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe('TOKEN_EXPIRED');
    });

    it('should reject a token from another issuer', async () => {
      const foreign = jwt.sign({ userId: 'u', email: 'e@example.com', role: 'ADMIN' }, config.jwt.secret, {
        issuer: 'someone-else'
      });

      const response = await attempt(`Bearer ${foreign}`);

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe('INVALID_TOKEN');
    });

    it('should reject a token without a role', async () => {
      const partial = jwt.sign({ userId: 'u', email: 'e@example.com' }, config.jwt.secret, {
        issuer: config.jwt.issuer
      });

      const response = await attempt(`Bearer ${partial}`);

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe('INVALID_TOKEN');
    });

    it('should reject malformed JSON bodies', async () => {
      const response = await request(app)
        .post('/api/v1/authors')
        .set('Authorization', `Bearer ${adminToken}`)
        .set('Content-Type', 'application/json')
        .send('{"name": ');

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('BAD_REQUEST');
    });
  });

  describe('Authors and publishers', () => {
    it('should manage authors', async () => {
      const created = await request(app)
        .post('/api/v1/authors')
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ name: 'Ada Marlowe', birthDate: '1975-03-14' });

      expect(created.status).toBe(201);
      const { id } = created.body.data;

      const updated = await request(app)
        .put(`/api/v1/authors/${id}`)
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ biography: 'Writes mysteries.' });

      expect(updated.body.data).toEqual({
        id,
        name: 'Ada Marlowe',
        biography: 'Writes mysteries.',
        birthDate: '1975-03-14'
      });

      const listed = await request(app).get('/api/v1/authors');
      expect(listed.body.data).toHaveLength(1);

      await request(app).delete(`/api/v1/authors/${id}`).set('Authorization', `Bearer ${adminToken}`).expect(200);
      await request(app).get(`/api/v1/authors/${id}`).expect(404);
    });

    it('should validate publisher websites', async () => {
      const response = await request(app)
        .post('/api/v1/publishers')
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ name: 'Lantern House', website: 'not a url' });

      expect(response.status).toBe(400);
      expect(response.body.error.details).toEqual([
        { field: 'website', message: 'Website must be a valid URL' }
      ]);
    });

    it('should list publishers by name', async () => {
      for (const name of ['Zephyr Press', 'Lantern House']) {
        await request(app)
          .post('/api/v1/publishers')
          .set('Authorization', `Bearer ${adminToken}`)
          .send({ name })
          .expect(201);
      }

      const response = await request(app).get('/api/v1/publishers');

      expect(response.body.data.map((publisher: { name: string }) => publisher.name))
        .toEqual(['Lantern House', 'Zephyr Press']);
    });
  });

  describe('Reviews', () => {
    it('should create, filter and reject out-of-range ratings', async () => {
      const book = await request(app)
        .post('/api/v1/books')
        .set('Authorization', `Bearer ${adminToken}`)
        .send({
          title: 'Cold Lake',
          author: 'Ada Marlowe',
          publishedDate: '2018-06-01',
          isbn: '9783333333333',
          genre: 'Mystery'
        })
        .expect(201);
      const bookId = book.body.data.id;

      const created = await request(app)
        .post('/api/v1/reviews')
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ bookId, reviewerName: 'Sam', content: 'Tense.', rating: 5 });

      expect(created.status).toBe(201);
      expect(created.body.data).toMatchObject({ bookTitle: 'Cold Lake', rating: 5 });

      const invalid = await request(app)
        .post('/api/v1/reviews')
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ bookId, reviewerName: 'Kim', content: 'Meh.', rating: 0 });

      expect(invalid.status).toBe(400);
      expect(invalid.body.error.details).toEqual([
        { field: 'rating', message: 'Rating must be between 1 and 5' }
      ]);

      const listed = await request(app).get(`/api/v1/reviews?bookId=${bookId}`);
      expect(listed.body.data).toHaveLength(1);
      expect(listed.body.meta).toEqual({ count: 1 });
    });
  });
});
