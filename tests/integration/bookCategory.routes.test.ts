import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../../src/app';
import { InMemoryCatalogStore } from '../support/InMemoryCatalogStore';
import { generateTestToken } from '../support/fixtures';

describe('Book Category API Integration Tests', () => {
  const adminToken = generateTestToken('ADMIN');

  let app: Application;
  let bookId: string;
  let sciFiId: string;
  let thrillerId: string;

  const send = (method: 'post' | 'put' | 'patch', path: string, body: Record<string, unknown>) =>
    request(app)[method](`/api/v1/${path}`)
      .set('Authorization', `Bearer ${adminToken}`)
      .send(body);

  beforeEach(async () => {
    app = createApp(new InMemoryCatalogStore());

    const book = await send('post', 'books', {
      title: 'Orbit of Glass',
      author: 'Ren Okafor',
      publishedDate: '2021-09-15',
      isbn: '9781111111111',
      genre: 'Science Fiction'
    }).expect(201);
    const sciFi = await send('post', 'categories', { name: 'Science Fiction', slug: 'sci-fi' }).expect(201);
    const thriller = await send('post', 'categories', { name: 'Thriller', slug: 'thriller' }).expect(201);

    bookId = book.body.data.id;
    sciFiId = sciFi.body.data.id;
    thrillerId = thriller.body.data.id;
  });

  it('should reject a second primary category and accept it after demotion', async () => {
    const first = await send('post', 'book-categories', { bookId, categoryId: sciFiId, primary: true });
    expect(first.status).toBe(201);
    expect(first.body.data).toMatchObject({ primary: true, bookTitle: 'Orbit of Glass', categoryName: 'Science Fiction' });

    const rejected = await send('post', 'book-categories', { bookId, categoryId: thrillerId, primary: true });
    expect(rejected.status).toBe(400);
    expect(rejected.body.error).toEqual({
      code: 'MULTIPLE_PRIMARY_CATEGORIES',
      message: 'A book can have only one primary category',
      details: { bookId }
    });

    await send('patch', `book-categories/${first.body.data.id}`, { primary: false }).expect(200);

    const accepted = await send('post', 'book-categories', { bookId, categoryId: thrillerId, primary: true });
    expect(accepted.status).toBe(201);

    const listed = await request(app).get(`/api/v1/book-categories?bookId=${bookId}`);
    expect(listed.body.data.map((association: { categoryName: string }) => association.categoryName))
      .toEqual(['Thriller', 'Science Fiction']);
  });

  it('should keep at most one primary under concurrent submission', async () => {
    const responses = await Promise.all([
      send('post', 'book-categories', { bookId, categoryId: sciFiId, primary: true }),
      send('post', 'book-categories', { bookId, categoryId: thrillerId, primary: true })
    ]);

    expect(responses.map((response) => response.status).sort()).toEqual([201, 400]);

    const listed = await request(app).get(`/api/v1/book-categories?bookId=${bookId}`);
    expect(listed.body.data.filter((association: { primary: boolean }) => association.primary)).toHaveLength(1);
  });

  it('should reject a duplicate pair with 409', async () => {
    await send('post', 'book-categories', { bookId, categoryId: sciFiId }).expect(201);

    const response = await send('post', 'book-categories', { bookId, categoryId: sciFiId });

    expect(response.status).toBe(409);
    expect(response.body.error.code).toBe('CONFLICT');
  });

  it('should validate the relevance score range', async () => {
    const response = await send('post', 'book-categories', { bookId, categoryId: sciFiId, relevanceScore: 11 });

    expect(response.status).toBe(400);
    expect(response.body.error.details).toEqual([
      { field: 'relevanceScore', message: 'Relevance score cannot exceed 10' }
    ]);
  });

  it('should show the categories on the book', async () => {
    await send('post', 'book-categories', { bookId, categoryId: sciFiId, primary: true, relevanceScore: 8 }).expect(201);

    const response = await request(app).get(`/api/v1/books/${bookId}`);

    expect(response.body.data.categoriesList).toEqual([
      { id: sciFiId, name: 'Science Fiction', primary: true, relevanceScore: 8 }
    ]);
  });

  it('should delete an association', async () => {
    const created = await send('post', 'book-categories', { bookId, categoryId: sciFiId }).expect(201);

    await request(app)
      .delete(`/api/v1/book-categories/${created.body.data.id}`)
      .set('Authorization', `Bearer ${adminToken}`)
      .expect(200);

    await request(app).get(`/api/v1/book-categories/${created.body.data.id}`).expect(404);
  });
});
