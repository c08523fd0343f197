import { INestApplication } from '@nestjs/common';
import { TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { configureApp } from '../src/app.setup';
import { CORRELATION_HEADER } from '../src/common/interceptors';
import {
  PRODUCT_STATS_WRITER,
  ProductStatsWriter,
} from '../src/aggregation/product-stats.store';
import { StorageException } from '../src/common/exceptions';
import { addProduct, COMMENT, compileCatalogModule } from './catalog-testing';

describe('Catalog HTTP API', () => {
  let moduleRef: TestingModule;
  let app: INestApplication;

  beforeEach(async () => {
    moduleRef = await compileCatalogModule();
    app = configureApp(moduleRef.createNestApplication());
    await app.init();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await app.close();
  });

  describe('GET /products', () => {
    it('should return a page of product summaries', async () => {
      const product = addProduct(moduleRef, { name: 'Tent', price: 199.5 });

      const response = await request(app.getHttpServer()).get('/products').expect(200);

      expect(response.body).toEqual({
        content: [
          {
            id: product.id,
            name: 'Tent',
            description: 'A product used in tests',
            category: 'Outdoors',
            price: 199.5,
            imageUrl: null,
            averageRating: 0,
            reviewCount: 0,
          },
        ],
        page: 0,
        size: 10,
        totalElements: 1,
        totalPages: 1,
        last: true,
      });
    });

    it('should apply category, paging and repeated sort parameters', async () => {
      addProduct(moduleRef, { name: 'B', category: 'Home', price: 5 });
      addProduct(moduleRef, { name: 'A', category: 'Home', price: 5 });
      addProduct(moduleRef, { name: 'C', category: 'Home', price: 9 });
      addProduct(moduleRef, { name: 'D', category: 'Outdoors', price: 1 });

      const response = await request(app.getHttpServer())
        .get('/products')
        .query('category=Home&size=2&sort=price,desc&sort=name')
        .expect(200);

      expect(response.body.content.map((p: { name: string }) => p.name)).toEqual(['C', 'A']);
      expect(response.body.totalElements).toBe(3);
      expect(response.body.last).toBe(false);
    });

    it('should reject an unknown sort property', async () => {
      const response = await request(app.getHttpServer())
        .get('/products?sort=colour')
        .expect(400);

      expect(response.body.message).toBe(
        "Unsupported sort property 'colour'; expected one of id, name, category, price, averageRating, reviewCount",
      );
      expect(response.body.error).toBe('validation');
    });

    it('should reject a negative page', async () => {
      const response = await request(app.getHttpServer()).get('/products?page=-1').expect(400);

      expect(response.body.message).toBe('page must not be less than 0');
    });

    it('should echo the correlation id', async () => {
      const response = await request(app.getHttpServer())
        .get('/products')
        .set(CORRELATION_HEADER, 'corr-123')
        .expect(200);

      expect(response.headers[CORRELATION_HEADER]).toBe('corr-123');
    });
  });

  describe('GET /products/:id', () => {
    it('should return 404 for an unknown product', async () => {
      const response = await request(app.getHttpServer()).get('/products/999').expect(404);

      expect(response.body).toMatchObject({
        statusCode: 404,
        path: '/products/999',
        method: 'GET',
        message: 'Product not found: 999',
        error: 'not_found',
      });
    });

    it('should return 400 for a non-numeric id', async () => {
      const response = await request(app.getHttpServer()).get('/products/abc').expect(400);

      expect(response.body.message).toBe('Validation failed (numeric string is expected)');
    });
  });

  describe('POST /products/:id/reviews', () => {
    it('should store the review and update the product', async () => {
      const product = addProduct(moduleRef);
      const server = app.getHttpServer();

      const created = await request(server)
        .post(`/products/${product.id}/reviews`)
        .send({ reviewerName: 'Robin', comment: COMMENT, rating: 4 })
        .expect(201);

      expect(created.body).toMatchObject({
        productId: product.id,
        reviewerName: 'Robin',
        comment: COMMENT,
        rating: 4,
        helpfulCount: 0,
      });

      await request(server)
        .post(`/products/${product.id}/reviews`)
        .send({ comment: COMMENT, rating: 5 })
        .expect(201);

      const detail = await request(server).get(`/products/${product.id}`).expect(200);
      expect(detail.body).toMatchObject({
        reviewCount: 2,
        averageRating: 4.5,
        ratingBreakdown: { '1': 0, '2': 0, '3': 0, '4': 1, '5': 1 },
      });
    });

    it('should report two reviews of 5 and 3 as an average of 4.0', async () => {
      const product = addProduct(moduleRef);
      const server = app.getHttpServer();

      for (const rating of [5, 3]) {
        await request(server)
          .post(`/products/${product.id}/reviews`)
          .send({ comment: COMMENT, rating })
          .expect(201);
      }

      const detail = await request(server).get(`/products/${product.id}`).expect(200);
      expect(detail.body.reviewCount).toBe(2);
      expect(detail.body.averageRating).toBe(4);
      expect(detail.body.ratingBreakdown).toEqual({ '1': 0, '2': 0, '3': 1, '4': 0, '5': 1 });
    });

    it('should hide storage failure detail from the client', async () => {
      const product = addProduct(moduleRef);
      jest
        .spyOn(moduleRef.get<ProductStatsWriter>(PRODUCT_STATS_WRITER), 'write')
        .mockImplementationOnce(() => {
          throw new StorageException('writeStats failed: disk I/O error', 'writeStats', {
            originalError: new Error('disk I/O error'),
          });
        });

      const response = await request(app.getHttpServer())
        .post(`/products/${product.id}/reviews`)
        .send({ comment: COMMENT, rating: 4 })
        .expect(500);

      expect(response.body).toMatchObject({
        statusCode: 500,
        message: 'Internal server error',
        error: 'storage',
      });
      expect(response.body.details).toBeUndefined();
    });

    it('should reject an out-of-range rating', async () => {
      const product = addProduct(moduleRef);

      const response = await request(app.getHttpServer())
        .post(`/products/${product.id}/reviews`)
        .send({ comment: COMMENT, rating: 6 })
        .expect(400);

      expect(response.body.message).toBe('rating must not be greater than 5');
      expect(response.body.details).toEqual(['rating must not be greater than 5']);
    });

    it('should reject unknown fields', async () => {
      const product = addProduct(moduleRef);

      const response = await request(app.getHttpServer())
        .post(`/products/${product.id}/reviews`)
        .send({ comment: COMMENT, rating: 3, helpfulCount: 50 })
        .expect(400);

      expect(response.body.message).toBe('property helpfulCount should not exist');
    });

    it('should return 404 for an unknown product', async () => {
      await request(app.getHttpServer())
        .post('/products/999/reviews')
        .send({ comment: COMMENT, rating: 3 })
        .expect(404);
    });

    it('should replay a request with the same Idempotency-Key', async () => {
      const product = addProduct(moduleRef);
      const server = app.getHttpServer();

      const first = await request(server)
        .post(`/products/${product.id}/reviews`)
        .set('Idempotency-Key', 'retry-1')
        .send({ comment: COMMENT, rating: 2 })
        .expect(201);
      const second = await request(server)
        .post(`/products/${product.id}/reviews`)
        .set('Idempotency-Key', 'retry-1')
        .send({ comment: COMMENT, rating: 2 })
        .expect(201);

      expect(second.body).toEqual(first.body);
      const reviews = await request(server).get(`/products/${product.id}/reviews`).expect(200);
      expect(reviews.body.totalElements).toBe(1);
    });
  });

  describe('GET /products/:id/reviews', () => {
    it('should filter by rating', async () => {
      const product = addProduct(moduleRef);
      const server = app.getHttpServer();
      for (const rating of [5, 1, 5]) {
        await request(server)
          .post(`/products/${product.id}/reviews`)
          .send({ comment: COMMENT, rating })
          .expect(201);
      }

      const response = await request(server)
        .get(`/products/${product.id}/reviews?rating=5&sort=createdAt,desc`)
        .expect(200);

      expect(response.body.totalElements).toBe(2);
      expect(response.body.content.map((r: { rating: number }) => r.rating)).toEqual([5, 5]);
    });

    it('should return 404 for an unknown product', async () => {
      await request(app.getHttpServer()).get('/products/999/reviews').expect(404);
    });
  });

  describe('PUT /reviews/:id/helpful', () => {
    it('should increment the helpful count', async () => {
      const product = addProduct(moduleRef);
      const server = app.getHttpServer();
      const created = await request(server)
        .post(`/products/${product.id}/reviews`)
        .send({ comment: COMMENT, rating: 4 })
        .expect(201);

      await request(server).put(`/reviews/${created.body.id}/helpful`).expect(200);
      const response = await request(server).put(`/reviews/${created.body.id}/helpful`).expect(200);

      expect(response.body.helpfulCount).toBe(2);
    });

    it('should return 404 for an unknown review', async () => {
      const response = await request(app.getHttpServer()).put('/reviews/4242/helpful').expect(404);

      expect(response.body.message).toBe('Review not found: 4242');
    });
  });

  describe('health', () => {
    it('should report readiness with the database up', async () => {
      const response = await request(app.getHttpServer()).get('/health/ready').expect(200);

      expect(response.body).toMatchObject({
        status: 'ready',
        database: 'up',
        redis: 'disconnected',
      });
    });

    it('should expose catalog metrics', async () => {
      const product = addProduct(moduleRef);
      const server = app.getHttpServer();
      await request(server)
        .post(`/products/${product.id}/reviews`)
        .send({ comment: COMMENT, rating: 4 })
        .expect(201);

      const response = await request(server).get('/health/metrics').expect(200);

      expect(response.body.catalog).toEqual({
        reviewsSubmitted: 1,
        submissionsFailed: 0,
        submissionsReplayed: 0,
        helpfulVotes: 0,
      });
      expect(response.body.reconciliation).toBeNull();
    });
  });
});
