import { TestingModule } from '@nestjs/testing';
import {
  averageToTenth,
  RatingAggregationService,
} from '../src/aggregation/rating-aggregation.service';
import {
  PRODUCT_STATS_WRITER,
  ProductStatsStore,
  ProductStatsWriter,
} from '../src/aggregation/product-stats.store';
import { ProductRepository } from '../src/products/product.repository';
import { ReviewRepository } from '../src/reviews/review.repository';
import { ResourceNotFoundException, StorageException } from '../src/common/exceptions';
import { addProduct, COMMENT, createCatalogModule } from './catalog-testing';

describe('averageToTenth', () => {
  it('should return 0 for no ratings', () => {
    expect(averageToTenth([])).toBe(0);
  });

  it('should round to one decimal place', () => {
    expect(averageToTenth([5, 5, 5, 4])).toBe(4.8);
    expect(averageToTenth([1, 1, 1, 1, 5])).toBe(1.8);
    expect(averageToTenth([2, 2, 3])).toBe(2.3);
    expect(averageToTenth([3, 3])).toBe(3);
  });

  it('should round halves up', () => {
    const ratings = [...Array.from({ length: 19 }, () => 4), 5];

    expect(averageToTenth(ratings)).toBe(4.1);
    expect(averageToTenth([4, 4, 4, 5])).toBe(4.3);
    expect(averageToTenth([1, 2])).toBe(1.5);
  });
});

describe('RatingAggregationService', () => {
  let moduleRef: TestingModule;
  let aggregation: RatingAggregationService;
  let products: ProductRepository;
  let reviews: ReviewRepository;

  beforeEach(async () => {
    moduleRef = await createCatalogModule();
    aggregation = moduleRef.get(RatingAggregationService);
    products = moduleRef.get(ProductRepository);
    reviews = moduleRef.get(ReviewRepository);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await moduleRef.close();
  });

  function addReviews(productId: number, ratings: number[]): void {
    for (const rating of ratings) {
      reviews.save({ productId, reviewerName: 'Sam', comment: COMMENT, rating });
    }
  }

  describe('recomputeStats', () => {
    it('should store the count and rounded average of every review', () => {
      const product = addProduct(moduleRef);
      addReviews(product.id, [5, 5, 5, 4]);

      expect(aggregation.recomputeStats(product.id)).toEqual({ reviewCount: 4, averageRating: 4.8 });
      expect(products.findById(product.id)).toMatchObject({ reviewCount: 4, averageRating: 4.8 });
    });

    it('should give the same result when repeated', () => {
      const product = addProduct(moduleRef);
      addReviews(product.id, [1, 1, 1, 1, 5]);

      const first = aggregation.recomputeStats(product.id);
      const second = aggregation.recomputeStats(product.id);

      expect(second).toEqual(first);
      expect(second).toEqual({ reviewCount: 5, averageRating: 1.8 });
    });

    it('should store zeros for a product without reviews', () => {
      const product = addProduct(moduleRef);

      expect(aggregation.recomputeStats(product.id)).toEqual({ reviewCount: 0, averageRating: 0 });
    });

    it('should only count the product\'s own reviews', () => {
      const tent = addProduct(moduleRef);
      const lamp = addProduct(moduleRef);
      addReviews(tent.id, [5, 5]);
      addReviews(lamp.id, [1]);

      expect(aggregation.recomputeStats(tent.id)).toEqual({ reviewCount: 2, averageRating: 5 });
    });

    it('should throw for an unknown product', () => {
      expect(() => aggregation.recomputeStats(999)).toThrow(ResourceNotFoundException);
    });

    it('should keep the previous stats when the recompute fails', () => {
      const product = addProduct(moduleRef);
      addReviews(product.id, [3, 3]);
      aggregation.recomputeStats(product.id);
      addReviews(product.id, [5, 5]);

      const writer = moduleRef.get<ProductStatsWriter>(PRODUCT_STATS_WRITER);
      const store = new ProductStatsStore();
      jest.spyOn(writer, 'write').mockImplementationOnce((productId, stats, executor) => {
        store.write(productId, stats, executor);
        throw new StorageException('connection dropped', 'writeStats');
      });

      expect(() => aggregation.recomputeStats(product.id)).toThrow('connection dropped');
      expect(products.findById(product.id)).toMatchObject({ reviewCount: 2, averageRating: 3 });
    });
  });

  describe('ratingBreakdown', () => {
    it('should report every star value', () => {
      const product = addProduct(moduleRef);
      addReviews(product.id, [5, 2, 5]);

      expect(aggregation.ratingBreakdown(product.id)).toEqual({ 1: 0, 2: 1, 3: 0, 4: 0, 5: 2 });
    });

    it('should sum to the review count', () => {
      const product = addProduct(moduleRef);
      addReviews(product.id, [1, 2, 3, 4, 4, 5]);

      const breakdown = aggregation.ratingBreakdown(product.id);
      const stats = aggregation.recomputeStats(product.id);

      expect(Object.values(breakdown).reduce((sum, n) => sum + n, 0)).toBe(stats.reviewCount);
    });
  });
});
