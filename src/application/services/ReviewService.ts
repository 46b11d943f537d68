import logger from '../../utils/logger';
import { Review } from '../../domain/entities/Book';
import { CatalogStore } from '../../domain/repositories/CatalogStore';
import { NotFoundError } from '../../domain/errors';
import { CreateReviewDTO, ReviewResponseDTO, UpdateReviewDTO } from '../dto/CatalogDTO';

export class ReviewService {
  private readonly logger = logger;

  constructor(private readonly store: CatalogStore) {}

  async createReview(data: CreateReviewDTO): Promise<ReviewResponseDTO> {
    const book = await this.store.books.findById(data.bookId);
    if (!book) {
      throw new NotFoundError('Book', data.bookId);
    }

    const review = await this.store.reviews.create(data);

    this.logger.info('Review created', { reviewId: review.id, bookId: book.id, rating: review.rating });

    return { ...review, bookTitle: book.title };
  }

  async getReviews(filter: { bookId?: string } = {}): Promise<ReviewResponseDTO[]> {
    const reviews = await this.store.reviews.findAll(filter);
    return Promise.all(reviews.map((review) => this.toResponse(review)));
  }

  async getReviewById(id: string): Promise<ReviewResponseDTO | null> {
    const review = await this.store.reviews.findById(id);
    return review ? this.toResponse(review) : null;
  }

  async updateReview(id: string, data: UpdateReviewDTO): Promise<ReviewResponseDTO> {
    await this.requireReview(id);
    const review = await this.store.reviews.update(id, data);

    this.logger.info('Review updated', { reviewId: id });

    return this.toResponse(review);
  }

  async deleteReview(id: string): Promise<void> {
    await this.requireReview(id);
    await this.store.reviews.delete(id);

    this.logger.info('Review deleted', { reviewId: id });
  }

  private async requireReview(id: string): Promise<Review> {
    const review = await this.store.reviews.findById(id);
    if (!review) {
      throw new NotFoundError('Review', id);
    }
    return review;
  }

  private async toResponse(review: Review): Promise<ReviewResponseDTO> {
    const book = await this.store.books.findById(review.bookId);
    return { ...review, bookTitle: book ? book.title : '' };
  }
}

export default ReviewService;
