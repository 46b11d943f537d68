import { EntityManager, Repository } from 'typeorm';
import { Review, ReviewData } from '../../../domain/entities/Book';
import { ReviewRepository } from '../../../domain/repositories/CatalogStore';
import { NotFoundError } from '../../../domain/errors';
import { ReviewEntity } from '../entities/ReviewEntity';
import { guardConstraints } from '../errors';
import { definedOnly, hasChanges } from './helpers';

const toReview = (entity: ReviewEntity): Review => ({
  id: entity.id,
  bookId: entity.bookId,
  reviewerName: entity.reviewerName,
  content: entity.content,
  rating: entity.rating,
  createdAt: entity.createdAt
});

export class TypeOrmReviewRepository implements ReviewRepository {
  constructor(private readonly manager: EntityManager) {}

  private get repository(): Repository<ReviewEntity> {
    return this.manager.getRepository(ReviewEntity);
  }

  async findById(id: string): Promise<Review | null> {
    const entity = await this.repository.findOneBy({ id });
    return entity ? toReview(entity) : null;
  }

  async findAll(filter: { bookId?: string } = {}): Promise<Review[]> {
    const entities = await this.repository.find({
      where: definedOnly(filter),
      order: { createdAt: 'DESC' }
    });
    return entities.map(toReview);
  }

  async create(data: ReviewData): Promise<Review> {
    const saved = await guardConstraints(() => this.repository.save(this.repository.create(data)));
    return toReview(saved);
  }

  async update(id: string, patch: Partial<Omit<ReviewData, 'bookId'>>): Promise<Review> {
    const changes = definedOnly(patch);
    if (hasChanges(changes)) {
      await guardConstraints(() => this.repository.update(id, changes));
    }
    const review = await this.findById(id);
    if (!review) {
      throw new NotFoundError('Review', id);
    }
    return review;
  }

  async delete(id: string): Promise<void> {
    await guardConstraints(() => this.repository.delete(id));
  }
}
