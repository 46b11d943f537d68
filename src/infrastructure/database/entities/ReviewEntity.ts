import { Check, Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { BookEntity } from './BookEntity';

@Entity('review')
@Index('idx_review_book_rating', ['bookId', 'rating'])
@Check('review_rating_range', '"rating" >= 1 AND "rating" <= 5')
export class ReviewEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'book_id', type: 'uuid' })
  bookId!: string;

  @ManyToOne(() => BookEntity, (book) => book.reviews, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'book_id' })
  book?: BookEntity;

  @Column({ name: 'reviewer_name', type: 'varchar', length: 255 })
  reviewerName!: string;

  @Column({ type: 'text' })
  content!: string;

  @Column({ type: 'smallint' })
  rating!: number;

  @CreateDateColumn({ name: 'created_at' })
  @Index()
  createdAt!: Date;
}
