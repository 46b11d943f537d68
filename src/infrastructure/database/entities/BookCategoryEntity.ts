import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique
} from 'typeorm';
import { BookEntity } from './BookEntity';
import { CategoryEntity } from './CategoryEntity';

@Entity('book_category')
@Unique('uq_book_category', ['bookId', 'categoryId'])
@Index('unique_primary_category_per_book', ['bookId'], { unique: true, where: '"primary" = true' })
@Check('relevance_score_range', '"relevance_score" >= 0 AND "relevance_score" <= 10')
export class BookCategoryEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'book_id', type: 'uuid' })
  bookId!: string;

  @ManyToOne(() => BookEntity, (book) => book.bookCategories, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'book_id' })
  book?: BookEntity;

  @Column({ name: 'category_id', type: 'uuid' })
  @Index()
  categoryId!: string;

  @ManyToOne(() => CategoryEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'category_id' })
  category?: CategoryEntity;

  @CreateDateColumn({ name: 'added_date' })
  addedDate!: Date;

  @Column({ type: 'boolean', default: false })
  primary!: boolean;

  @Column({ name: 'relevance_score', type: 'double precision', default: 5 })
  relevanceScore!: number;
}
