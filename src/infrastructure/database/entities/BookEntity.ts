import {
  Check,
  Column,
  Entity,
  Index,
  JoinColumn,
  JoinTable,
  ManyToMany,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
  Unique
} from 'typeorm';
import { Language } from '../../../domain/entities/Book';
import { AuthorEntity } from './AuthorEntity';
import { PublisherEntity } from './PublisherEntity';
import { ReviewEntity } from './ReviewEntity';
import { BookCategoryEntity } from './BookCategoryEntity';

const nullableDecimal = {
  to: (value: number | null | undefined) => value,
  from: (value: string | null) => (value === null ? null : parseFloat(value))
};

@Entity('book')
@Unique('unique_book', ['title', 'author'])
@Index('uq_book_isbn', ['isbn'], { unique: true })
@Index('idx_book_publisher_bestseller', ['publisherId', 'isBestseller'])
@Check('isbn_length', `"isbn" ~ '^[0-9]{13}$'`)
@Check('rating_range', '"rating" >= 0 AND "rating" <= 5')
@Check('price_non_negative', '"price" >= 0')
@Check('page_count_positive', '"page_count" >= 1 OR "page_count" IS NULL')
export class BookEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  @Index()
  title!: string;

  @Column({ type: 'varchar', length: 255 })
  @Index()
  author!: string;

  @Column({ name: 'published_date', type: 'date' })
  @Index()
  publishedDate!: string;

  @Column({ type: 'varchar', length: 13 })
  isbn!: string;

  @Column({ type: 'varchar', length: 100 })
  @Index()
  genre!: string;

  @Column({ type: 'text', nullable: true })
  summary!: string | null;

  @Column({ name: 'publisher_id', type: 'uuid', nullable: true })
  publisherId!: string | null;

  @ManyToOne(() => PublisherEntity, (publisher) => publisher.books, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'publisher_id' })
  publisher?: PublisherEntity | null;

  @Column({ name: 'page_count', type: 'int', nullable: true })
  pageCount!: number | null;

  @Column({ type: 'enum', enum: Language, default: Language.EN })
  @Index()
  language!: Language;

  @Column({ type: 'decimal', precision: 10, scale: 2, nullable: true, transformer: nullableDecimal })
  price!: number | null;

  @Column({ name: 'cover_image', type: 'varchar', length: 255, nullable: true })
  coverImage!: string | null;

  @Column({ type: 'double precision', nullable: true })
  rating!: number | null;

  @Column({ name: 'is_bestseller', type: 'boolean', default: false })
  isBestseller!: boolean;

  @ManyToMany(() => AuthorEntity, (author) => author.books)
  @JoinTable({
    name: 'book_authors',
    joinColumn: { name: 'book_id', referencedColumnName: 'id' },
    inverseJoinColumn: { name: 'author_id', referencedColumnName: 'id' }
  })
  authors?: AuthorEntity[];

  @OneToMany(() => ReviewEntity, (review) => review.book)
  reviews?: ReviewEntity[];

  @OneToMany(() => BookCategoryEntity, (association) => association.book)
  bookCategories?: BookCategoryEntity[];
}
