import { EntityManager, Repository } from 'typeorm';
import { Author, Book, BookData } from '../../../domain/entities/Book';
import { BookPage, BookQuery, BookRepository } from '../../../domain/repositories/CatalogStore';
import { NotFoundError } from '../../../domain/errors';
import { AuthorEntity, BookEntity } from '../entities';
import { guardConstraints } from '../errors';
import { definedOnly, escapeLike, hasChanges } from './helpers';
import { toAuthor } from './TypeOrmAuthorRepository';

export const toBook = (entity: BookEntity): Book => ({
  id: entity.id,
  title: entity.title,
  author: entity.author,
  publishedDate: entity.publishedDate,
  isbn: entity.isbn,
  genre: entity.genre,
  summary: entity.summary,
  publisherId: entity.publisherId,
  pageCount: entity.pageCount,
  language: entity.language,
  price: entity.price,
  coverImage: entity.coverImage,
  rating: entity.rating,
  isBestseller: entity.isBestseller
});

export class TypeOrmBookRepository implements BookRepository {
  constructor(private readonly manager: EntityManager) {}

  private get repository(): Repository<BookEntity> {
    return this.manager.getRepository(BookEntity);
  }

  async findById(id: string): Promise<Book | null> {
    const entity = await this.repository.findOneBy({ id });
    return entity ? toBook(entity) : null;
  }

  async findByIsbn(isbn: string): Promise<Book | null> {
    const entity = await this.repository.findOneBy({ isbn });
    return entity ? toBook(entity) : null;
  }

  async findByTitleAndAuthor(title: string, author: string): Promise<Book | null> {
    const entity = await this.repository.findOneBy({ title, author });
    return entity ? toBook(entity) : null;
  }

  async findPage(query: BookQuery): Promise<BookPage> {
    const builder = this.repository.createQueryBuilder('book');

    if (query.genre) {
      builder.andWhere('book.genre = :genre', { genre: query.genre });
    }
    if (query.language) {
      builder.andWhere('book.language = :language', { language: query.language });
    }
    if (query.isBestseller !== undefined) {
      builder.andWhere('book.isBestseller = :isBestseller', { isBestseller: query.isBestseller });
    }
    if (query.publisherId) {
      builder.andWhere('book.publisherId = :publisherId', { publisherId: query.publisherId });
    }
    if (query.search) {
      builder.andWhere('(book.title ILIKE :search OR book.author ILIKE :search OR book.isbn ILIKE :search)', {
        search: `%${escapeLike(query.search)}%`
      });
    }

    const [entities, total] = await builder
      .orderBy('book.title', 'ASC')
      .addOrderBy('book.id', 'ASC')
      .skip((query.page - 1) * query.limit)
      .take(query.limit)
      .getManyAndCount();

    return { items: entities.map(toBook), total };
  }

  async findAuthors(bookId: string): Promise<Author[]> {
    const authors = await this.manager
      .getRepository(AuthorEntity)
      .createQueryBuilder('author')
      .innerJoin('author.books', 'book', 'book.id = :bookId', { bookId })
      .orderBy('author.name', 'ASC')
      .getMany();

    return authors.map(toAuthor);
  }

  async create(data: BookData, authorIds: string[]): Promise<Book> {
    const entity = this.repository.create({
      ...definedOnly(data),
      authors: authorIds.map((id) => ({ id }))
    });
    const saved = await guardConstraints(() => this.repository.save(entity));
    return this.require(saved.id);
  }

  async update(id: string, patch: Partial<BookData>, authorIds?: string[]): Promise<Book> {
    const changes = definedOnly(patch);
    if (hasChanges(changes)) {
      await guardConstraints(() => this.repository.update(id, changes));
    }

    if (authorIds) {
      const relation = this.repository.createQueryBuilder().relation(BookEntity, 'authors').of(id);
      const current = await this.findAuthors(id);
      const currentIds = current.map((author) => author.id);
      await guardConstraints(() =>
        relation.addAndRemove(
          authorIds.filter((authorId) => !currentIds.includes(authorId)),
          currentIds.filter((authorId) => !authorIds.includes(authorId))
        )
      );
    }

    return this.require(id);
  }

  async delete(id: string): Promise<void> {
    await guardConstraints(() => this.repository.delete(id));
  }

  async lockForUpdate(id: string): Promise<Book | null> {
    const entity = await this.repository
      .createQueryBuilder('book')
      .setLock('pessimistic_write')
      .where('book.id = :id', { id })
      .getOne();

    return entity ? toBook(entity) : null;
  }

  private async require(id: string): Promise<Book> {
    const book = await this.findById(id);
    if (!book) {
      throw new NotFoundError('Book', id);
    }
    return book;
  }
}
