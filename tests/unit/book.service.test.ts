import { CatalogServices } from '../../src/application/services';
import { ConflictError, NotFoundError } from '../../src/domain/errors';
import { Language } from '../../src/domain/entities/Book';
import { CreateBookDTO } from '../../src/application/dto/CatalogDTO';
import { createBook, createCategory, setupCatalog } from '../support/fixtures';

describe('BookService', () => {
  let services: CatalogServices;

  const validBook: CreateBookDTO = {
    title: 'Orbit of Glass',
    author: 'Ren Okafor',
    publishedDate: '2021-09-15',
    isbn: '9781111111111',
    genre: 'Science Fiction',
    pageCount: 612,
    price: 19.5
  };

  beforeEach(() => {
    ({ services } = setupCatalog());
  });

  describe('createBook', () => {
    it('should create a book with its authors and publisher', async () => {
      const publisher = await services.publishers.createPublisher({ name: 'Lantern House' });
      const ren = await services.authors.createAuthor({ name: 'Ren Okafor' });
      const ada = await services.authors.createAuthor({ name: 'Ada Marlowe' });

      const result = await services.books.createBook({
        ...validBook,
        publisherId: publisher.id,
        authorIds: [ren.id, ada.id, ren.id]
      });

      expect(result).toMatchObject({
        title: 'Orbit of Glass',
        language: Language.EN,
        isBestseller: false,
        publisherName: 'Lantern House',
        authorNames: ['Ada Marlowe', 'Ren Okafor'],
        reviewCount: 0,
        averageRating: null,
        categoriesList: []
      });
      expect(result.authorIds).toHaveLength(2);
    });

    it('should reject a duplicate ISBN', async () => {
      await services.books.createBook(validBook);

      await expect(services.books.createBook({ ...validBook, title: 'Another Title' }))
        .rejects.toBeInstanceOf(ConflictError);
    });

    it('should reject a duplicate title and author', async () => {
      await services.books.createBook(validBook);

      await expect(services.books.createBook({ ...validBook, isbn: '9782222222222' }))
        .rejects.toMatchObject({ code: 'CONFLICT', details: { title: 'Orbit of Glass', author: 'Ren Okafor' } });
    });

    it('should reject unknown authors and publishers', async () => {
      const missingId = '00000000-0000-4000-8000-000000000000';

      await expect(services.books.createBook({ ...validBook, authorIds: [missingId] }))
        .rejects.toMatchObject({ code: 'AUTHOR_NOT_FOUND' });
      await expect(services.books.createBook({ ...validBook, publisherId: missingId }))
        .rejects.toMatchObject({ code: 'PUBLISHER_NOT_FOUND' });
    });
  });

  describe('updateBook', () => {
    it('should replace the author set when authorIds is given', async () => {
      const ren = await services.authors.createAuthor({ name: 'Ren Okafor' });
      const ada = await services.authors.createAuthor({ name: 'Ada Marlowe' });
      const book = await services.books.createBook({ ...validBook, authorIds: [ren.id] });

      const result = await services.books.updateBook(book.id, { authorIds: [ada.id], isBestseller: true });

      expect(result.authorNames).toEqual(['Ada Marlowe']);
      expect(result.isBestseller).toBe(true);
    });

    it('should keep authors when authorIds is omitted', async () => {
      const ren = await services.authors.createAuthor({ name: 'Ren Okafor' });
      const book = await services.books.createBook({ ...validBook, authorIds: [ren.id] });

      const result = await services.books.updateBook(book.id, { genre: 'Space Opera' });

      expect(result).toMatchObject({ genre: 'Space Opera', authorNames: ['Ren Okafor'] });
    });

    it('should reject taking another book\'s ISBN', async () => {
      await services.books.createBook(validBook);
      const other = await createBook(services, 'The Quiet Harbor');

      await expect(services.books.updateBook(other.id, { isbn: validBook.isbn }))
        .rejects.toBeInstanceOf(ConflictError);
    });

    it('should reject an unknown book', async () => {
      await expect(services.books.updateBook('00000000-0000-4000-8000-000000000000', { genre: 'Drama' }))
        .rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('getBooks', () => {
    beforeEach(async () => {
      await createBook(services, 'Cold Lake', { genre: 'Mystery', author: 'Ada Marlowe' });
      await createBook(services, 'Amber Road', { genre: 'History' });
      await createBook(services, 'Blue Static', { genre: 'Mystery' });
    });

    it('should return books ordered by title with pagination', async () => {
      const result = await services.books.getBooks({ page: 1, limit: 2 });

      expect(result.books.map((book) => book.title)).toEqual(['Amber Road', 'Blue Static']);
      expect(result.pagination).toEqual({
        page: 1,
        limit: 2,
        total: 3,
        totalPages: 2,
        hasNext: true,
        hasPrev: false
      });
    });

    it('should filter by genre and search text', async () => {
      const mysteries = await services.books.getBooks({ genre: 'Mystery' });
      const byAuthor = await services.books.getBooks({ search: 'marlowe' });

      expect(mysteries.books.map((book) => book.title)).toEqual(['Blue Static', 'Cold Lake']);
      expect(byAuthor.books.map((book) => book.title)).toEqual(['Cold Lake']);
      expect(mysteries.pagination.limit).toBe(10);
    });
  });

  describe('getBookById', () => {
    it('should include nested relations and derived fields', async () => {
      const publisher = await services.publishers.createPublisher({ name: 'Lantern House' });
      const ren = await services.authors.createAuthor({ name: 'Ren Okafor' });
      const book = await services.books.createBook({ ...validBook, publisherId: publisher.id, authorIds: [ren.id] });
      const fiction = await createCategory(services, 'Fiction');
      const sciFi = await createCategory(services, 'Science Fiction', fiction.id);
      await services.bookCategories.createBookCategory({ bookId: book.id, categoryId: fiction.id, relevanceScore: 3 });
      await services.bookCategories.createBookCategory({ bookId: book.id, categoryId: sciFi.id, primary: true });
      await services.reviews.createReview({ bookId: book.id, reviewerName: 'Sam', content: 'Great', rating: 5 });
      await services.reviews.createReview({ bookId: book.id, reviewerName: 'Kim', content: 'Fine', rating: 2 });

      const result = await services.books.getBookById(book.id);

      expect(result).toMatchObject({
        publisher: { name: 'Lantern House' },
        authorsDisplay: 'Ren Okafor',
        isLongBook: true,
        reviewCount: 2,
        averageRating: 3.5
      });
      expect(result?.reviews.map((review) => review.reviewerName)).toEqual(['Kim', 'Sam']);
      expect(result?.reviews[0].bookTitle).toBe('Orbit of Glass');
      expect(result?.categoriesList).toEqual([
        { id: sciFi.id, name: 'Science Fiction', primary: true, relevanceScore: 5 },
        { id: fiction.id, name: 'Fiction', primary: false, relevanceScore: 3 }
      ]);
    });

    it('should return null for an unknown book', async () => {
      expect(await services.books.getBookById('00000000-0000-4000-8000-000000000000')).toBeNull();
    });
  });

  describe('deleteBook', () => {
    it('should remove the book with its reviews and associations', async () => {
      const book = await createBook(services, 'Cold Lake');
      const fiction = await createCategory(services, 'Fiction');
      await services.bookCategories.createBookCategory({ bookId: book.id, categoryId: fiction.id });
      await services.reviews.createReview({ bookId: book.id, reviewerName: 'Sam', content: 'Great', rating: 5 });

      await services.books.deleteBook(book.id);

      expect(await services.books.getBookById(book.id)).toBeNull();
      expect(await services.reviews.getReviews({ bookId: book.id })).toEqual([]);
      expect(await services.bookCategories.getBookCategories({ categoryId: fiction.id })).toEqual([]);
    });
  });
});
