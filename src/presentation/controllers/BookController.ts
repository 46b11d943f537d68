import { Request, Response } from 'express';
import { BookService } from '../../application/services/BookService';
import { BookQueryDTO, CreateBookDTO, UpdateBookDTO } from '../../application/dto/CatalogDTO';
import { Language } from '../../domain/entities/Book';
import { handleError, notFound, queryBoolean, queryNumber, queryString, successResponse } from './responses';

const LANGUAGES: ReadonlySet<string> = new Set(Object.values(Language));

const isLanguage = (value: string | undefined): value is Language =>
  value !== undefined && LANGUAGES.has(value);

export class BookController {
  constructor(private readonly bookService: BookService) {}

  // List books with filters and pagination (Public)
  async getBooks(req: Request, res: Response): Promise<void> {
    try {
      const language = queryString(req.query.language);
      const query: BookQueryDTO = {
        page: queryNumber(req.query.page),
        limit: queryNumber(req.query.limit),
        genre: queryString(req.query.genre),
        language: isLanguage(language) ? language : undefined,
        isBestseller: queryBoolean(req.query.isBestseller),
        publisherId: queryString(req.query.publisherId),
        search: queryString(req.query.search)
      };

      const result = await this.bookService.getBooks(query);

      res.status(200).json(successResponse(result.books, {
        pagination: result.pagination
      }));
    } catch (error) {
      handleError(res, error, 'Error getting books');
    }
  }

  // Book detail with publisher, authors and reviews (Public)
  async getBookById(req: Request, res: Response): Promise<void> {
    try {
      const { id } = req.params;
      const book = await this.bookService.getBookById(id);

      if (!book) {
        notFound(res, 'Book', id);
        return;
      }

      res.status(200).json(successResponse(book));
    } catch (error) {
      handleError(res, error, 'Error getting book');
    }
  }

  // Create book (ADMIN only)
  async createBook(req: Request, res: Response): Promise<void> {
    try {
      const data: CreateBookDTO = req.body;
      const book = await this.bookService.createBook(data);

      res.status(201).json(successResponse(book, {
        message: 'Book created successfully'
      }));
    } catch (error) {
      handleError(res, error, 'Error creating book');
    }
  }

  // Update book (ADMIN only)
  async updateBook(req: Request, res: Response): Promise<void> {
    try {
      const data: UpdateBookDTO = req.body;
      const book = await this.bookService.updateBook(req.params.id, data);

      res.status(200).json(successResponse(book, {
        message: 'Book updated successfully'
      }));
    } catch (error) {
      handleError(res, error, 'Error updating book');
    }
  }

  // Delete book (ADMIN only)
  async deleteBook(req: Request, res: Response): Promise<void> {
    try {
      await this.bookService.deleteBook(req.params.id);

      res.status(200).json(successResponse(null, {
        message: 'Book deleted successfully'
      }));
    } catch (error) {
      handleError(res, error, 'Error deleting book');
    }
  }
}

export default BookController;
