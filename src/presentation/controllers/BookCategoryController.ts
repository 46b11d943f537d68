import { Request, Response } from 'express';
import { BookCategoryService } from '../../application/services/BookCategoryService';
import { CreateBookCategoryDTO, UpdateBookCategoryDTO } from '../../application/dto/CatalogDTO';
import { handleError, notFound, queryString, successResponse } from './responses';

export class BookCategoryController {
  constructor(private readonly bookCategoryService: BookCategoryService) {}

  async getBookCategories(req: Request, res: Response): Promise<void> {
    try {
      const associations = await this.bookCategoryService.getBookCategories({
        bookId: queryString(req.query.bookId),
        categoryId: queryString(req.query.categoryId)
      });

      res.status(200).json(successResponse(associations, { count: associations.length }));
    } catch (error) {
      handleError(res, error, 'Error getting book categories');
    }
  }

  async getBookCategoryById(req: Request, res: Response): Promise<void> {
    try {
      const { id } = req.params;
      const association = await this.bookCategoryService.getBookCategoryById(id);

      if (!association) {
        notFound(res, 'Book category', id);
        return;
      }

      res.status(200).json(successResponse(association));
    } catch (error) {
      handleError(res, error, 'Error getting book category');
    }
  }

  async createBookCategory(req: Request, res: Response): Promise<void> {
    try {
      const data: CreateBookCategoryDTO = req.body;
      const association = await this.bookCategoryService.createBookCategory(data);

      res.status(201).json(successResponse(association, {
        message: 'Book assigned to category successfully'
      }));
    } catch (error) {
      handleError(res, error, 'Error assigning book to category');
    }
  }

  async updateBookCategory(req: Request, res: Response): Promise<void> {
    try {
      const data: UpdateBookCategoryDTO = req.body;
      const association = await this.bookCategoryService.updateBookCategory(req.params.id, data);

      res.status(200).json(successResponse(association, {
        message: 'Book category updated successfully'
      }));
    } catch (error) {
      handleError(res, error, 'Error updating book category');
    }
  }

  async deleteBookCategory(req: Request, res: Response): Promise<void> {
    try {
      await this.bookCategoryService.deleteBookCategory(req.params.id);

      res.status(200).json(successResponse(null, {
        message: 'Book removed from category successfully'
      }));
    } catch (error) {
      handleError(res, error, 'Error removing book from category');
    }
  }
}

export default BookCategoryController;
