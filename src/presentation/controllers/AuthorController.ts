import { Request, Response } from 'express';
import { AuthorService } from '../../application/services/AuthorService';
import { CreateAuthorDTO, UpdateAuthorDTO } from '../../application/dto/CatalogDTO';
import { handleError, notFound, successResponse } from './responses';

export class AuthorController {
  constructor(private readonly authorService: AuthorService) {}

  async getAuthors(req: Request, res: Response): Promise<void> {
    try {
      const authors = await this.authorService.getAuthors();
      res.status(200).json(successResponse(authors, { count: authors.length }));
    } catch (error) {
      handleError(res, error, 'Error getting authors');
    }
  }

  async getAuthorById(req: Request, res: Response): Promise<void> {
    try {
      const { id } = req.params;
      const author = await this.authorService.getAuthorById(id);

      if (!author) {
        notFound(res, 'Author', id);
        return;
      }

      res.status(200).json(successResponse(author));
    } catch (error) {
      handleError(res, error, 'Error getting author');
    }
  }

  async createAuthor(req: Request, res: Response): Promise<void> {
    try {
      const data: CreateAuthorDTO = req.body;
      const author = await this.authorService.createAuthor(data);

      res.status(201).json(successResponse(author, { message: 'Author created successfully' }));
    } catch (error) {
      handleError(res, error, 'Error creating author');
    }
  }

  async updateAuthor(req: Request, res: Response): Promise<void> {
    try {
      const data: UpdateAuthorDTO = req.body;
      const author = await this.authorService.updateAuthor(req.params.id, data);

      res.status(200).json(successResponse(author, { message: 'Author updated successfully' }));
    } catch (error) {
      handleError(res, error, 'Error updating author');
    }
  }

  async deleteAuthor(req: Request, res: Response): Promise<void> {
    try {
      await this.authorService.deleteAuthor(req.params.id);
      res.status(200).json(successResponse(null, { message: 'Author deleted successfully' }));
    } catch (error) {
      handleError(res, error, 'Error deleting author');
    }
  }
}

export default AuthorController;
