import { Request, Response } from 'express';
import { CategoryService } from '../../application/services/CategoryService';
import { CategoryQueryDTO, CreateCategoryDTO, UpdateCategoryDTO } from '../../application/dto/CatalogDTO';
import { handleError, notFound, queryBoolean, queryString, successResponse } from './responses';

export class CategoryController {
  constructor(private readonly categoryService: CategoryService) {}

  // List categories (Public)
  async getCategories(req: Request, res: Response): Promise<void> {
    try {
      const query: CategoryQueryDTO = {
        isActive: queryBoolean(req.query.isActive)
      };

      const parentId = queryString(req.query.parentId);
      if (parentId !== undefined) {
        query.parentId = parentId === 'root' ? null : parentId;
      }

      const categories = await this.categoryService.getCategories(query);

      res.status(200).json(successResponse(categories, { count: categories.length }));
    } catch (error) {
      handleError(res, error, 'Error getting categories');
    }
  }

  // Get category with its full path (Public)
  async getCategoryById(req: Request, res: Response): Promise<void> {
    try {
      const { id } = req.params;
      const category = await this.categoryService.getCategoryById(id);

      if (!category) {
        notFound(res, 'Category', id);
        return;
      }

      res.status(200).json(successResponse(category));
    } catch (error) {
      handleError(res, error, 'Error getting category');
    }
  }

  // Every descendant in pre-order (Public)
  async getSubcategories(req: Request, res: Response): Promise<void> {
    try {
      const subcategories = await this.categoryService.getAllSubcategories(req.params.id);

      res.status(200).json(successResponse(subcategories, { count: subcategories.length }));
    } catch (error) {
      handleError(res, error, 'Error getting subcategories');
    }
  }

  // Create category (ADMIN only)
  async createCategory(req: Request, res: Response): Promise<void> {
    try {
      const data: CreateCategoryDTO = req.body;
      const category = await this.categoryService.createCategory(data);

      res.status(201).json(successResponse(category, {
        message: 'Category created successfully'
      }));
    } catch (error) {
      handleError(res, error, 'Error creating category');
    }
  }

  // Update category (ADMIN only)
  async updateCategory(req: Request, res: Response): Promise<void> {
    try {
      const data: UpdateCategoryDTO = req.body;
      const category = await this.categoryService.updateCategory(req.params.id, data);

      res.status(200).json(successResponse(category, {
        message: 'Category updated successfully'
      }));
    } catch (error) {
      handleError(res, error, 'Error updating category');
    }
  }

  // Delete category (ADMIN only)
  async deleteCategory(req: Request, res: Response): Promise<void> {
    try {
      await this.categoryService.deleteCategory(req.params.id);

      res.status(200).json(successResponse(null, {
        message: 'Category deleted successfully'
      }));
    } catch (error) {
      handleError(res, error, 'Error deleting category');
    }
  }
}

export default CategoryController;
