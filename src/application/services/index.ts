import { CatalogStore } from '../../domain/repositories/CatalogStore';
import { AuthorService } from './AuthorService';
import { BookCategoryService } from './BookCategoryService';
import { BookService } from './BookService';
import { CategoryService } from './CategoryService';
import { PublisherService } from './PublisherService';
import { ReviewService } from './ReviewService';

export interface CatalogServices {
  categories: CategoryService;
  books: BookService;
  bookCategories: BookCategoryService;
  authors: AuthorService;
  publishers: PublisherService;
  reviews: ReviewService;
}

export const createCatalogServices = (store: CatalogStore): CatalogServices => ({
  categories: new CategoryService(store),
  books: new BookService(store),
  bookCategories: new BookCategoryService(store),
  authors: new AuthorService(store),
  publishers: new PublisherService(store),
  reviews: new ReviewService(store)
});

export {
  AuthorService,
  BookCategoryService,
  BookService,
  CategoryService,
  PublisherService,
  ReviewService
};
