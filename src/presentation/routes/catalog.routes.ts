import { Router } from 'express';
import { CatalogServices } from '../../application/services';
import { CategoryController } from '../controllers/CategoryController';
import { BookController } from '../controllers/BookController';
import { BookCategoryController } from '../controllers/BookCategoryController';
import { AuthorController } from '../controllers/AuthorController';
import { PublisherController } from '../controllers/PublisherController';
import { ReviewController } from '../controllers/ReviewController';
import { HealthController } from '../controllers/HealthController';
import { authenticate, requireAdmin } from '../middleware/auth';
import {
  validate,
  idParamSchema,
  createCategorySchema,
  updateCategorySchema,
  listCategoriesSchema,
  createBookSchema,
  updateBookSchema,
  listBooksSchema,
  createBookCategorySchema,
  updateBookCategorySchema,
  listBookCategoriesSchema,
  createAuthorSchema,
  updateAuthorSchema,
  createPublisherSchema,
  updatePublisherSchema,
  createReviewSchema,
  updateReviewSchema,
  listReviewsSchema
} from '../middleware/validation';

export const createCatalogRoutes = (
  services: CatalogServices,
  checkDatabase: () => Promise<boolean>
): Router => {
  // Initialize controllers
  const categoryController = new CategoryController(services.categories);
  const bookController = new BookController(services.books);
  const bookCategoryController = new BookCategoryController(services.bookCategories);
  const authorController = new AuthorController(services.authors);
  const publisherController = new PublisherController(services.publishers);
  const reviewController = new ReviewController(services.reviews);
  const healthController = new HealthController(checkDatabase);

  const router = Router();

  // ==========================================
  // Health Check
  // ==========================================
  router.get('/health', (req, res) => healthController.checkHealth(req, res));

  // ==========================================
  // Public Routes (No Authentication Required)
  // ==========================================

  router.get('/categories', validate(listCategoriesSchema), (req, res) =>
    categoryController.getCategories(req, res)
  );
  router.get('/categories/:id', validate(idParamSchema), (req, res) =>
    categoryController.getCategoryById(req, res)
  );
  router.get('/categories/:id/subcategories', validate(idParamSchema), (req, res) =>
    categoryController.getSubcategories(req, res)
  );

  router.get('/books', validate(listBooksSchema), (req, res) =>
    bookController.getBooks(req, res)
  );
  router.get('/books/:id', validate(idParamSchema), (req, res) =>
    bookController.getBookById(req, res)
  );

  router.get('/book-categories', validate(listBookCategoriesSchema), (req, res) =>
    bookCategoryController.getBookCategories(req, res)
  );
  router.get('/book-categories/:id', validate(idParamSchema), (req, res) =>
    bookCategoryController.getBookCategoryById(req, res)
  );

  router.get('/authors', (req, res) => authorController.getAuthors(req, res));
  router.get('/authors/:id', validate(idParamSchema), (req, res) =>
    authorController.getAuthorById(req, res)
  );

  router.get('/publishers', (req, res) => publisherController.getPublishers(req, res));
  router.get('/publishers/:id', validate(idParamSchema), (req, res) =>
    publisherController.getPublisherById(req, res)
  );

  router.get('/reviews', validate(listReviewsSchema), (req, res) =>
    reviewController.getReviews(req, res)
  );
  router.get('/reviews/:id', validate(idParamSchema), (req, res) =>
    reviewController.getReviewById(req, res)
  );

  // ==========================================
  // Protected Routes (ADMIN Only)
  // ==========================================

  // Apply authentication middleware to all routes below
  router.use(authenticate);
  router.use(requireAdmin);

  // Categories
  router.post('/categories', validate(createCategorySchema), (req, res) =>
    categoryController.createCategory(req, res)
  );
  router.put('/categories/:id', validate(updateCategorySchema), (req, res) =>
    categoryController.updateCategory(req, res)
  );
  router.patch('/categories/:id', validate(updateCategorySchema), (req, res) =>
    categoryController.updateCategory(req, res)
  );
  router.delete('/categories/:id', validate(idParamSchema), (req, res) =>
    categoryController.deleteCategory(req, res)
  );

  // Books
  router.post('/books', validate(createBookSchema), (req, res) =>
    bookController.createBook(req, res)
  );
  router.put('/books/:id', validate(updateBookSchema), (req, res) =>
    bookController.updateBook(req, res)
  );
  router.patch('/books/:id', validate(updateBookSchema), (req, res) =>
    bookController.updateBook(req, res)
  );
  router.delete('/books/:id', validate(idParamSchema), (req, res) =>
    bookController.deleteBook(req, res)
  );

  // Book categories
  router.post('/book-categories', validate(createBookCategorySchema), (req, res) =>
    bookCategoryController.createBookCategory(req, res)
  );
  router.put('/book-categories/:id', validate(updateBookCategorySchema), (req, res) =>
    bookCategoryController.updateBookCategory(req, res)
  );
  router.patch('/book-categories/:id', validate(updateBookCategorySchema), (req, res) =>
    bookCategoryController.updateBookCategory(req, res)
  );
  router.delete('/book-categories/:id', validate(idParamSchema), (req, res) =>
    bookCategoryController.deleteBookCategory(req, res)
  );

  // Authors
  router.post('/authors', validate(createAuthorSchema), (req, res) =>
    authorController.createAuthor(req, res)
  );
  router.put('/authors/:id', validate(updateAuthorSchema), (req, res) =>
    authorController.updateAuthor(req, res)
  );
  router.patch('/authors/:id', validate(updateAuthorSchema), (req, res) =>
    authorController.updateAuthor(req, res)
  );
  router.delete('/authors/:id', validate(idParamSchema), (req, res) =>
    authorController.deleteAuthor(req, res)
  );

  // Publishers
  router.post('/publishers', validate(createPublisherSchema), (req, res) =>
    publisherController.createPublisher(req, res)
  );
  router.put('/publishers/:id', validate(updatePublisherSchema), (req, res) =>
    publisherController.updatePublisher(req, res)
  );
  router.patch('/publishers/:id', validate(updatePublisherSchema), (req, res) =>
    publisherController.updatePublisher(req, res)
  );
  router.delete('/publishers/:id', validate(idParamSchema), (req, res) =>
    publisherController.deletePublisher(req, res)
  );

  // Reviews
  router.post('/reviews', validate(createReviewSchema), (req, res) =>
    reviewController.createReview(req, res)
  );
  router.put('/reviews/:id', validate(updateReviewSchema), (req, res) =>
    reviewController.updateReview(req, res)
  );
  router.patch('/reviews/:id', validate(updateReviewSchema), (req, res) =>
    reviewController.updateReview(req, res)
  );
  router.delete('/reviews/:id', validate(idParamSchema), (req, res) =>
    reviewController.deleteReview(req, res)
  );

  return router;
};

export default createCatalogRoutes;
