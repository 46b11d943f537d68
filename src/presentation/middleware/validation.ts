import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import logger from '../../utils/logger';
import { CATEGORY_NAME_PATTERN, CATEGORY_SLUG_PATTERN, MAX_DISPLAY_ORDER } from '../../domain/entities/Category';
import { ISBN_PATTERN, Language } from '../../domain/entities/Book';
import { DEFAULT_PAGE_SIZE } from '../../application/services/BookService';

// Validation error response
interface ValidationErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details: Array<{
      field: string;
      message: string;
    }>;
  };
}

interface ValidationSchema {
  body?: Joi.ObjectSchema;
  query?: Joi.ObjectSchema;
  params?: Joi.ObjectSchema;
}

type FieldError = { field: string; message: string };

const collect = (error: Joi.ValidationError | undefined, prefix: string, errors: FieldError[]): void => {
  if (!error) {
    return;
  }
  error.details.forEach((detail) => {
    errors.push({
      field: `${prefix}${detail.path.join('.')}`,
      message: detail.message
    });
  });
};

// Validates and normalizes the request. Converted values (trimmed strings,
// parsed numbers and booleans, defaults) replace the raw ones.
export const validate = (schema: ValidationSchema) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const errors: FieldError[] = [];

    if (schema.body) {
      const { error, value } = schema.body.validate(req.body, { abortEarly: false });
      collect(error, '', errors);
      req.body = value;
    }

    if (schema.query) {
      const { error, value } = schema.query.validate(req.query, { abortEarly: false });
      collect(error, 'query.', errors);
      req.query = value;
    }

    if (schema.params) {
      const { error, value } = schema.params.validate(req.params, { abortEarly: false });
      collect(error, 'params.', errors);
      req.params = value;
    }

    if (errors.length > 0) {
      logger.warn('Validation failed', { errors, path: req.path });

      const response: ValidationErrorResponse = {
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          details: errors
        }
      };

      res.status(400).json(response);
      return;
    }

    next();
  };
};

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const uuid = (label: string) =>
  Joi.string().uuid().messages({
    'string.guid': `${label} must be a valid UUID`,
    'any.required': `${label} is required`
  });

const optionalText = () => Joi.string().allow('', null).trim();

const atLeastOneField = { 'object.min': 'At least one field must be provided for update' };

export const idParamSchema = {
  params: Joi.object({
    id: uuid('ID').required()
  })
};

// ==========================================
// Category Validation Schemas
// ==========================================

const categoryFields = {
  name: Joi.string().trim().min(2).max(100).pattern(CATEGORY_NAME_PATTERN)
    .messages({
      'string.min': 'Category name must be at least 2 characters',
      'string.max': 'Category name must be less than 100 characters',
      'string.pattern.base': 'Category name can only contain letters, numbers, spaces, and hyphens'
    }),
  slug: Joi.string().trim().max(120).pattern(CATEGORY_SLUG_PATTERN)
    .messages({
      'string.max': 'Slug must be less than 120 characters',
      'string.pattern.base': 'Slug can only contain letters, numbers, underscores, and hyphens'
    }),
  description: optionalText(),
  isActive: Joi.boolean(),
  displayOrder: Joi.number().integer().min(0).max(MAX_DISPLAY_ORDER)
    .messages({
      'number.min': 'Display order cannot be negative',
      'number.max': `Display order cannot exceed ${MAX_DISPLAY_ORDER}`
    }),
  parentId: uuid('Parent ID').allow(null)
};

export const createCategorySchema = {
  body: Joi.object({
    ...categoryFields,
    name: categoryFields.name.required(),
    slug: categoryFields.slug.required()
  })
};

export const updateCategorySchema = {
  params: idParamSchema.params,
  body: Joi.object(categoryFields).min(1).messages(atLeastOneField)
};

export const listCategoriesSchema = {
  query: Joi.object({
    parentId: Joi.alternatives().try(Joi.string().valid('root'), Joi.string().uuid())
      .messages({
        'alternatives.match': 'parentId must be "root" or a valid UUID'
      }),
    isActive: Joi.boolean()
  })
};

// ==========================================
// Book Validation Schemas
// ==========================================

const bookFields = {
  title: Joi.string().trim().max(255),
  author: Joi.string().trim().max(255),
  publishedDate: Joi.string().pattern(DATE_PATTERN)
    .messages({ 'string.pattern.base': 'Published date must use the YYYY-MM-DD format' }),
  isbn: Joi.string().pattern(ISBN_PATTERN)
    .messages({ 'string.pattern.base': 'ISBN must be exactly 13 digits' }),
  genre: Joi.string().trim().max(100),
  summary: optionalText(),
  publisherId: uuid('Publisher ID').allow(null),
  pageCount: Joi.number().integer().min(1).allow(null)
    .messages({ 'number.min': 'Page count must be at least 1' }),
  language: Joi.string().valid(...Object.values(Language)),
  price: Joi.number().min(0).precision(2).allow(null)
    .messages({ 'number.min': 'Price cannot be negative' }),
  coverImage: Joi.string().max(255).allow(null),
  rating: Joi.number().min(0).max(5).allow(null)
    .messages({
      'number.min': 'Rating cannot be negative',
      'number.max': 'Rating cannot exceed 5'
    }),
  isBestseller: Joi.boolean(),
  authorIds: Joi.array().items(uuid('Author ID'))
};

export const createBookSchema = {
  body: Joi.object({
    ...bookFields,
    title: bookFields.title.required(),
    author: bookFields.author.required(),
    publishedDate: bookFields.publishedDate.required(),
    isbn: bookFields.isbn.required(),
    genre: bookFields.genre.required()
  })
};

export const updateBookSchema = {
  params: idParamSchema.params,
  body: Joi.object(bookFields).min(1).messages(atLeastOneField)
};

export const listBooksSchema = {
  query: Joi.object({
    page: Joi.number().integer().min(1).default(1),
    limit: Joi.number().integer().min(1).max(100).default(DEFAULT_PAGE_SIZE),
    genre: Joi.string().trim().max(100),
    language: Joi.string().valid(...Object.values(Language)),
    isBestseller: Joi.boolean(),
    publisherId: uuid('Publisher ID'),
    search: Joi.string().trim().max(255)
  })
};

// ==========================================
// Book Category Validation Schemas
// ==========================================

const relevanceScore = Joi.number().min(0).max(10)
  .messages({
    'number.min': 'Relevance score cannot be negative',
    'number.max': 'Relevance score cannot exceed 10'
  });

export const createBookCategorySchema = {
  body: Joi.object({
    bookId: uuid('Book ID').required(),
    categoryId: uuid('Category ID').required(),
    primary: Joi.boolean(),
    relevanceScore
  })
};

export const updateBookCategorySchema = {
  params: idParamSchema.params,
  body: Joi.object({
    primary: Joi.boolean(),
    relevanceScore
  }).min(1).messages(atLeastOneField)
};

export const listBookCategoriesSchema = {
  query: Joi.object({
    bookId: uuid('Book ID'),
    categoryId: uuid('Category ID')
  })
};

// ==========================================
// Author, Publisher & Review Validation Schemas
// ==========================================

const authorFields = {
  name: Joi.string().trim().max(255),
  biography: optionalText(),
  birthDate: Joi.string().pattern(DATE_PATTERN).allow(null)
    .messages({ 'string.pattern.base': 'Birth date must use the YYYY-MM-DD format' })
};

export const createAuthorSchema = {
  body: Joi.object({ ...authorFields, name: authorFields.name.required() })
};

export const updateAuthorSchema = {
  params: idParamSchema.params,
  body: Joi.object(authorFields).min(1).messages(atLeastOneField)
};

const publisherFields = {
  name: Joi.string().trim().max(255),
  website: Joi.string().uri().max(200).allow(null)
    .messages({ 'string.uri': 'Website must be a valid URL' }),
  address: optionalText()
};

export const createPublisherSchema = {
  body: Joi.object({ ...publisherFields, name: publisherFields.name.required() })
};

export const updatePublisherSchema = {
  params: idParamSchema.params,
  body: Joi.object(publisherFields).min(1).messages(atLeastOneField)
};

const reviewFields = {
  reviewerName: Joi.string().trim().max(255),
  content: Joi.string().trim(),
  rating: Joi.number().integer().min(1).max(5)
    .messages({
      'number.min': 'Rating must be between 1 and 5',
      'number.max': 'Rating must be between 1 and 5'
    })
};

export const createReviewSchema = {
  body: Joi.object({
    bookId: uuid('Book ID').required(),
    reviewerName: reviewFields.reviewerName.required(),
    content: reviewFields.content.required(),
    rating: reviewFields.rating.required()
  })
};

export const updateReviewSchema = {
  params: idParamSchema.params,
  body: Joi.object(reviewFields).min(1).messages(atLeastOneField)
};

export const listReviewsSchema = {
  query: Joi.object({
    bookId: uuid('Book ID')
  })
};

export default validate;
