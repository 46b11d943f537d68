import { Category } from '../../domain/entities/Category';
import {
  Author,
  AuthorData,
  Book,
  BookCategory,
  BookData,
  Language,
  Publisher,
  PublisherData,
  Review,
  ReviewData
} from '../../domain/entities/Book';

// ==========================================
// Category DTOs
// ==========================================

export interface CreateCategoryDTO {
  name: string;
  slug: string;
  description?: string | null;
  isActive?: boolean;
  displayOrder?: number;
  parentId?: string | null;
}

export type UpdateCategoryDTO = Partial<CreateCategoryDTO>;

export interface CategoryQueryDTO {
  parentId?: string | null;
  isActive?: boolean;
}

export interface CategoryResponseDTO extends Category {
  parentName: string | null;
  subcategoryCount: number;
  fullPath?: string;
}

// ==========================================
// Book DTOs
// ==========================================

export interface CreateBookDTO extends BookData {
  authorIds?: string[];
}

export type UpdateBookDTO = Partial<CreateBookDTO>;

export interface BookQueryDTO {
  page?: number;
  limit?: number;
  genre?: string;
  language?: Language;
  isBestseller?: boolean;
  publisherId?: string;
  search?: string;
}

export interface BookCategorySummaryDTO {
  id: string;
  name: string;
  primary: boolean;
  relevanceScore: number;
}

export interface BookResponseDTO extends Book {
  authorIds: string[];
  publisherName: string | null;
  authorNames: string[];
  reviewCount: number;
  averageRating: number | null;
  categoriesList: BookCategorySummaryDTO[];
}

export interface BookDetailResponseDTO extends BookResponseDTO {
  publisher: Publisher | null;
  authors: Author[];
  reviews: ReviewResponseDTO[];
  authorsDisplay: string;
  isLongBook: boolean;
}

export interface BookListResponseDTO {
  books: BookResponseDTO[];
  pagination: PaginationDTO;
}

// ==========================================
// Book category DTOs
// ==========================================

export interface CreateBookCategoryDTO {
  bookId: string;
  categoryId: string;
  primary?: boolean;
  relevanceScore?: number;
}

export interface UpdateBookCategoryDTO {
  primary?: boolean;
  relevanceScore?: number;
}

export interface BookCategoryResponseDTO extends BookCategory {
  bookTitle: string;
  categoryName: string;
}

// ==========================================
// Author, publisher and review DTOs
// ==========================================

export type CreateAuthorDTO = AuthorData;
export type UpdateAuthorDTO = Partial<AuthorData>;

export type CreatePublisherDTO = PublisherData;
export type UpdatePublisherDTO = Partial<PublisherData>;

export type CreateReviewDTO = ReviewData;
export type UpdateReviewDTO = Partial<Omit<ReviewData, 'bookId'>>;

export interface ReviewResponseDTO extends Review {
  bookTitle: string;
}

// ==========================================
// Pagination & Health DTOs
// ==========================================

export interface PaginationDTO {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
  hasNext: boolean;
  hasPrev: boolean;
}

export interface HealthCheckDTO {
  status: 'healthy' | 'unhealthy';
  service: string;
  timestamp: Date;
  version: string;
  uptime: number;
  checks: {
    database: boolean;
  };
}
