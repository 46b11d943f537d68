export { TypeOrmCategoryRepository } from './TypeOrmCategoryRepository';
export { TypeOrmBookRepository } from './TypeOrmBookRepository';
export { TypeOrmAuthorRepository } from './TypeOrmAuthorRepository';
export { TypeOrmPublisherRepository } from './TypeOrmPublisherRepository';
export { TypeOrmBookCategoryRepository } from './TypeOrmBookCategoryRepository';
export { TypeOrmReviewRepository } from './TypeOrmReviewRepository';
