export { CategoryEntity } from './CategoryEntity';
export { BookEntity } from './BookEntity';
export { AuthorEntity } from './AuthorEntity';
export { PublisherEntity } from './PublisherEntity';
export { BookCategoryEntity } from './BookCategoryEntity';
export { ReviewEntity } from './ReviewEntity';
