import { DataSource, EntityManager } from 'typeorm';
import {
  AuthorRepository,
  BookCategoryRepository,
  BookRepository,
  CatalogRepositories,
  CatalogStore,
  CategoryRepository,
  PublisherRepository,
  ReviewRepository
} from '../../domain/repositories/CatalogStore';
import { checkDatabaseHealth } from './dataSource';
import {
  TypeOrmAuthorRepository,
  TypeOrmBookCategoryRepository,
  TypeOrmBookRepository,
  TypeOrmCategoryRepository,
  TypeOrmPublisherRepository,
  TypeOrmReviewRepository
} from './repositories';

const repositoriesFor = (manager: EntityManager): CatalogRepositories => ({
  categories: new TypeOrmCategoryRepository(manager),
  books: new TypeOrmBookRepository(manager),
  authors: new TypeOrmAuthorRepository(manager),
  publishers: new TypeOrmPublisherRepository(manager),
  bookCategories: new TypeOrmBookCategoryRepository(manager),
  reviews: new TypeOrmReviewRepository(manager)
});

export class TypeOrmCatalogStore implements CatalogStore {
  readonly categories: CategoryRepository;
  readonly books: BookRepository;
  readonly authors: AuthorRepository;
  readonly publishers: PublisherRepository;
  readonly bookCategories: BookCategoryRepository;
  readonly reviews: ReviewRepository;

  constructor(private readonly dataSource: DataSource) {
    const repositories = repositoriesFor(dataSource.manager);
    this.categories = repositories.categories;
    this.books = repositories.books;
    this.authors = repositories.authors;
    this.publishers = repositories.publishers;
    this.bookCategories = repositories.bookCategories;
    this.reviews = repositories.reviews;
  }

  // READ COMMITTED; callers that need serialization take explicit locks.
  async transaction<T>(work: (repositories: CatalogRepositories) => Promise<T>): Promise<T> {
    return this.dataSource.transaction((manager) => work(repositoriesFor(manager)));
  }

  async checkHealth(): Promise<boolean> {
    return checkDatabaseHealth(this.dataSource);
  }
}

export default TypeOrmCatalogStore;
