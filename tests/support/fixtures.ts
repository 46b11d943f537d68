import jwt from 'jsonwebtoken';
import config from '../../src/config';
import { createCatalogServices, CatalogServices } from '../../src/application/services';
import { CategoryResponseDTO, BookResponseDTO } from '../../src/application/dto/CatalogDTO';
import { InMemoryCatalogStore } from './InMemoryCatalogStore';

// Generate test JWT token
export const generateTestToken = (role: string = 'ADMIN'): string =>
  jwt.sign(
    { userId: 'test-user-id', email: 'test@example.com', role },
    config.jwt.secret,
    { issuer: config.jwt.issuer }
  );

export const setupCatalog = (): { store: InMemoryCatalogStore; services: CatalogServices } => {
  const store = new InMemoryCatalogStore();
  return { store, services: createCatalogServices(store) };
};

let bookSequence = 0;

export const createCategory = (
  services: CatalogServices,
  name: string,
  parentId: string | null = null,
  displayOrder = 0
): Promise<CategoryResponseDTO> =>
  services.categories.createCategory({
    name,
    slug: name.toLowerCase().replace(/\s+/g, '-'),
    parentId,
    displayOrder
  });

export const createBook = (
  services: CatalogServices,
  title: string,
  overrides: { author?: string; pageCount?: number | null; genre?: string } = {}
): Promise<BookResponseDTO> => {
  bookSequence += 1;
  return services.books.createBook({
    title,
    author: overrides.author ?? 'Test Author',
    publishedDate: '2020-01-01',
    isbn: String(9780000000000 + bookSequence),
    genre: overrides.genre ?? 'Fiction',
    pageCount: overrides.pageCount ?? null
  });
};
