import 'reflect-metadata';
import logger, { logError } from '../../utils/logger';
import { createCatalogServices } from '../../application/services';
import { Language } from '../../domain/entities/Book';
import AppDataSource, { connectDatabase, disconnectDatabase } from './dataSource';
import { TypeOrmCatalogStore } from './TypeOrmCatalogStore';

interface SeedCategory {
  name: string;
  slug: string;
  displayOrder: number;
  children?: SeedCategory[];
}

const categoryTree: SeedCategory[] = [
  {
    name: 'Fiction',
    slug: 'fiction',
    displayOrder: 0,
    children: [
      { name: 'Mystery', slug: 'mystery', displayOrder: 0 },
      { name: 'Science Fiction', slug: 'science-fiction', displayOrder: 1 }
    ]
  },
  {
    name: 'Non-Fiction',
    slug: 'non-fiction',
    displayOrder: 1,
    children: [{ name: 'History', slug: 'history', displayOrder: 0 }]
  }
];

const books = [
  {
    title: 'The Quiet Harbor',
    author: 'Ada Marlowe',
    publishedDate: '2019-04-02',
    isbn: '9780000000011',
    genre: 'Mystery',
    pageCount: 320,
    language: Language.EN,
    price: 14.99,
    categories: ['mystery'],
    primary: 'mystery'
  },
  {
    title: 'Orbit of Glass',
    author: 'Ren Okafor',
    publishedDate: '2021-09-15',
    isbn: '9780000000028',
    genre: 'Science Fiction',
    pageCount: 612,
    language: Language.EN,
    price: 19.5,
    categories: ['science-fiction', 'fiction'],
    primary: 'science-fiction'
  }
];

// Runs through the application services so the seed obeys the same rules as the API.
async function seedCatalog(): Promise<void> {
  await connectDatabase();
  const store = new TypeOrmCatalogStore(AppDataSource);
  const services = createCatalogServices(store);

  logger.info('🌱 Seeding catalog database...');

  const categoryIds = new Map<string, string>();
  const seedCategories = async (nodes: SeedCategory[], parentId: string | null): Promise<void> => {
    for (const node of nodes) {
      const existing = await store.categories.findBySlug(node.slug);
      const category = existing ?? await services.categories.createCategory({
        name: node.name,
        slug: node.slug,
        displayOrder: node.displayOrder,
        parentId
      });
      if (!existing) {
        logger.info(`✅ Created category: ${category.slug}`);
      }
      categoryIds.set(node.slug, category.id);
      await seedCategories(node.children ?? [], category.id);
    }
  };
  await seedCategories(categoryTree, null);

  const publisher = (await store.publishers.findAll()).find((candidate) => candidate.name === 'Lantern House')
    ?? await services.publishers.createPublisher({ name: 'Lantern House', website: 'https://lantern.example.com' });

  for (const { categories, primary, ...bookData } of books) {
    if (await store.books.findByIsbn(bookData.isbn)) {
      continue;
    }

    const author = await services.authors.createAuthor({ name: bookData.author });
    const book = await services.books.createBook({ ...bookData, publisherId: publisher.id, authorIds: [author.id] });

    for (const slug of categories) {
      const categoryId = categoryIds.get(slug);
      if (categoryId) {
        await services.bookCategories.createBookCategory({ bookId: book.id, categoryId, primary: slug === primary });
      }
    }
    logger.info(`✅ Created book: ${book.title}`);
  }

  logger.info('🌱 Catalog seed completed');
}

void seedCatalog()
  .catch((error: unknown) => {
    logError('❌ Catalog seed failed', error);
    process.exitCode = 1;
  })
  .finally(() => disconnectDatabase());
