import logger from '../../utils/logger';
import { Author } from '../../domain/entities/Book';
import { CatalogStore } from '../../domain/repositories/CatalogStore';
import { NotFoundError } from '../../domain/errors';
import { CreateAuthorDTO, UpdateAuthorDTO } from '../dto/CatalogDTO';

export class AuthorService {
  private readonly logger = logger;

  constructor(private readonly store: CatalogStore) {}

  async createAuthor(data: CreateAuthorDTO): Promise<Author> {
    const author = await this.store.authors.create({
      name: data.name,
      biography: data.biography ?? null,
      birthDate: data.birthDate ?? null
    });

    this.logger.info(`Author created: ${author.name}`, { authorId: author.id });

    return author;
  }

  async getAuthors(): Promise<Author[]> {
    return this.store.authors.findAll();
  }

  async getAuthorById(id: string): Promise<Author | null> {
    return this.store.authors.findById(id);
  }

  async updateAuthor(id: string, data: UpdateAuthorDTO): Promise<Author> {
    await this.requireAuthor(id);
    const author = await this.store.authors.update(id, data);

    this.logger.info(`Author updated: ${author.name}`, { authorId: id });

    return author;
  }

  async deleteAuthor(id: string): Promise<void> {
    const author = await this.requireAuthor(id);
    await this.store.authors.delete(id);

    this.logger.info(`Author deleted: ${author.name}`, { authorId: id });
  }

  private async requireAuthor(id: string): Promise<Author> {
    const author = await this.store.authors.findById(id);
    if (!author) {
      throw new NotFoundError('Author', id);
    }
    return author;
  }
}

export default AuthorService;
