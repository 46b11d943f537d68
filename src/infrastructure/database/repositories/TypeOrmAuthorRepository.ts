import { EntityManager, In, Repository } from 'typeorm';
import { Author, AuthorData } from '../../../domain/entities/Book';
import { AuthorRepository } from '../../../domain/repositories/CatalogStore';
import { NotFoundError } from '../../../domain/errors';
import { AuthorEntity } from '../entities/AuthorEntity';
import { guardConstraints } from '../errors';
import { definedOnly, hasChanges } from './helpers';

export const toAuthor = (entity: AuthorEntity): Author => ({
  id: entity.id,
  name: entity.name,
  biography: entity.biography,
  birthDate: entity.birthDate
});

export class TypeOrmAuthorRepository implements AuthorRepository {
  constructor(private readonly manager: EntityManager) {}

  private get repository(): Repository<AuthorEntity> {
    return this.manager.getRepository(AuthorEntity);
  }

  async findById(id: string): Promise<Author | null> {
    const entity = await this.repository.findOneBy({ id });
    return entity ? toAuthor(entity) : null;
  }

  async findByIds(ids: string[]): Promise<Author[]> {
    if (ids.length === 0) {
      return [];
    }
    const entities = await this.repository.findBy({ id: In(ids) });
    return entities.map(toAuthor);
  }

  async findAll(): Promise<Author[]> {
    const entities = await this.repository.find({ order: { name: 'ASC' } });
    return entities.map(toAuthor);
  }

  async create(data: AuthorData): Promise<Author> {
    const saved = await guardConstraints(() => this.repository.save(this.repository.create(definedOnly(data))));
    return toAuthor(saved);
  }

  async update(id: string, patch: Partial<AuthorData>): Promise<Author> {
    const changes = definedOnly(patch);
    if (hasChanges(changes)) {
      await guardConstraints(() => this.repository.update(id, changes));
    }
    const author = await this.findById(id);
    if (!author) {
      throw new NotFoundError('Author', id);
    }
    return author;
  }

  async delete(id: string): Promise<void> {
    await guardConstraints(() => this.repository.delete(id));
  }
}
