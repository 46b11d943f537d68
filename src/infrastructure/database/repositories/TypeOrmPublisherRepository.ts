import { EntityManager, Repository } from 'typeorm';
import { Publisher, PublisherData } from '../../../domain/entities/Book';
import { PublisherRepository } from '../../../domain/repositories/CatalogStore';
import { NotFoundError } from '../../../domain/errors';
import { PublisherEntity } from '../entities/PublisherEntity';
import { guardConstraints } from '../errors';
import { definedOnly, hasChanges } from './helpers';

const toPublisher = (entity: PublisherEntity): Publisher => ({
  id: entity.id,
  name: entity.name,
  website: entity.website,
  address: entity.address
});

export class TypeOrmPublisherRepository implements PublisherRepository {
  constructor(private readonly manager: EntityManager) {}

  private get repository(): Repository<PublisherEntity> {
    return this.manager.getRepository(PublisherEntity);
  }

  async findById(id: string): Promise<Publisher | null> {
    const entity = await this.repository.findOneBy({ id });
    return entity ? toPublisher(entity) : null;
  }

  async findAll(): Promise<Publisher[]> {
    const entities = await this.repository.find({ order: { name: 'ASC' } });
    return entities.map(toPublisher);
  }

  async create(data: PublisherData): Promise<Publisher> {
    const saved = await guardConstraints(() => this.repository.save(this.repository.create(definedOnly(data))));
    return toPublisher(saved);
  }

  async update(id: string, patch: Partial<PublisherData>): Promise<Publisher> {
    const changes = definedOnly(patch);
    if (hasChanges(changes)) {
      await guardConstraints(() => this.repository.update(id, changes));
    }
    const publisher = await this.findById(id);
    if (!publisher) {
      throw new NotFoundError('Publisher', id);
    }
    return publisher;
  }

  async delete(id: string): Promise<void> {
    await guardConstraints(() => this.repository.delete(id));
  }
}
