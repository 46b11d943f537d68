import logger from '../../utils/logger';
import { Publisher } from '../../domain/entities/Book';
import { CatalogStore } from '../../domain/repositories/CatalogStore';
import { NotFoundError } from '../../domain/errors';
import { CreatePublisherDTO, UpdatePublisherDTO } from '../dto/CatalogDTO';

export class PublisherService {
  private readonly logger = logger;

  constructor(private readonly store: CatalogStore) {}

  async createPublisher(data: CreatePublisherDTO): Promise<Publisher> {
    const publisher = await this.store.publishers.create({
      name: data.name,
      website: data.website ?? null,
      address: data.address ?? null
    });

    this.logger.info(`Publisher created: ${publisher.name}`, { publisherId: publisher.id });

    return publisher;
  }

  async getPublishers(): Promise<Publisher[]> {
    return this.store.publishers.findAll();
  }

  async getPublisherById(id: string): Promise<Publisher | null> {
    return this.store.publishers.findById(id);
  }

  async updatePublisher(id: string, data: UpdatePublisherDTO): Promise<Publisher> {
    await this.requirePublisher(id);
    const publisher = await this.store.publishers.update(id, data);

    this.logger.info(`Publisher updated: ${publisher.name}`, { publisherId: id });

    return publisher;
  }

  async deletePublisher(id: string): Promise<void> {
    const publisher = await this.requirePublisher(id);
    // Books keep existing with their publisher reference cleared.
    await this.store.publishers.delete(id);

    this.logger.info(`Publisher deleted: ${publisher.name}`, { publisherId: id });
  }

  private async requirePublisher(id: string): Promise<Publisher> {
    const publisher = await this.store.publishers.findById(id);
    if (!publisher) {
      throw new NotFoundError('Publisher', id);
    }
    return publisher;
  }
}

export default PublisherService;
