import { Request, Response } from 'express';
import { PublisherService } from '../../application/services/PublisherService';
import { CreatePublisherDTO, UpdatePublisherDTO } from '../../application/dto/CatalogDTO';
import { handleError, notFound, successResponse } from './responses';

export class PublisherController {
  constructor(private readonly publisherService: PublisherService) {}

  async getPublishers(req: Request, res: Response): Promise<void> {
    try {
      const publishers = await this.publisherService.getPublishers();
      res.status(200).json(successResponse(publishers, { count: publishers.length }));
    } catch (error) {
      handleError(res, error, 'Error getting publishers');
    }
  }

  async getPublisherById(req: Request, res: Response): Promise<void> {
    try {
      const { id } = req.params;
      const publisher = await this.publisherService.getPublisherById(id);

      if (!publisher) {
        notFound(res, 'Publisher', id);
        return;
      }

      res.status(200).json(successResponse(publisher));
    } catch (error) {
      handleError(res, error, 'Error getting publisher');
    }
  }

  async createPublisher(req: Request, res: Response): Promise<void> {
    try {
      const data: CreatePublisherDTO = req.body;
      const publisher = await this.publisherService.createPublisher(data);

      res.status(201).json(successResponse(publisher, { message: 'Publisher created successfully' }));
    } catch (error) {
      handleError(res, error, 'Error creating publisher');
    }
  }

  async updatePublisher(req: Request, res: Response): Promise<void> {
    try {
      const data: UpdatePublisherDTO = req.body;
      const publisher = await this.publisherService.updatePublisher(req.params.id, data);

      res.status(200).json(successResponse(publisher, { message: 'Publisher updated successfully' }));
    } catch (error) {
      handleError(res, error, 'Error updating publisher');
    }
  }

  async deletePublisher(req: Request, res: Response): Promise<void> {
    try {
      await this.publisherService.deletePublisher(req.params.id);
      res.status(200).json(successResponse(null, { message: 'Publisher deleted successfully' }));
    } catch (error) {
      handleError(res, error, 'Error deleting publisher');
    }
  }
}

export default PublisherController;
