import { Request, Response } from 'express';
import { ReviewService } from '../../application/services/ReviewService';
import { CreateReviewDTO, UpdateReviewDTO } from '../../application/dto/CatalogDTO';
import { handleError, notFound, queryString, successResponse } from './responses';

export class ReviewController {
  constructor(private readonly reviewService: ReviewService) {}

  async getReviews(req: Request, res: Response): Promise<void> {
    try {
      const reviews = await this.reviewService.getReviews({ bookId: queryString(req.query.bookId) });
      res.status(200).json(successResponse(reviews, { count: reviews.length }));
    } catch (error) {
      handleError(res, error, 'Error getting reviews');
    }
  }

  async getReviewById(req: Request, res: Response): Promise<void> {
    try {
      const { id } = req.params;
      const review = await this.reviewService.getReviewById(id);

      if (!review) {
        notFound(res, 'Review', id);
        return;
      }

      res.status(200).json(successResponse(review));
    } catch (error) {
      handleError(res, error, 'Error getting review');
    }
  }

  async createReview(req: Request, res: Response): Promise<void> {
    try {
      const data: CreateReviewDTO = req.body;
      const review = await this.reviewService.createReview(data);

      res.status(201).json(successResponse(review, { message: 'Review created successfully' }));
    } catch (error) {
      handleError(res, error, 'Error creating review');
    }
  }

  async updateReview(req: Request, res: Response): Promise<void> {
    try {
      const data: UpdateReviewDTO = req.body;
      const review = await this.reviewService.updateReview(req.params.id, data);

      res.status(200).json(successResponse(review, { message: 'Review updated successfully' }));
    } catch (error) {
      handleError(res, error, 'Error updating review');
    }
  }

  async deleteReview(req: Request, res: Response): Promise<void> {
    try {
      await this.reviewService.deleteReview(req.params.id);
      res.status(200).json(successResponse(null, { message: 'Review deleted successfully' }));
    } catch (error) {
      handleError(res, error, 'Error deleting review');
    }
  }
}

export default ReviewController;
