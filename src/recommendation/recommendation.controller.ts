import { Controller, Get } from '@nestjs/common';
import { IRecommendationsResponse } from './interfaces';
import { RecommendationService } from './recommendation.service';

@Controller('recommendations')
export class RecommendationController {
  constructor(private readonly recommendationService: RecommendationService) {}

  @Get()
  async getRecommendations(): Promise<IRecommendationsResponse> {
    return this.recommendationService.getRecommendations();
  }
}
