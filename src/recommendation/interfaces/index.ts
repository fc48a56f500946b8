export {
  IRecommendations,
  IRecommendationsResponse,
} from './recommendation.interface';
