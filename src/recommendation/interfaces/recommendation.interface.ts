import { IMenuItem } from '../../menu/interfaces';
import { IResponse } from '../../shared/interfaces';

export interface IRecommendations {
  popular: IMenuItem[];
  highlyRated: IMenuItem[];
  budgetFriendly: IMenuItem[];
}

export interface IRecommendationsResponse extends IResponse {
  recommendations: IRecommendations | null;
}
