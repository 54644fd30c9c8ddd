import { Recommendation } from './recommendation.interface';

export interface FavoriteParlaysResponse {
  favoriteParlays: Recommendation[];
}
