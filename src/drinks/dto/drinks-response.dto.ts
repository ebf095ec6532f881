import type { SuccessEnvelope } from '../../common/interfaces/api-envelope.interface';
import type { DrinkLongView, DrinkShortView } from './drink-view.dto';

/** GET /drinks, GET /drinks-detail, POST /drinks, PATCH /drinks/:id */
export type DrinksResponse<TView extends DrinkShortView | DrinkLongView> =
  SuccessEnvelope<{ drinks: TView[] }>;

/** DELETE /drinks/:id, echoing the id of the removed drink */
export type DeleteDrinkResponse = SuccessEnvelope<{ delete: number }>;
