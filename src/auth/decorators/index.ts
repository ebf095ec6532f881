export { RequiresAuth } from './requires-auth.decorator';
export { Claims } from './claims.decorator';
