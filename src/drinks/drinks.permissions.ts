/** Permission strings the identity provider grants for the drinks API */
export const DrinkPermission = {
  READ_DETAIL: 'get:drinks-detail',
  CREATE: 'post:drinks',
  UPDATE: 'patch:drinks',
  DELETE: 'delete:drinks',
} as const;
