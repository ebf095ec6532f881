/** Body of every failed response */
export interface ErrorEnvelope {
  success: false;
  /** HTTP status code, repeated in the body */
  error: number;
  message: string;
}

/** Body of every successful JSON response; the payload sits beside `success` */
export type SuccessEnvelope<T extends object> = { success: true } & T;
