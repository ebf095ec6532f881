import { HttpException, HttpStatus } from '@nestjs/common';

/** Machine-readable reason carried by every authentication failure */
export type AuthErrorCode =
  | 'authorization_header_missing'
  | 'invalid_header'
  | 'invalid_claims'
  | 'token_expired'
  | 'key_set_unavailable'
  | 'unauthorized';

/**
 * Base class for token and permission failures.
 *
 * `code` names the failure for logs and callers; the response body keeps the
 * shared `{ statusCode, error, message }` shape of every other exception.
 */
export class AuthException extends HttpException {
  readonly code: AuthErrorCode;

  constructor(
    code: AuthErrorCode,
    description: string,
    status: HttpStatus,
    cause?: Error,
  ) {
    super(
      {
        statusCode: status,
        error: code,
        message: description,
      },
      status,
      { cause },
    );
    this.code = code;
  }
}

/** No Authorization header on the request. HTTP 401. */
export class MissingHeaderException extends AuthException {
  constructor() {
    super(
      'authorization_header_missing',
      'Authorization header is expected.',
      HttpStatus.UNAUTHORIZED,
    );
  }
}

/**
 * Authorization header (or the token header inside it) does not have the
 * expected shape. HTTP 401.
 */
export class MalformedHeaderException extends AuthException {
  constructor(description: string) {
    super('invalid_header', description, HttpStatus.UNAUTHORIZED);
  }
}

/** The token names a key id the identity provider does not publish. HTTP 400. */
export class KeyNotFoundException extends AuthException {
  constructor(keyId: string) {
    super(
      'invalid_header',
      `Unable to find the appropriate key. (kid "${keyId}")`,
      HttpStatus.BAD_REQUEST,
    );
  }
}

/** Token could not be parsed or its signature did not verify. HTTP 400. */
export class InvalidHeaderException extends AuthException {
  constructor(cause?: Error) {
    super(
      'invalid_header',
      'Unable to parse authentication token.',
      HttpStatus.BAD_REQUEST,
      cause,
    );
  }
}

/** Token `exp` is in the past. HTTP 401. */
export class TokenExpiredException extends AuthException {
  constructor(cause?: Error) {
    super('token_expired', 'Token expired.', HttpStatus.UNAUTHORIZED, cause);
  }
}

/**
 * Claims are wrong: audience/issuer mismatch (401) or no permissions claim
 * at all (400).
 */
export class InvalidClaimsException extends AuthException {
  constructor(description: string, status: HttpStatus, cause?: Error) {
    super('invalid_claims', description, status, cause);
  }
}

/** The identity provider's key set could not be fetched or read. HTTP 401. */
export class KeySetUnavailableException extends AuthException {
  constructor(cause: Error) {
    super(
      'key_set_unavailable',
      'Unable to fetch the signing keys.',
      HttpStatus.UNAUTHORIZED,
      cause,
    );
  }
}

/** Token is valid but lacks the required permission. HTTP 401. */
export class PermissionDeniedException extends AuthException {
  constructor() {
    super('unauthorized', 'Permission not found.', HttpStatus.UNAUTHORIZED);
  }
}
