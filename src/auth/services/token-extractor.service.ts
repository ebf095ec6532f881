import { Injectable } from '@nestjs/common';
import {
  MalformedHeaderException,
  MissingHeaderException,
} from '../exceptions/auth.exceptions';

/**
 * Pulls the raw token out of an `Authorization: Bearer <token>` header.
 */
@Injectable()
export class TokenExtractorService {
  /**
   * @throws MissingHeaderException if the header is absent or empty
   * @throws MalformedHeaderException if the scheme is not Bearer or the
   *         header is not exactly "<scheme> <token>"
   */
  extract(authorization: string | undefined): string {
    if (!authorization || authorization.trim() === '') {
      throw new MissingHeaderException();
    }

    const parts = authorization.trim().split(/\s+/);

    if (parts[0].toLowerCase() !== 'bearer') {
      throw new MalformedHeaderException(
        'Authorization header must start with "Bearer".',
      );
    }

    if (parts.length === 1) {
      throw new MalformedHeaderException('Token not found.');
    }

    if (parts.length > 2) {
      throw new MalformedHeaderException(
        'Authorization header must be bearer token.',
      );
    }

    return parts[1];
  }
}
