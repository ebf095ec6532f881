import { HttpStatus } from '@nestjs/common';
import {
  MalformedHeaderException,
  MissingHeaderException,
} from '../exceptions/auth.exceptions';
import { TokenExtractorService } from './token-extractor.service';

describe('TokenExtractorService', () => {
  const extractor = new TokenExtractorService();

  it('returns the token of a Bearer header', () => {
    expect(extractor.extract('Bearer abc.def.ghi')).toBe('abc.def.ghi');
  });

  it('accepts the scheme in any case', () => {
    expect(extractor.extract('bEaReR abc.def.ghi')).toBe('abc.def.ghi');
  });

  it.each([undefined, '', '   '])('rejects a missing header (%p)', (header) => {
    expect(() => extractor.extract(header)).toThrow(MissingHeaderException);
  });

  it('reports a missing header as 401 authorization_header_missing', () => {
    try {
      extractor.extract(undefined);
      throw new Error('expected extract() to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(MissingHeaderException);
      if (error instanceof MissingHeaderException) {
        expect(error.getStatus()).toBe(HttpStatus.UNAUTHORIZED);
        expect(error.code).toBe('authorization_header_missing');
        expect(error.getResponse()).toEqual({
          statusCode: 401,
          error: 'authorization_header_missing',
          message: 'Authorization header is expected.',
        });
      }
    }
  });

  it('rejects a non-Bearer scheme', () => {
    expect(() => extractor.extract('Basic dXNlcjpwYXNz')).toThrow(
      new MalformedHeaderException(
        'Authorization header must start with "Bearer".',
      ),
    );
  });

  it('rejects a scheme without a token', () => {
    expect(() => extractor.extract('Bearer')).toThrow(
      new MalformedHeaderException('Token not found.'),
    );
  });

  it('rejects extra parts after the token', () => {
    expect(() => extractor.extract('Bearer abc def')).toThrow(
      new MalformedHeaderException('Authorization header must be bearer token.'),
    );
  });
});
