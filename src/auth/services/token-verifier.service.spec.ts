import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { Test } from '@nestjs/testing';
import { TestTokenIssuer } from '../../../test/helpers/test-token-issuer';
import {
  InvalidClaimsException,
  InvalidHeaderException,
  KeyNotFoundException,
  KeySetUnavailableException,
  MalformedHeaderException,
  TokenExpiredException,
} from '../exceptions/auth.exceptions';
import { KeyResolverService, KeySetFetchError } from './key-resolver.service';
import { TokenVerifierService } from './token-verifier.service';

describe('TokenVerifierService', () => {
  const issuer = new TestTokenIssuer();
  const resolve = jest.fn();
  let verifier: TokenVerifierService;

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        TokenVerifierService,
        JwtService,
        ConfigService,
        { provide: KeyResolverService, useValue: { resolve } },
      ],
    }).compile();

    verifier = moduleRef.get(TokenVerifierService);
  });

  beforeEach(() => {
    resolve.mockReset();
    resolve.mockResolvedValue(issuer.keySet());
  });

  it('returns the claims of a valid token unchanged', async () => {
    const token = issuer.sign({ permissions: ['post:drinks'], nickname: 'barista' });

    const claims = await verifier.verify(token);

    expect(claims).toMatchObject({
      sub: 'auth0|barista',
      iss: 'https://test-tenant.example.com/',
      aud: 'drinks',
      permissions: ['post:drinks'],
      nickname: 'barista',
    });
  });

  it('rejects a token that cannot be decoded', async () => {
    await expect(verifier.verify('not-a-jwt')).rejects.toThrow(
      InvalidHeaderException,
    );
    expect(resolve).not.toHaveBeenCalled();
  });

  it('rejects a token without a key id', async () => {
    const jwtService = new JwtService();
    const token = jwtService.sign({ sub: 'auth0|barista' }, { secret: 'test-secret' });

    await expect(verifier.verify(token)).rejects.toThrow(
      new MalformedHeaderException('Authorization malformed.'),
    );
  });

  it('rejects a key id the provider does not publish', async () => {
    const token = issuer.sign({}, 'rotated-key');

    await expect(verifier.verify(token)).rejects.toThrow(
      'Unable to find the appropriate key. (kid "rotated-key")',
    );
    await expect(verifier.verify(token)).rejects.toBeInstanceOf(
      KeyNotFoundException,
    );
  });

  it('reports an unreachable key set as 401, not 5xx', async () => {
    resolve.mockRejectedValue(new KeySetFetchError('Key set request failed: 500 '));

    const failure = verifier.verify(issuer.sign());

    await expect(failure).rejects.toBeInstanceOf(KeySetUnavailableException);
    await expect(failure).rejects.toMatchObject({ status: 401 });
  });

  it('rejects an expired token', async () => {
    await expect(verifier.verify(issuer.signExpired())).rejects.toThrow(
      new TokenExpiredException(),
    );
  });

  it('rejects a token for another audience', async () => {
    const token = issuer.sign({ aud: 'another-api' });

    const failure = verifier.verify(token);

    await expect(failure).rejects.toBeInstanceOf(InvalidClaimsException);
    await expect(failure).rejects.toThrow(
      'Incorrect claims. Please, check the audience and issuer.',
    );
  });

  it('rejects a token from another issuer', async () => {
    const token = issuer.sign({ iss: 'https://elsewhere.example.com/' });

    await expect(verifier.verify(token)).rejects.toBeInstanceOf(
      InvalidClaimsException,
    );
  });

  it('rejects a token signed by a different key under the same kid', async () => {
    const impostor = new TestTokenIssuer();

    await expect(verifier.verify(impostor.sign())).rejects.toThrow(
      new InvalidHeaderException(),
    );
  });
});
