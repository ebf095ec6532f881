import { HttpStatus } from '@nestjs/common';
import {
  InvalidClaimsException,
  PermissionDeniedException,
} from '../exceptions/auth.exceptions';
import { PermissionGateService } from './permission-gate.service';

describe('PermissionGateService', () => {
  const gate = new PermissionGateService();

  it('passes when the permission is granted', () => {
    expect(
      gate.check('post:drinks', { permissions: ['get:drinks-detail', 'post:drinks'] }),
    ).toBe(true);
  });

  it('fails with 400 when the permissions claim is absent', () => {
    const check = (): true => gate.check('post:drinks', { sub: 'auth0|barista' });

    expect(check).toThrow(InvalidClaimsException);
    expect(check).toThrow('Permissions not included in JWT.');
    try {
      check();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidClaimsException);
      if (error instanceof InvalidClaimsException) {
        expect(error.getStatus()).toBe(HttpStatus.BAD_REQUEST);
        expect(error.code).toBe('invalid_claims');
      }
    }
  });

  it('fails with 401 when the permission is not in the list', () => {
    const check = (): true =>
      gate.check('delete:drinks', { permissions: ['get:drinks-detail'] });

    expect(check).toThrow(PermissionDeniedException);
    expect(check).toThrow('Permission not found.');
  });

  it('fails with 401 when the permissions claim is not a list', () => {
    expect(() =>
      gate.check('post:drinks', { permissions: 'post:drinks' }),
    ).toThrow(PermissionDeniedException);
  });

  it('does not match permissions by prefix', () => {
    expect(() =>
      gate.check('post:drinks', { permissions: ['post:drinks-detail'] }),
    ).toThrow(PermissionDeniedException);
  });
});
