import jwt from 'jsonwebtoken';
import { describe, expect, it } from 'vitest';
import { AuthService } from '../../src/modules/auth/application/auth.service';
import { AuthenticationError } from '../../src/shared/errors/auth.error';

const options = {
  jwtKey: 'test-secret',
  jwtIssuer: 'dairy-cooperative',
  jwtAudience: 'dairy-cooperative-clients',
  tokenTtlSeconds: 3600,
};

describe('AuthService', () => {
  const service = new AuthService(options);

  it('accepts only the operator account', () => {
    expect(service.verifyCredentials('admin', 'admin123')).toEqual({ username: 'admin', role: 'Admin' });
    expect(service.verifyCredentials('admin', 'admin1234')).toBeNull();
    expect(service.verifyCredentials('root', 'admin123')).toBeNull();
  });

  it('issues HS256 tokens carrying issuer, audience, subject and role', () => {
    const { accessToken, tokenType, expiresIn } = service.issueToken({ username: 'admin', role: 'Admin' });
    const decoded = jwt.decode(accessToken, { complete: true });

    expect(tokenType).toBe('Bearer');
    expect(expiresIn).toBe(3600);
    expect(decoded?.header.alg).toBe('HS256');
    expect(decoded?.payload).toMatchObject({
      sub: 'admin',
      role: 'Admin',
      iss: 'dairy-cooperative',
      aud: 'dairy-cooperative-clients',
    });
  });

  it('round-trips its own tokens', () => {
    const { accessToken } = service.issueToken({ username: 'admin', role: 'Admin' });
    expect(service.verifyToken(accessToken)).toEqual({ username: 'admin', role: 'Admin' });
  });

  it('rejects tokens for another audience', () => {
    const foreign = new AuthService({ ...options, jwtAudience: 'someone-else' });
    const { accessToken } = foreign.issueToken({ username: 'admin', role: 'Admin' });

    expect(() => service.verifyToken(accessToken)).toThrow(AuthenticationError);
  });

  it('reports expired tokens', () => {
    const expired = jwt.sign({ role: 'Admin' }, options.jwtKey, {
      subject: 'admin',
      issuer: options.jwtIssuer,
      audience: options.jwtAudience,
      expiresIn: -10,
    });

    expect(() => service.verifyToken(expired)).toThrow('Token expired');
  });
});
