import jwt from 'jsonwebtoken';
import { ADMIN_CREDENTIALS } from '../../../shared/constants';
import { AuthenticationError } from '../../../shared/errors/auth.error';
import { IssuedToken, Principal } from '../domain/principal';

export interface AuthOptions {
  jwtKey: string;
  jwtIssuer: string;
  jwtAudience: string;
  tokenTtlSeconds: number;
}

export class AuthService {
  constructor(private readonly options: AuthOptions) {}

  /**
   * Only the built-in operator account is accepted.
   */
  verifyCredentials(username: string, password: string): Principal | null {
    if (username === ADMIN_CREDENTIALS.USERNAME && password === ADMIN_CREDENTIALS.PASSWORD) {
      return { username: ADMIN_CREDENTIALS.USERNAME, role: ADMIN_CREDENTIALS.ROLE };
    }
    return null;
  }

  issueToken(principal: Principal): IssuedToken {
    const accessToken = jwt.sign({ role: principal.role }, this.options.jwtKey, {
      algorithm: 'HS256',
      subject: principal.username,
      issuer: this.options.jwtIssuer,
      audience: this.options.jwtAudience,
      expiresIn: this.options.tokenTtlSeconds,
    });

    return { tokenType: 'Bearer', accessToken, expiresIn: this.options.tokenTtlSeconds };
  }

  /**
   * @throws {AuthenticationError} For expired, tampered or foreign tokens.
   */
  verifyToken(token: string): Principal {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.options.jwtKey, {
        algorithms: ['HS256'],
        issuer: this.options.jwtIssuer,
        audience: this.options.jwtAudience,
      });
    } catch (error) {
      throw new AuthenticationError(
        error instanceof jwt.TokenExpiredError ? 'Token expired' : 'Invalid token'
      );
    }

    if (typeof payload === 'string' || typeof payload.sub !== 'string') {
      throw new AuthenticationError('Invalid token');
    }

    return {
      username: payload.sub,
      role: typeof payload.role === 'string' ? payload.role : 'User',
    };
  }
}
