// src/infra/config/config.ts
import dotenv from 'dotenv';
import { ValidationError } from '../../shared/errors/validation.error';
import { AUTH_DEFAULTS, DATABASE_DEFAULTS, HTTP_DEFAULTS } from '../../shared/constants';

dotenv.config();

export type NodeEnv = 'development' | 'production' | 'test';

export interface AppConfig {
  database: {
    url: string;
    maxConnections: number;
    minConnections: number;
    ssl: boolean;
  };
  auth: {
    jwtKey: string;
    jwtIssuer: string;
    jwtAudience: string;
    tokenTtlSeconds: number;
    sessionSecret: string;
  };
  http: {
    port: number;
  };
  app: {
    nodeEnv: NodeEnv;
    logLevel: string;
  };
}

type Env = Record<string, string | undefined>;

/**
 * Loads and validates configuration from environment variables (`.env`).
 */
export class ConfigManager {
  private config: AppConfig | null = null;

  /**
   * Builds the configuration from the given environment.
   * * @throws {ValidationError} If required environment variables are missing
   * or a numeric variable does not parse.
   */
  load(env: Env = process.env): AppConfig {
    if (this.config) return this.config;

    const requiredVars = ['DATABASE_URL', 'JWT_KEY'];
    const missing = requiredVars.filter((key) => !env[key]);
    if (missing.length > 0) {
      throw new ValidationError(`Missing required env vars: ${missing.join(', ')}`);
    }

    const databaseUrl = env.DATABASE_URL ?? '';
    const jwtKey = env.JWT_KEY ?? '';

    this.config = {
      database: {
        url: databaseUrl,
        maxConnections: this.parseInteger(env, 'DB_MAX_CONNECTIONS', DATABASE_DEFAULTS.MAX_CONNECTIONS),
        minConnections: this.parseInteger(env, 'DB_MIN_CONNECTIONS', DATABASE_DEFAULTS.MIN_CONNECTIONS),
        ssl: env.DB_SSL !== 'false',
      },
      auth: {
        jwtKey,
        jwtIssuer: env.JWT_ISSUER || AUTH_DEFAULTS.JWT_ISSUER,
        jwtAudience: env.JWT_AUDIENCE || AUTH_DEFAULTS.JWT_AUDIENCE,
        tokenTtlSeconds: this.parseInteger(env, 'JWT_TTL_SECONDS', AUTH_DEFAULTS.TOKEN_TTL_SECONDS),
        sessionSecret: env.SESSION_SECRET || jwtKey,
      },
      http: {
        port: this.parseInteger(env, 'PORT', HTTP_DEFAULTS.PORT),
      },
      app: {
        nodeEnv: this.parseNodeEnv(env.NODE_ENV),
        logLevel: env.LOG_LEVEL || 'info',
      },
    };

    return this.config;
  }

  /**
   * Retrieves the current configuration object.
   * * @throws {Error} If the configuration has not been initialized via `load()`.
   */
  get(): AppConfig {
    if (!this.config) throw new Error('Configuration not initialized.');
    return this.config;
  }

  reset(): void {
    this.config = null;
  }

  private parseInteger(env: Env, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw === '') return fallback;

    const value = Number.parseInt(raw, 10);
    if (Number.isNaN(value)) {
      throw new ValidationError(`Env var ${key} must be an integer`, { [key]: raw });
    }
    return value;
  }

  private parseNodeEnv(value: string | undefined): NodeEnv {
    switch (value) {
      case 'production':
      case 'test':
        return value;
      default:
        return 'development';
    }
  }
}

export const configManager = new ConfigManager();
