// src/shared/constants/index.ts
import fs from 'fs';
import path from 'path';

// Read package.json at runtime so the version is not compiled into dist/.
const packageJsonPath = path.resolve(process.cwd(), 'package.json');
let packageVersion = '0.0.0';

try {
  const fileContent = fs.readFileSync(packageJsonPath, 'utf-8');
  const pkg: unknown = JSON.parse(fileContent);
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    packageVersion = pkg.version;
  }
} catch (error) {
  console.error('Failed to read package.json version:', error);
}

export const APP_VERSION = packageVersion;

export const SERVICE_NAME = 'dairy-cooperative-backoffice';

/**
 * The single operator account accepted by the login endpoints.
 */
export const ADMIN_CREDENTIALS = Object.freeze({
  USERNAME: 'admin',
  PASSWORD: 'admin123',
  ROLE: 'Admin',
} as const);

/**
 * Logger configuration.
 */
export const LOG_CONFIG = Object.freeze({
  DATE_FORMAT: 'YYYY-MM-DD HH:mm:ss',
  MAX_SIZE: 5242880, // 5MB
  MAX_FILES: 5,
} as const);

export const DATABASE_DEFAULTS = Object.freeze({
  PORT: 5432,
  MAX_CONNECTIONS: 10,
  MIN_CONNECTIONS: 2,
  IDLE_TIMEOUT_MS: 30000,
  CONNECTION_TIMEOUT_MS: 5000,
} as const);

export const AUTH_DEFAULTS = Object.freeze({
  JWT_ISSUER: 'dairy-cooperative',
  JWT_AUDIENCE: 'dairy-cooperative-clients',
  TOKEN_TTL_SECONDS: 3600,
  SESSION_COOKIE: 'dairy.sid',
  SESSION_MAX_AGE_MS: 8 * 60 * 60 * 1000,
} as const);

export const HTTP_DEFAULTS = Object.freeze({
  PORT: 5000,
  LIST_LIMIT: 100,
  MAX_LIST_LIMIT: 1000,
} as const);

/**
 * Largest values the NUMERIC(4,2), NUMERIC(8,2) and NUMERIC(12,2) columns hold.
 */
export const NUMERIC_LIMITS = Object.freeze({
  PERCENT: 99.99,
  MEASURE: 999999.99,
  AMOUNT: 9999999999.99,
} as const);
