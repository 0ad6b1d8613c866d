import fs from 'fs/promises';
import path from 'path';
import { database } from '../database/connection';
import { logger } from '../logger';

export const DEFAULT_MIGRATIONS_PATH = path.resolve(process.cwd(), 'migrations');

/**
 * Applies pending `.sql` files in name order, each inside its own transaction,
 * and records them in the `_migrations` table.
 */
export class MigrationService {
  private readonly migrationTable = '_migrations';

  constructor(private readonly migrationPath: string = DEFAULT_MIGRATIONS_PATH) {}

  /**
   * @returns The file names applied during this run.
   */
  async run(): Promise<string[]> {
    logger.info(`Checking for database migrations in: ${this.migrationPath}`);

    await this.ensureMigrationTable();

    const files = await this.getMigrationFiles();
    if (files.length === 0) {
      logger.info('No migration files found.');
      return [];
    }

    const executed = await this.getExecutedMigrations();
    const pending = files.filter((f) => !executed.includes(f));

    if (pending.length === 0) {
      logger.info('Database is up to date.');
      return [];
    }

    logger.info(`Found ${pending.length} pending migrations.`);

    for (const file of pending) {
      await this.runMigration(file);
    }

    logger.info('All migrations executed successfully.');
    return pending;
  }

  private async ensureMigrationTable(): Promise<void> {
    await database.query(
      `CREATE TABLE IF NOT EXISTS ${this.migrationTable} (id SERIAL PRIMARY KEY, name VARCHAR(255) NOT NULL UNIQUE, executed_at TIMESTAMPTZ DEFAULT NOW())`
    );
  }

  private async getMigrationFiles(): Promise<string[]> {
    try {
      const files = await fs.readdir(this.migrationPath);
      return files.filter((f) => f.endsWith('.sql')).sort();
    } catch (error) {
      logger.warn(`Migration directory not found: ${this.migrationPath}`, {
        error: (error as Error).message,
      });
      return [];
    }
  }

  private async getExecutedMigrations(): Promise<string[]> {
    const result = await database.query<{ name: string }>(`SELECT name FROM ${this.migrationTable}`);
    return result.rows.map((r) => r.name);
  }

  private async runMigration(filename: string): Promise<void> {
    const filePath = path.join(this.migrationPath, filename);
    const sqlContent = await fs.readFile(filePath, 'utf-8');

    logger.info(`Executing migration: ${filename}`);
    const client = await database.getClient();

    try {
      await client.query('BEGIN');
      await client.query(sqlContent);
      await client.query(`INSERT INTO ${this.migrationTable} (name) VALUES ($1)`, [filename]);
      await client.query('COMMIT');
      logger.info(`Migration ${filename} completed.`);
    } catch (error) {
      await client.query('ROLLBACK');
      logger.error(`Migration ${filename} failed!`, { error: (error as Error).message });
      throw error;
    } finally {
      client.release();
    }
  }
}
