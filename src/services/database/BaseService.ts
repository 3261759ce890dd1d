import { QueryResultRow } from 'pg';
import { query as defaultQuery, QueryFn } from '../../config/database';
import {
  ConflictError,
  NotFoundError,
  TransientStorageError,
  ValidationError,
  errorMessage
} from '../../core/errors';
import { Logger, logger as defaultLogger } from '../../utils/logger';

const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EPIPE', 'EAI_AGAIN']);

interface PgErrorFields {
  code?: string;
  constraint?: string;
  detail?: string;
}

function pgFields(error: unknown): PgErrorFields {
  if (typeof error !== 'object' || error === null) {
    return {};
  }
  const pick = (name: string): string | undefined => {
    const value: unknown = Reflect.get(error, name);
    return typeof value === 'string' ? value : undefined;
  };
  return { code: pick('code'), constraint: pick('constraint'), detail: pick('detail') };
}

function isConnectionFailure(code: string | undefined, message: string): boolean {
  if (code && (CONNECTION_ERROR_CODES.has(code) || code.startsWith('08') || code.startsWith('57P'))) {
    return true;
  }
  return /timeout exceeded when trying to connect|Connection terminated/i.test(message);
}

export abstract class BaseService {
  constructor(
    protected logger: Logger = defaultLogger,
    protected runQuery: QueryFn = defaultQuery
  ) {}

  protected async executeQuery<T extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[] = []): Promise<T[]> {
    const result = await this.execute<T>(sql, params);
    return result.rows;
  }

  protected async executeSingleQuery<T extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[] = []): Promise<T | null> {
    const results = await this.executeQuery<T>(sql, params);
    return results.length > 0 ? results[0] : null;
  }

  /**
   * Runs a statement and returns how many rows it touched.
   */
  protected async executeCommand(sql: string, params: unknown[] = []): Promise<number> {
    const result = await this.execute(sql, params);
    return result.rowCount ?? 0;
  }

  private async execute<T extends QueryResultRow>(sql: string, params: unknown[]) {
    try {
      return await this.runQuery<T>(sql, params);
    } catch (error) {
      throw this.translateError(error, sql);
    }
  }

  private translateError(error: unknown, sql: string): Error {
    const { code, constraint, detail } = pgFields(error);
    const message = errorMessage(error);

    if (code === '23503') {
      this.logger.warn('Foreign key violation', { constraint, detail });
      return new NotFoundError('Referenced record does not exist', detail);
    }
    if (code === '23505') {
      this.logger.error('Duplicate key violation', { constraint, detail });
      return new ConflictError(constraint, detail);
    }
    if (code === '22P02') {
      this.logger.warn('Invalid identifier supplied to query', { detail });
      return new ValidationError('Invalid identifier', detail);
    }
    if (isConnectionFailure(code, message)) {
      this.logger.error('Database unavailable:', message);
      return new TransientStorageError(`Database unavailable: ${message}`);
    }
    this.logger.error(`Database query error: ${sql}`, error);
    return new Error(`Database error: ${message}`);
  }
}
