import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Knex, knex } from 'knex';
import { ConfigurationException } from '../../core/exceptions/custom-exceptions';
import { maskDatabaseUri, parseDatabaseUri } from './utils/uri-parser';

export type DatabaseType = 'postgres' | 'mysql' | 'sqlite' | 'mssql';

const CLIENTS: Record<DatabaseType, string> = {
  postgres: 'pg',
  mysql: 'mysql2',
  sqlite: 'better-sqlite3',
  mssql: 'mssql',
};

const DEFAULT_PORTS: Record<DatabaseType, number> = {
  postgres: 5432,
  mysql: 3306,
  sqlite: 0,
  mssql: 1433,
};

export interface DatabaseSettings {
  type: DatabaseType;
  host: string;
  port: number;
  user: string;
  password: string;
  /** Database name, or the file path for SQLite. */
  database: string;
  poolMin: number;
  poolMax: number;
  acquireTimeout: number;
}

export function isDatabaseType(value: string): value is DatabaseType {
  return Object.prototype.hasOwnProperty.call(CLIENTS, value);
}

/**
 * Reads DB_TYPE and either DB_URI or DB_HOST/DB_PORT/DB_USERNAME/DB_PASSWORD/DB_NAME,
 * plus the DB_POOL_* and DB_ACQUIRE_TIMEOUT pool settings.
 */
export function readDatabaseSettings(configService: ConfigService, logger?: Logger): DatabaseSettings {
  const rawType = (configService.get<string>('DB_TYPE') || 'postgres').toLowerCase();
  const type = rawType === 'postgresql' ? 'postgres' : rawType;
  if (!isDatabaseType(type)) {
    throw new ConfigurationException(
      `Unsupported DB_TYPE '${rawType}'. Supported: ${Object.keys(CLIENTS).join(', ')}`,
      'DB_TYPE',
    );
  }

  const pool = {
    poolMin: readInt(configService, 'DB_POOL_MIN_SIZE', 2),
    poolMax: readInt(configService, 'DB_POOL_MAX_SIZE', 10),
    acquireTimeout: readInt(configService, 'DB_ACQUIRE_TIMEOUT', 10000),
  };

  const uri = configService.get<string>('DB_URI');
  if (uri && type !== 'sqlite') {
    const parsed = parseDatabaseUri(uri);
    logger?.log(`Using database URI: ${maskDatabaseUri(uri)}`);
    return {
      type,
      host: parsed.host,
      port: parsed.port,
      user: parsed.user,
      password: parsed.password,
      database: parsed.database,
      ...pool,
    };
  }

  return {
    type,
    host: configService.get<string>('DB_HOST') || 'localhost',
    port: readInt(configService, 'DB_PORT', DEFAULT_PORTS[type]),
    user: configService.get<string>('DB_USERNAME') || '',
    password: configService.get<string>('DB_PASSWORD') || '',
    database: configService.get<string>('DB_NAME') || (type === 'sqlite' ? ':memory:' : ''),
    ...pool,
  };
}

export function buildKnexConfig(settings: DatabaseSettings): Knex.Config {
  if (settings.poolMin > settings.poolMax) {
    throw new ConfigurationException(
      `DB_POOL_MIN_SIZE (${settings.poolMin}) exceeds DB_POOL_MAX_SIZE (${settings.poolMax})`,
      'DB_POOL_MIN_SIZE',
    );
  }

  if (settings.type === 'sqlite') {
    return {
      client: CLIENTS.sqlite,
      connection: { filename: settings.database },
      useNullAsDefault: true,
    };
  }

  if (!settings.database) {
    throw new ConfigurationException('Database name is required', 'DB_NAME');
  }

  return {
    client: CLIENTS[settings.type],
    connection: {
      host: settings.host,
      port: settings.port,
      user: settings.user,
      password: settings.password,
      database: settings.database,
    },
    pool: {
      min: settings.poolMin,
      max: settings.poolMax,
    },
    acquireConnectionTimeout: settings.acquireTimeout,
    debug: false,
  };
}

export function createKnex(settings: DatabaseSettings): Knex {
  return knex(buildKnexConfig(settings));
}

function readInt(configService: ConfigService, key: string, fallback: number): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = typeof raw === 'number' ? raw : parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationException(`${key} must be an integer, got '${raw}'`, key);
  }
  return parsed;
}
