/**
 * Identifies a database family. Dialects are interned by upper-cased name, so
 * `Dialect.of('postgres') === Dialect.POSTGRES` and registries can key on identity.
 */
export class Dialect {
  private static readonly known = new Map<string, Dialect>();

  static readonly ANSI = Dialect.of('ANSI');
  static readonly POSTGRES = Dialect.of('POSTGRES');
  static readonly MYSQL = Dialect.of('MYSQL');
  static readonly SQLITE = Dialect.of('SQLITE');
  static readonly MSSQL = Dialect.of('MSSQL');

  private constructor(public readonly name: string) {}

  static of(name: string): Dialect {
    const key = name.trim().toUpperCase();
    let dialect = Dialect.known.get(key);
    if (!dialect) {
      dialect = new Dialect(key);
      Dialect.known.set(key, dialect);
    }
    return dialect;
  }

  /** Maps a knex client name (or DB_TYPE value) onto a dialect; unknown clients are ANSI. */
  static fromClient(client: string | undefined): Dialect {
    switch (client?.toLowerCase()) {
      case 'pg':
      case 'pgnative':
      case 'postgres':
      case 'postgresql':
        return Dialect.POSTGRES;
      case 'mysql':
      case 'mysql2':
      case 'mariadb':
        return Dialect.MYSQL;
      case 'sqlite':
      case 'sqlite3':
      case 'better-sqlite3':
        return Dialect.SQLITE;
      case 'mssql':
      case 'sqlserver':
        return Dialect.MSSQL;
      default:
        return Dialect.ANSI;
    }
  }

  toString(): string {
    return this.name;
  }
}
