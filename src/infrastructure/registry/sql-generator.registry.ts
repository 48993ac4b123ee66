import { AnsiSqlGenerator } from '../sql/generators/ansi-sql.generator';
import { MsSqlSqlGenerator } from '../sql/generators/mssql-sql.generator';
import { MySqlSqlGenerator } from '../sql/generators/mysql-sql.generator';
import { PostgresSqlGenerator } from '../sql/generators/postgres-sql.generator';
import { SqliteSqlGenerator } from '../sql/generators/sqlite-sql.generator';
import { Dialect } from '../sql/dialect';
import { SqlGenerator } from '../sql/interfaces/sql-generator.interface';

export class SqlGeneratorRegistry {
  private readonly generators = new Map<Dialect, SqlGenerator>();

  constructor(private readonly fallback: SqlGenerator = new AnsiSqlGenerator()) {}

  static withDefaults(): SqlGeneratorRegistry {
    return new SqlGeneratorRegistry()
      .register(Dialect.POSTGRES, new PostgresSqlGenerator())
      .register(Dialect.MYSQL, new MySqlSqlGenerator())
      .register(Dialect.SQLITE, new SqliteSqlGenerator())
      .register(Dialect.MSSQL, new MsSqlSqlGenerator());
  }

  register(dialect: Dialect, generator: SqlGenerator): this {
    this.generators.set(dialect, generator);
    return this;
  }

  /** Never fails: an unknown or missing dialect resolves to generic SQL. */
  resolve(dialect?: Dialect | null): SqlGenerator {
    return (dialect && this.generators.get(dialect)) || this.fallback;
  }

  has(dialect: Dialect): boolean {
    return this.generators.has(dialect);
  }
}
