import 'reflect-metadata';
import { MissingIdException } from '../../../src/core/exceptions/custom-exceptions';
import { FieldMetadata } from '../../../src/core/metadata/field-metadata';
import { MetadataCache } from '../../../src/core/metadata/metadata-cache';
import { SqlGeneratorRegistry } from '../../../src/infrastructure/registry/sql-generator.registry';
import { Dialect } from '../../../src/infrastructure/sql/dialect';
import { AnsiSqlGenerator } from '../../../src/infrastructure/sql/generators/ansi-sql.generator';
import { MsSqlSqlGenerator } from '../../../src/infrastructure/sql/generators/mssql-sql.generator';
import { MySqlSqlGenerator } from '../../../src/infrastructure/sql/generators/mysql-sql.generator';
import { PostgresSqlGenerator } from '../../../src/infrastructure/sql/generators/postgres-sql.generator';
import { SqliteSqlGenerator } from '../../../src/infrastructure/sql/generators/sqlite-sql.generator';
import { Column } from '../../../src/shared/decorators/column.decorator';
import { Json } from '../../../src/shared/decorators/converter.decorators';
import { GeneratedId, Id } from '../../../src/shared/decorators/id.decorator';
import { Table } from '../../../src/shared/decorators/table.decorator';

@Table({ name: 'users', schema: 'app' })
class User {
  @GeneratedId()
  id?: number;

  @Column('user_name')
  name?: string;

  @Column()
  @Json()
  settings?: Record<string, unknown>;
}

class Tag {
  @Id()
  code?: string;

  @Column()
  label?: string;
}

class Note {
  @Column()
  body?: string;
}

class Item {
  @Id()
  @Column('item-id')
  id?: string;

  @Column('unit-price')
  price?: number;

  @Column('unit_price')
  legacyPrice?: number;
}

class NumberedPlaceholderGenerator extends AnsiSqlGenerator {
  getPlaceholder(field: FieldMetadata): string {
    return `${super.getPlaceholder(field)}::${field.valueType}`;
  }
}

class TextCastingGenerator extends PostgresSqlGenerator {
  getPlaceholder(field: FieldMetadata): string {
    const placeholder = super.getPlaceholder(field);
    return field.valueType === 'string' ? `${placeholder}::text` : placeholder;
  }
}

describe('SQL generators', () => {
  const cache = new MetadataCache();
  const user = cache.getMetadata(User);
  const tag = cache.getMetadata(Tag);
  const note = cache.getMetadata(Note);
  const item = cache.getMetadata(Item);

  describe('AnsiSqlGenerator', () => {
    const generator = new AnsiSqlGenerator();

    it('should generate an INSERT without the generated id', () => {
      expect(generator.generateInsert(user, user.getInsertableFields())).toBe(
        'INSERT INTO app.users (user_name, settings) VALUES (:user_name, :settings)',
      );
    });

    it('should generate an UPDATE keyed by id', () => {
      expect(generator.generateUpdate(user, user.getNonIdFields())).toBe(
        'UPDATE app.users SET user_name = :user_name, settings = :settings WHERE id = :id',
      );
    });

    it('should generate the read statements', () => {
      expect(generator.generateSelect(tag)).toBe('SELECT * FROM Tag');
      expect(generator.generateSelectById(tag)).toBe('SELECT * FROM Tag WHERE code = :code');
      expect(generator.generateCount(tag)).toBe('SELECT COUNT(*) FROM Tag');
      expect(generator.generateExistsById(user)).toBe('SELECT COUNT(*) FROM app.users WHERE id = :id');
    });

    it('should page with LIMIT and OFFSET', () => {
      expect(generator.generatePaginated('SELECT * FROM Tag ')).toBe('SELECT * FROM Tag LIMIT :_limit OFFSET :_offset');
    });

    it('should wrap a query for counting', () => {
      expect(generator.generateCountWrapper('SELECT * FROM Tag ORDER BY label')).toBe(
        'SELECT COUNT(*) FROM (SELECT * FROM Tag ORDER BY label) AS count_query',
      );
    });

    it('should throw MissingIdException for id statements on a class without id', () => {
      expect(() => generator.generateDelete(note)).toThrow(MissingIdException);
      expect(() => generator.generateDelete(note)).toThrow('Cannot delete Note: entity has no @Id field');
      expect(() => generator.generateSelectByIds(note, 2)).toThrow('Cannot find by ids Note');
    });
  });

  describe('PostgresSqlGenerator', () => {
    const generator = new PostgresSqlGenerator();

    it('should quote identifiers, cast JSON and return the generated id', () => {
      expect(generator.generateInsert(user, user.getInsertableFields())).toBe(
        'INSERT INTO "app"."users" ("user_name", "settings") VALUES (:user_name, CAST(:settings AS jsonb)) RETURNING "id"',
      );
    });

    it('should omit RETURNING when the id is assigned by the caller', () => {
      expect(generator.generateInsert(tag, tag.getInsertableFields())).toBe(
        'INSERT INTO "Tag" ("code", "label") VALUES (:code, :label)',
      );
    });

    it('should cast JSON in UPDATE assignments', () => {
      expect(generator.generateUpdate(user, user.getNonIdFields())).toBe(
        'UPDATE "app"."users" SET "user_name" = :user_name, "settings" = CAST(:settings AS jsonb) WHERE "id" = :id',
      );
    });

    it('should number the placeholders of an IN list', () => {
      expect(generator.generateSelectByIds(user, 3)).toBe(
        'SELECT * FROM "app"."users" WHERE "id" IN (:id_0, :id_1, :id_2)',
      );
    });

    it('should escape embedded quotes', () => {
      expect(generator.quoteIdentifier('we"ird')).toBe('"we""ird"');
    });
  });

  describe('MySqlSqlGenerator', () => {
    const generator = new MySqlSqlGenerator();

    it('should use backticks and no RETURNING', () => {
      expect(generator.generateInsert(user, user.getInsertableFields())).toBe(
        'INSERT INTO `app`.`users` (`user_name`, `settings`) VALUES (:user_name, :settings)',
      );
      expect(generator.generateDelete(user)).toBe('DELETE FROM `app`.`users` WHERE `id` = :id');
    });
  });

  describe('SqliteSqlGenerator', () => {
    const generator = new SqliteSqlGenerator();

    it('should return the generated id', () => {
      expect(generator.generateInsert(user, user.getInsertableFields())).toBe(
        'INSERT INTO "app"."users" ("user_name", "settings") VALUES (:user_name, :settings) RETURNING "id"',
      );
      expect(generator.generateSelectById(user)).toBe('SELECT * FROM "app"."users" WHERE "id" = :id');
    });
  });

  describe('MsSqlSqlGenerator', () => {
    const generator = new MsSqlSqlGenerator();

    it('should put OUTPUT before VALUES', () => {
      expect(generator.generateInsert(user, user.getInsertableFields())).toBe(
        'INSERT INTO [app].[users] ([user_name], [settings]) OUTPUT INSERTED.[id] VALUES (:user_name, :settings)',
      );
      expect(generator.generateCount(user)).toBe('SELECT COUNT(*) FROM [app].[users]');
      expect(generator.quoteIdentifier('a]b')).toBe('[a]]b]');
    });

    it('should add a neutral ORDER BY when the query has none', () => {
      expect(generator.generatePaginated('SELECT * FROM t')).toBe(
        'SELECT * FROM t ORDER BY (SELECT NULL) OFFSET :_offset ROWS FETCH NEXT :_limit ROWS ONLY',
      );
      expect(generator.generatePaginated('SELECT * FROM t ORDER BY name')).toBe(
        'SELECT * FROM t ORDER BY name OFFSET :_offset ROWS FETCH NEXT :_limit ROWS ONLY',
      );
    });

    it('should drop a trailing ORDER BY inside the count wrapper', () => {
      expect(generator.generateCountWrapper('SELECT * FROM t ORDER BY name DESC')).toBe(
        'SELECT COUNT(*) FROM (SELECT * FROM t) AS count_query',
      );
    });
  });

  describe('parameter names', () => {
    const generator = new PostgresSqlGenerator();

    it('should bind columns that are not bare words under word-only names', () => {
      expect(item.fields.map((field) => field.parameterName)).toEqual(['item_id', 'unit_price', 'unit_price_2']);
    });

    it('should keep the quoted column and use the parameter name in the placeholder', () => {
      expect(generator.generateInsert(item, item.getInsertableFields())).toBe(
        'INSERT INTO "Item" ("item-id", "unit-price", "unit_price") VALUES (:item_id, :unit_price, :unit_price_2)',
      );
      expect(generator.generateUpdate(item, item.getNonIdFields())).toBe(
        'UPDATE "Item" SET "unit-price" = :unit_price, "unit_price" = :unit_price_2 WHERE "item-id" = :item_id',
      );
      expect(generator.generateSelectByIds(item, 2)).toBe(
        'SELECT * FROM "Item" WHERE "item-id" IN (:item_id_0, :item_id_1)',
      );
    });
  });

  describe('placeholder overrides', () => {
    const generic = new AnsiSqlGenerator();
    const custom = new NumberedPlaceholderGenerator();
    const withCasts = (sql: string): string =>
      sql.replace(/:(user_name|settings|id|code|label)\b/g, (token, name: string) => {
        const field = [...user.fields, ...tag.fields].find((candidate) => candidate.parameterName === name);
        return field ? `${token}::${field.valueType}` : token;
      });

    it('should change only the placeholder tokens of every statement', () => {
      expect(custom.generateInsert(user, user.getInsertableFields())).toBe(
        withCasts(generic.generateInsert(user, user.getInsertableFields())),
      );
      expect(custom.generateUpdate(user, user.getNonIdFields())).toBe(
        withCasts(generic.generateUpdate(user, user.getNonIdFields())),
      );
      expect(custom.generateDelete(tag)).toBe(withCasts(generic.generateDelete(tag)));
      expect(custom.generateSelectById(tag)).toBe(withCasts(generic.generateSelectById(tag)));
    });

    it('should render the overridden tokens in place', () => {
      expect(custom.generateInsert(user, user.getInsertableFields())).toBe(
        'INSERT INTO app.users (user_name, settings) VALUES (:user_name::string, :settings::json)',
      );
      expect(custom.generateUpdate(user, user.getNonIdFields())).toBe(
        'UPDATE app.users SET user_name = :user_name::string, settings = :settings::json WHERE id = :id::number',
      );
      expect(custom.generateDelete(tag)).toBe('DELETE FROM Tag WHERE code = :code::string');
      expect(custom.generateSelectById(tag)).toBe('SELECT * FROM Tag WHERE code = :code::string');
    });

    it('should carry a custom placeholder into numbered IN parameters', () => {
      const generator = new TextCastingGenerator();

      expect(generator.generateSelectByIds(tag, 2)).toBe(
        'SELECT * FROM "Tag" WHERE "code" IN (:code_0::text, :code_1::text)',
      );
    });
  });

  describe('SqlGeneratorRegistry', () => {
    const registry = SqlGeneratorRegistry.withDefaults();

    it('should resolve registered dialects', () => {
      expect(registry.resolve(Dialect.of('postgres'))).toBeInstanceOf(PostgresSqlGenerator);
      expect(registry.resolve(Dialect.MSSQL)).toBeInstanceOf(MsSqlSqlGenerator);
      expect(registry.has(Dialect.SQLITE)).toBe(true);
    });

    it('should fall back to generic SQL', () => {
      const oracle = registry.resolve(Dialect.of('oracle'));

      expect(oracle).toBeInstanceOf(AnsiSqlGenerator);
      expect(oracle).not.toBeInstanceOf(PostgresSqlGenerator);
      expect(registry.resolve(undefined)).toBe(oracle);
      expect(registry.resolve(Dialect.ANSI)).toBe(oracle);
    });

    it('should let a registration replace a built-in generator', () => {
      const custom = new TextCastingGenerator();

      expect(SqlGeneratorRegistry.withDefaults().register(Dialect.POSTGRES, custom).resolve(Dialect.POSTGRES)).toBe(
        custom,
      );
    });
  });

  describe('Dialect', () => {
    it('should intern dialects by upper-cased name', () => {
      expect(Dialect.of(' postgres ')).toBe(Dialect.POSTGRES);
      expect(Dialect.of('oracle')).toBe(Dialect.of('ORACLE'));
      expect(String(Dialect.of('oracle'))).toBe('ORACLE');
    });

    it('should map knex clients onto dialects', () => {
      expect(Dialect.fromClient('pg')).toBe(Dialect.POSTGRES);
      expect(Dialect.fromClient('mysql2')).toBe(Dialect.MYSQL);
      expect(Dialect.fromClient('better-sqlite3')).toBe(Dialect.SQLITE);
      expect(Dialect.fromClient('mssql')).toBe(Dialect.MSSQL);
      expect(Dialect.fromClient('oracledb')).toBe(Dialect.ANSI);
      expect(Dialect.fromClient(undefined)).toBe(Dialect.ANSI);
    });
  });
});
