import 'reflect-metadata';
import { Knex, knex } from 'knex';
import { ConfigurationException, ValidationException } from '../../../src/core/exceptions/custom-exceptions';
import { TagType } from '../../../src/core/metadata/tags/tag-type';
import { tagProperty } from '../../../src/core/metadata/tags/tag-storage';
import { KnexSqlExecutor } from '../../../src/infrastructure/knex/knex-sql-executor';
import { MapperPlugin } from '../../../src/infrastructure/registry/interfaces/mapper-plugin.interface';
import { Dialect } from '../../../src/infrastructure/sql/dialect';
import { AnsiSqlGenerator } from '../../../src/infrastructure/sql/generators/ansi-sql.generator';
import { DataMapper } from '../../../src/modules/data-mapper/data-mapper';
import { Column } from '../../../src/shared/decorators/column.decorator';
import { DefaultValue } from '../../../src/shared/decorators/default-value.decorator';
import { Id } from '../../../src/shared/decorators/id.decorator';
import { Table } from '../../../src/shared/decorators/table.decorator';
import { RecordingExecutor } from '../../utils/recording-executor';

const UpperCaseTag = new TagType('UpperCase');
const UpperCase = (): PropertyDecorator => tagProperty(UpperCaseTag.of());
const NoSpacesTag = new TagType('NoSpaces');
const NoSpaces = (): PropertyDecorator => tagProperty(NoSpacesTag.of());

@Table('labels')
class Label {
  @Id()
  id?: number;

  @Column()
  @UpperCase()
  @NoSpaces()
  @DefaultValue({ generator: 'stamp' })
  text?: string;
}

class LimitTopGenerator extends AnsiSqlGenerator {
  protected getPaginationClause(): string {
    return 'FETCH FIRST :_limit ROWS ONLY';
  }
}

function stampPlugin(value: string): MapperPlugin {
  return {
    name: 'stamp',
    configure: (registries) => {
      registries.registerGenerator('stamp', () => value);
    },
  };
}

describe('DataMapperBuilder', () => {
  let executor: RecordingExecutor;

  beforeEach(() => {
    executor = new RecordingExecutor('pg');
  });

  describe('executor', () => {
    let sqlite: Knex;

    beforeAll(() => {
      sqlite = knex({ client: 'better-sqlite3', connection: { filename: ':memory:' }, useNullAsDefault: true });
    });

    afterAll(async () => {
      await sqlite.destroy();
    });

    it('should require a knex instance or an executor', () => {
      expect(() => DataMapper.builder().build()).toThrow(ConfigurationException);
      expect(() => DataMapper.builder().build()).toThrow(
        'Configuration error: A knex instance or an executor is required',
      );
    });

    it('should refuse both a knex instance and an executor', () => {
      expect(() => DataMapper.builder().withKnex(sqlite).withExecutor(executor).build()).toThrow(
        'Configuration error: Configure either a knex instance or an executor, not both',
      );
    });

    it('should wrap a knex instance and infer its dialect', () => {
      const mapper = DataMapper.builder().withKnex(sqlite).build();

      expect(mapper.getExecutor()).toBeInstanceOf(KnexSqlExecutor);
      expect(mapper.dialect).toBe(Dialect.SQLITE);
    });
  });

  describe('dialect', () => {
    it('should let an explicit dialect win over the client name', async () => {
      const mapper = DataMapper.builder().withExecutor(executor).withDialect(Dialect.MYSQL).build();

      await mapper.findAll(Label);

      expect(mapper.dialect).toBe(Dialect.MYSQL);
      expect(executor.sqls()).toEqual(['SELECT * FROM `labels`']);
    });

    it('should fall back to generic SQL for an unknown client', () => {
      const mapper = DataMapper.builder().withExecutor(new RecordingExecutor('oracledb')).build();

      expect(mapper.dialect).toBe(Dialect.ANSI);
    });

    it('should use a registered generator for a custom dialect', async () => {
      const mapper = DataMapper.builder()
        .withExecutor(executor)
        .withDialect(Dialect.of('db2'))
        .registerSqlGenerator(Dialect.of('DB2'), new LimitTopGenerator())
        .build();

      await mapper.findAll(Label, 5);

      expect(executor.sqls()).toEqual(['SELECT * FROM labels FETCH FIRST :_limit ROWS ONLY']);
    });
  });

  it('should prefix tables with the default schema', async () => {
    const mapper = DataMapper.builder().withExecutor(executor).withDefaultSchema('app').build();

    await mapper.count(Label);

    expect(executor.sqls()).toEqual(['SELECT COUNT(*) FROM "app"."labels"']);
  });

  describe('plugins and registrations', () => {
    it('should install plugin registrations', async () => {
      const mapper = DataMapper.builder().withExecutor(executor).installPlugin(stampPlugin('from plugin')).build();
      const label = Object.assign(new Label(), { id: 1 });

      await mapper.insert(label);

      expect(label.text).toBe('from plugin');
    });

    it('should apply direct registrations after plugins', async () => {
      const mapper = DataMapper.builder()
        .withExecutor(executor)
        .registerGenerator('stamp', () => 'direct')
        .installPlugin(stampPlugin('from plugin'))
        .build();
      const label = Object.assign(new Label(), { id: 1 });

      await mapper.insert(label);

      expect(label.text).toBe('direct');
    });

    it('should refuse a plugin installed twice', () => {
      const builder = DataMapper.builder()
        .withExecutor(executor)
        .installPlugin(stampPlugin('a'))
        .installPlugin(stampPlugin('b'));

      expect(() => builder.build()).toThrow("Configuration error: Plugin 'stamp' is installed twice");
    });

    it('should run registered converters and validators', async () => {
      const mapper = DataMapper.builder()
        .withExecutor(executor)
        .registerGenerator('stamp', () => 'hello world')
        .registerConverter(UpperCaseTag, {
          toDatabase: (value) => String(value).toUpperCase(),
          fromDatabase: (value) => String(value).toLowerCase(),
        })
        .registerValidator(NoSpacesTag, {
          validate: (value, field) => (String(value).includes(' ') ? [`${field.fieldName} cannot contain spaces`] : []),
        })
        .build();

      await expect(mapper.insert(Object.assign(new Label(), { id: 1 }))).rejects.toThrow(ValidationException);

      await mapper.insert(Object.assign(new Label(), { id: 2, text: 'quiet' }));
      executor.respondTo('WHERE "id" = :id', [{ id: 2, text: 'QUIET' }]);

      expect(executor.statements[0].params).toEqual({ id: 2, text: 'QUIET' });
      await expect(mapper.findById(Label, 2)).resolves.toEqual(Object.assign(new Label(), { id: 2, text: 'quiet' }));
    });

    it('should accept everything through withOptions', async () => {
      const mapper = DataMapper.builder()
        .withOptions({ executor, dialect: Dialect.SQLITE, plugins: [stampPlugin('opt')], logSql: true })
        .build();
      const label = Object.assign(new Label(), { id: 3 });

      await mapper.insert(label);

      expect(mapper.dialect).toBe(Dialect.SQLITE);
      expect(label.text).toBe('opt');
    });
  });
});
