import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { DataMapperModule } from '../../../src/modules/data-mapper/data-mapper.module';
import { DataMapperService } from '../../../src/modules/data-mapper/services/data-mapper.service';
import { Dialect } from '../../../src/infrastructure/sql/dialect';
import { Column } from '../../../src/shared/decorators/column.decorator';
import { Id } from '../../../src/shared/decorators/id.decorator';
import { Table } from '../../../src/shared/decorators/table.decorator';
import { RecordingExecutor } from '../../utils/recording-executor';

@Table('customers')
class Customer {
  @Id()
  id?: number;

  @Column()
  email?: string;
}

describe('DataMapperModule', () => {
  let moduleRef: TestingModule | undefined;

  afterEach(async () => {
    await moduleRef?.close();
    moduleRef = undefined;
  });

  it('should build the mapper from an executor on init', async () => {
    const executor = new RecordingExecutor('mysql2');
    moduleRef = await Test.createTestingModule({
      imports: [DataMapperModule.forRoot({ executor })],
    }).compile();
    const service = moduleRef.get(DataMapperService);

    expect(() => service.mapper).toThrow('DataMapperService is used before module initialization');

    await moduleRef.init();
    await service.repository(Customer).count();

    expect(service.mapper.dialect).toBe(Dialect.MYSQL);
    expect(executor.sqls()).toEqual(['SELECT COUNT(*) FROM `customers`']);
  });

  it('should take options from an async factory', async () => {
    const executor = new RecordingExecutor('pg');
    moduleRef = await Test.createTestingModule({
      imports: [
        DataMapperModule.forRootAsync({
          useFactory: (config: ConfigService) => ({
            executor,
            defaultSchema: config.get<string>('CUSTOMER_SCHEMA', 'crm'),
          }),
          inject: [ConfigService],
        }),
      ],
    }).compile();
    await moduleRef.init();

    await moduleRef.get(DataMapperService).mapper.findById(Customer, 1);

    expect(executor.sqls()).toEqual(['SELECT * FROM "crm"."customers" WHERE "id" = :id']);
  });

  describe('without an executor', () => {
    const saved = { DB_TYPE: process.env.DB_TYPE, DB_NAME: process.env.DB_NAME, DB_URI: process.env.DB_URI };

    beforeEach(() => {
      process.env.DB_TYPE = 'sqlite';
      process.env.DB_NAME = ':memory:';
      delete process.env.DB_URI;
    });

    afterEach(() => {
      for (const [key, value] of Object.entries(saved)) {
        if (value === undefined) {
          delete process.env[key];
        } else {
          process.env[key] = value;
        }
      }
    });

    it('should open a knex connection from DB_* settings', async () => {
      moduleRef = await Test.createTestingModule({
        imports: [DataMapperModule.forRoot()],
      }).compile();
      await moduleRef.init();
      const mapper = moduleRef.get(DataMapperService).mapper;

      expect(mapper.dialect).toBe(Dialect.SQLITE);
      await expect(mapper.queryForNumber('SELECT 40 + 2 AS answer')).resolves.toBe(42);
    });
  });
});
