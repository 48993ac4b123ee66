import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Knex } from 'knex';
import { ConfigurationException } from '../../../core/exceptions/custom-exceptions';
import { EntityType } from '../../../core/metadata/entity-metadata';
import { createKnex, readDatabaseSettings } from '../../../infrastructure/knex/knex.factory';
import { DATA_MAPPER_OPTIONS } from '../../../shared/utils/constant';
import { DataMapper } from '../data-mapper';
import { DataMapperOptions } from '../interfaces/data-mapper-options.interface';
import { EntityRepository } from '../repositories/entity.repository';

/**
 * Owns the application's {@link DataMapper}. Without a knex instance or an
 * executor in the module options, a knex pool is built from the DB_*
 * settings, checked with `SELECT 1`, and destroyed with the module.
 */
@Injectable()
export class DataMapperService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DataMapperService.name);
  private instance?: DataMapper;
  private ownedKnex?: Knex;

  constructor(
    private readonly configService: ConfigService,
    @Inject(DATA_MAPPER_OPTIONS)
    private readonly options: DataMapperOptions,
  ) {}

  async onModuleInit(): Promise<void> {
    const builder = DataMapper.builder().withOptions(this.options);

    if (this.options.logSql === undefined) {
      builder.withLogSql(String(this.configService.get('MAPPER_LOG_SQL')) === 'true');
    }
    if (this.options.defaultSchema === undefined) {
      builder.withDefaultSchema(this.configService.get<string>('DB_SCHEMA') || undefined);
    }

    if (!this.options.knex && !this.options.executor) {
      this.logger.log('Initializing knex connection from configuration');
      const knex = createKnex(readDatabaseSettings(this.configService, this.logger));
      try {
        await knex.raw('SELECT 1');
        this.logger.log('Knex connection established');
      } catch (error) {
        this.logger.error('Failed to establish knex connection:', error);
        await knex.destroy();
        throw error;
      }
      this.ownedKnex = knex;
      builder.withKnex(knex);
    }

    this.instance = builder.build();
  }

  async onModuleDestroy(): Promise<void> {
    if (this.ownedKnex) {
      await this.ownedKnex.destroy();
      this.ownedKnex = undefined;
      this.logger.log('Knex connection closed');
    }
  }

  get mapper(): DataMapper {
    if (!this.instance) {
      throw new ConfigurationException('DataMapperService is used before module initialization');
    }
    return this.instance;
  }

  repository<T extends object>(type: EntityType<T>): EntityRepository<T> {
    return this.mapper.repository(type);
  }
}
