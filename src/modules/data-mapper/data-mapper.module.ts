import { DynamicModule, Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DATA_MAPPER_OPTIONS } from '../../shared/utils/constant';
import { DataMapperAsyncOptions, DataMapperOptions } from './interfaces/data-mapper-options.interface';
import { DataMapperService } from './services/data-mapper.service';

@Global()
@Module({})
export class DataMapperModule {
  static forRoot(options: DataMapperOptions = {}): DynamicModule {
    return {
      module: DataMapperModule,
      imports: [ConfigModule.forRoot()],
      providers: [{ provide: DATA_MAPPER_OPTIONS, useValue: options }, DataMapperService],
      exports: [DataMapperService],
    };
  }

  static forRootAsync(options: DataMapperAsyncOptions): DynamicModule {
    return {
      module: DataMapperModule,
      imports: [ConfigModule.forRoot(), ...(options.imports ?? [])],
      providers: [
        { provide: DATA_MAPPER_OPTIONS, useFactory: options.useFactory, inject: options.inject ?? [] },
        DataMapperService,
      ],
      exports: [DataMapperService],
    };
  }
}
