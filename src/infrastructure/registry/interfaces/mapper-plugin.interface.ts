import type { RegistryCollector } from '../registry-collector';

/** A bundle of converters, validators, generators or dialects installed at build time. */
export interface MapperPlugin {
  readonly name: string;
  configure(registries: RegistryCollector): void;
}
