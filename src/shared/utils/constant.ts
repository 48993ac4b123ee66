export const CLASS_TAGS_KEY = 'tablebind:class-tags';
export const PROPERTY_KEYS_KEY = 'tablebind:property-keys';
export const PROPERTY_TAGS_KEY = 'tablebind:property-tags';
export const DESIGN_TYPE_KEY = 'design:type';

export const DATA_MAPPER_OPTIONS = 'DATA_MAPPER_OPTIONS';

export const DEFAULT_GENERATORS = {
  TIMESTAMP: 'timestamp',
  UUID: 'uuid',
  UUID_V7: 'uuid7',
} as const;

export const PAGINATION_PARAMS = {
  LIMIT: '_limit',
  OFFSET: '_offset',
} as const;
