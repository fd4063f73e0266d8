// Typed view over schema.json

import schemaJson from './schema.json' with { type: 'json' };

/**
 * Schema property definition
 */
export interface ConfigProperty {
  type: string;
  default?: unknown;
  env?: string;
  envInverted?: boolean;
  flag?: string;
  flagInverted?: boolean;
  enum?: string[];
  description?: string;
}

/**
 * Config schema structure
 */
export interface ConfigSchema {
  properties: Record<string, ConfigProperty>;
}

export const schema: ConfigSchema = schemaJson;
