// Config module exports

export { StyleboxConfig } from './config.ts';
export type { ConfigInitOptions, ConfigSource, ConfigSchema, ConfigProperty } from './config.ts';
