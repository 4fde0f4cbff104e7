/**
 * Config model: the configuration schema and its JSON round trip.
 *
 * @packageDocumentation
 */

export { Config, configToJson, readJsonObject, OUTPUT_INDENT } from './config.js';
export type { ConfigFields, ConfigIoOptions } from './config.js';
export { ObjectEntry } from './object-entry.js';
export { CONFIG_KEYS, OBJECT_ENTRY_KEYS } from './keys.js';
