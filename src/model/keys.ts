/**
 * JSON keys recognized in configuration documents.
 *
 * @packageDocumentation
 */

/**
 * Top-level keys, in the order they are written.
 */
export const CONFIG_KEYS = {
  sampleBool: 'sample_bool',
  samplePath: 'sample_path',
  sampleString: 'sample_string',
  sampleInt: 'sample_int',
  simpleList: 'simple_list',
  objectList: 'object_list',
} as const;

/**
 * Keys of an `object_list` entry.
 */
export const OBJECT_ENTRY_KEYS = {
  objId: 'obj_id',
  objDesc: 'obj_desc',
} as const;
