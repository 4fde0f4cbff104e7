/**
 * The nested record held in a config's `object_list`.
 *
 * @packageDocumentation
 */

import {
  coerce,
  expectInt,
  expectNull,
  expectOneOf,
  expectString,
  failure,
  isJsonObject,
  nestMismatch,
  success,
} from '../coercion/index.js';
import type { Check, JsonObject, Serializable } from '../coercion/index.js';
import { OBJECT_ENTRY_KEYS } from './keys.js';

const OBJ_ID_CHECK = expectOneOf<number | null>([expectNull, expectInt]);
const OBJ_DESC_CHECK = expectOneOf<string | null>([expectNull, expectString]);

/**
 * One `object_list` item. Both fields are independently optional.
 */
export class ObjectEntry implements Serializable {
  obj_id: number | null;
  obj_desc: string | null;

  constructor(obj_id: number | null = null, obj_desc: string | null = null) {
    this.obj_id = obj_id;
    this.obj_desc = obj_desc;
  }

  /**
   * Check that reads a decoded JSON object into an ObjectEntry.
   *
   * Keys other than `obj_id` and `obj_desc` are ignored. A field failure is
   * reported with the field's key in the mismatch path.
   */
  static readonly check: Check<ObjectEntry> = {
    name: 'ObjectEntry',
    run: (raw) => {
      if (!isJsonObject(raw)) {
        return failure(['ObjectEntry'], raw);
      }
      const objId = OBJ_ID_CHECK.run(raw[OBJECT_ENTRY_KEYS.objId]);
      if (!objId.ok) {
        return nestMismatch(OBJECT_ENTRY_KEYS.objId, objId.mismatch);
      }
      const objDesc = OBJ_DESC_CHECK.run(raw[OBJECT_ENTRY_KEYS.objDesc]);
      if (!objDesc.ok) {
        return nestMismatch(OBJECT_ENTRY_KEYS.objDesc, objDesc.mismatch);
      }
      return success(new ObjectEntry(objId.value, objDesc.value));
    },
  };

  /**
   * Guard used when re-validating a config's entries before writing.
   */
  static isInstance(value: unknown): value is ObjectEntry {
    return value instanceof ObjectEntry;
  }

  toJsonObject(): JsonObject {
    return {
      [OBJECT_ENTRY_KEYS.objId]: coerce(OBJ_ID_CHECK, this.obj_id, OBJECT_ENTRY_KEYS.objId),
      [OBJECT_ENTRY_KEYS.objDesc]: coerce(OBJ_DESC_CHECK, this.obj_desc, OBJECT_ENTRY_KEYS.objDesc),
    };
  }
}
