import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { mkdtemp, rm, symlink } from 'node:fs/promises';
import { readFileSync, realpathSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { NotFoundError, ParseError, TypeMismatchError } from '../errors.js';
import type { LoggingPort } from '../utils/logger.js';
import { Config, configToJson, readJsonObject } from './config.js';
import { ObjectEntry } from './object-entry.js';

function createLoggerSpy() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
    critical: vi.fn(),
  } satisfies LoggingPort;
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

describe('Config', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = realpathSync(await mkdtemp(join(tmpdir(), 'config-test-')));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  function writeDocument(name: string, document: unknown): string {
    const file = join(tempDir, name);
    writeFileSync(file, JSON.stringify(document), 'utf-8');
    return file;
  }

  function load(document: unknown, logger?: LoggingPort): Config {
    const file = writeDocument('input.json', document);
    return Config.deserialize(file, logger !== undefined ? { logger } : {});
  }

  describe('constructor', () => {
    it('fills omitted fields with null', () => {
      const config = new Config({ sample_int: 3 });
      expect(config.sample_int).toBe(3);
      expect(config.sample_bool).toBeNull();
      expect(config.sample_path).toBeNull();
      expect(config.sample_string).toBeNull();
      expect(config.simple_list).toBeNull();
      expect(config.object_list).toBeNull();
    });
  });

  describe('deserialize', () => {
    it('reads a fully populated document', () => {
      const config = load({
        sample_bool: true,
        sample_path: tempDir,
        sample_string: 'hello',
        sample_int: 42,
        simple_list: ['alpha', 'beta'],
        object_list: [{ obj_id: 1, obj_desc: 'first entry' }, { obj_id: 2 }, {}],
      });

      expect(config.sample_bool).toBe(true);
      expect(config.sample_path).toBe(tempDir);
      expect(config.sample_string).toBe('hello');
      expect(config.sample_int).toBe(42);
      expect(config.simple_list).toEqual(['alpha', 'beta']);
      expect(config.object_list).toEqual([
        new ObjectEntry(1, 'first entry'),
        new ObjectEntry(2, null),
        new ObjectEntry(null, null),
      ]);
    });

    it('gives every absent key the value null', () => {
      const config = load({});
      expect(configToJson(config)).toEqual({
        sample_bool: null,
        sample_path: null,
        sample_string: null,
        sample_int: null,
        simple_list: null,
        object_list: null,
      });
    });

    it('treats explicit null like an absent key', () => {
      const config = load({ sample_bool: null, simple_list: null, object_list: null });
      expect(config.sample_bool).toBeNull();
      expect(config.simple_list).toBeNull();
      expect(config.object_list).toBeNull();
    });

    it('keeps empty lists distinct from null', () => {
      const config = load({ simple_list: [], object_list: [] });
      expect(config.simple_list).toEqual([]);
      expect(config.object_list).toEqual([]);
    });

    it('ignores unknown keys', () => {
      const config = load({ unused: { nested: true }, sample_int: 7 });
      expect(config.sample_int).toBe(7);
      expect(Object.keys(configToJson(config))).toEqual([
        'sample_bool',
        'sample_path',
        'sample_string',
        'sample_int',
        'simple_list',
        'object_list',
      ]);
    });

    it.each<[string, boolean]>([
      ['yes', true],
      ['Y', true],
      ['TRUE', true],
      ['no', false],
      ['false', false],
      ['', false],
      ['yes please', false],
    ])('reads the boolean word %j as %s', (word, expected) => {
      expect(load({ sample_bool: word }).sample_bool).toBe(expected);
    });

    it('accepts integral numbers written with a fraction', () => {
      const file = join(tempDir, 'float.json');
      writeFileSync(file, '{"sample_int": 5.0}', 'utf-8');
      expect(Config.deserialize(file).sample_int).toBe(5);
    });

    it('stores sample_path as the real path', async () => {
      const link = join(tempDir, 'link');
      await symlink(tempDir, link);
      expect(load({ sample_path: link }).sample_path).toBe(tempDir);
    });

    it('logs the loaded values at info level', () => {
      const logger = createLoggerSpy();
      load({ sample_int: 1, object_list: [{ obj_id: 2 }] }, logger);

      expect(logger.info).toHaveBeenCalledWith('config_deserialized', {
        sample_bool: null,
        sample_path: null,
        sample_string: null,
        sample_int: 1,
        simple_list: null,
        object_list: [{ obj_id: 2, obj_desc: null }],
      });
      expect(logger.critical).not.toHaveBeenCalled();
    });

    describe('failures', () => {
      it('rejects a missing file', () => {
        const logger = createLoggerSpy();
        const missing = join(tempDir, 'missing.json');
        const error = catchError(() => Config.deserialize(missing, { logger }));

        expect(error).toBeInstanceOf(NotFoundError);
        expect(error).toHaveProperty('message', `Path '${missing}' does not exist`);
        expect(logger.critical).toHaveBeenCalledWith(
          'config_read_failed',
          expect.objectContaining({ error: 'NotFoundError', path: missing })
        );
      });

      it('rejects text that is not JSON', () => {
        const file = join(tempDir, 'broken.json');
        writeFileSync(file, '{ not json', 'utf-8');
        const error = catchError(() => Config.deserialize(file));

        expect(error).toBeInstanceOf(ParseError);
        expect(error).toHaveProperty('source', file);
        expect(error instanceof Error && error.message.startsWith(`Invalid JSON in '${file}': `)).toBe(
          true
        );
      });

      it('rejects a top-level value that is not an object', () => {
        const file = writeDocument('array.json', [1, 2]);
        const error = catchError(() => Config.deserialize(file));

        expect(error).toBeInstanceOf(ParseError);
        expect(error).toHaveProperty(
          'message',
          `Top-level JSON value in '${file}' must be an object, got array`
        );
      });

      it('names the field and both alternatives for a wrong sample_int', () => {
        const logger = createLoggerSpy();
        const error = catchError(() => load({ sample_int: 'not a number' }, logger));

        expect(error).toBeInstanceOf(TypeMismatchError);
        expect(error).toHaveProperty(
          'message',
          `Invalid type for 'sample_int': expected one of (null, int), got string "not a number"`
        );
        expect(error).toHaveProperty('expected', ['null', 'int']);
        expect(logger.critical).toHaveBeenCalledWith('config_validation_failed', {
          error: 'TypeMismatchError',
          message: `Invalid type for 'sample_int': expected one of (null, int), got string "not a number"`,
          field: 'sample_int',
          expected: ['null', 'int'],
          received: 'string',
          value: 'not a number',
        });
        expect(logger.info).not.toHaveBeenCalled();
      });

      it('rejects an integer too large to keep exactly', () => {
        const logger = createLoggerSpy();
        const file = join(tempDir, 'big.json');
        writeFileSync(file, '{"sample_int": 12345678901234567890}', 'utf-8');

        const error = catchError(() => Config.deserialize(file, { logger }));

        expect(error).toBeInstanceOf(TypeMismatchError);
        expect(error).toHaveProperty('field', 'sample_int');
        expect(error).toHaveProperty('received', 'unsafe-int');
        expect(error).toHaveProperty(
          'message',
          `Invalid type for 'sample_int': expected one of (null, int), got unsafe-int 12345678901234567000`
        );
        expect(logger.info).not.toHaveBeenCalled();
      });

      it('rejects an input path that is a directory', () => {
        const logger = createLoggerSpy();
        const error = catchError(() => Config.deserialize(tempDir, { logger }));

        expect(error).toBeInstanceOf(NotFoundError);
        expect(error).toHaveProperty('path', tempDir);
        expect(error).toHaveProperty(
          'message',
          `Input path '${tempDir}' is a directory, not a file`
        );
        expect(logger.critical).toHaveBeenCalledWith(
          'config_read_failed',
          expect.objectContaining({ error: 'NotFoundError', path: tempDir })
        );
      });

      it('rejects a fractional sample_int', () => {
        const error = catchError(() => load({ sample_int: 1.5 }));
        expect(error).toHaveProperty('received', 'float');
      });

      it('rejects a number in sample_bool', () => {
        const error = catchError(() => load({ sample_bool: 5 }));
        expect(error).toHaveProperty(
          'message',
          `Invalid type for 'sample_bool': expected one of (string, bool, null), got int 5`
        );
      });

      it('reports the first failing field in field order', () => {
        const error = catchError(() => load({ sample_int: 'x', sample_bool: 5 }));
        expect(error).toHaveProperty('field', 'sample_bool');
      });

      it('rejects a simple_list that is not a list', () => {
        const error = catchError(() => load({ simple_list: 'abc' }));
        expect(error).toHaveProperty(
          'message',
          `Invalid type for 'simple_list': expected one of (list<string>, null), got string "abc"`
        );
      });

      it('names the index of a bad simple_list item', () => {
        const error = catchError(() => load({ simple_list: ['a', 1] }));
        expect(error).toHaveProperty(
          'message',
          `Invalid type for 'simple_list[1]': expected string (in list<string> | null), got int 1`
        );
      });

      it('names the nested field of a bad object_list entry', () => {
        const error = catchError(() =>
          load({ object_list: [{ obj_id: 1 }, { obj_id: 'x' }] })
        );
        expect(error).toBeInstanceOf(TypeMismatchError);
        expect(error).toHaveProperty('field', 'object_list[1].obj_id');
        expect(error).toHaveProperty(
          'message',
          `Invalid type for 'object_list[1].obj_id': expected one of (null, int) (in list<ObjectEntry> | null), got string "x"`
        );
      });

      it('rejects an object_list entry that is not an object', () => {
        const error = catchError(() => load({ object_list: ['entry'] }));
        expect(error).toHaveProperty(
          'message',
          `Invalid type for 'object_list[0]': expected ObjectEntry (in list<ObjectEntry> | null), got string "entry"`
        );
      });

      it('rejects a sample_path that does not exist', () => {
        const logger = createLoggerSpy();
        const missing = join(tempDir, 'nowhere');
        const error = catchError(() => load({ sample_path: missing }, logger));

        expect(error).toBeInstanceOf(NotFoundError);
        expect(error).toHaveProperty('field', 'sample_path');
        expect(error).toHaveProperty(
          'message',
          `Path for 'sample_path' '${missing}' does not exist`
        );
        expect(logger.critical).toHaveBeenCalledWith(
          'config_validation_failed',
          expect.objectContaining({ path: missing, field: 'sample_path' })
        );
      });

      it('rejects an empty sample_path', () => {
        const error = catchError(() => load({ sample_path: '' }));
        expect(error).toBeInstanceOf(NotFoundError);
        expect(error).toHaveProperty(
          'message',
          `Invalid path for 'sample_path': Path cannot be empty`
        );
      });
    });
  });

  describe('readJsonObject', () => {
    it('returns the decoded object', () => {
      const file = writeDocument('plain.json', { a: [1, { b: null }] });
      expect(readJsonObject(file)).toEqual({ a: [1, { b: null }] });
    });
  });

  describe('serialize', () => {
    it('writes every key with four-space indentation and no trailing newline', () => {
      new Config().serialize(tempDir, 'out.json');

      expect(readFileSync(join(tempDir, 'out.json'), 'utf-8')).toBe(
        [
          '{',
          '    "sample_bool": null,',
          '    "sample_path": null,',
          '    "sample_string": null,',
          '    "sample_int": null,',
          '    "simple_list": null,',
          '    "object_list": null',
          '}',
        ].join('\n')
      );
    });

    it('writes nested entries in order', () => {
      const config = new Config({
        sample_bool: true,
        simple_list: ['a'],
        object_list: [new ObjectEntry(1, null)],
      });
      config.serialize(tempDir, 'nested.json');

      expect(readFileSync(join(tempDir, 'nested.json'), 'utf-8')).toBe(
        [
          '{',
          '    "sample_bool": true,',
          '    "sample_path": null,',
          '    "sample_string": null,',
          '    "sample_int": null,',
          '    "simple_list": [',
          '        "a"',
          '    ],',
          '    "object_list": [',
          '        {',
          '            "obj_id": 1,',
          '            "obj_desc": null',
          '        }',
          '    ]',
          '}',
        ].join('\n')
      );
    });

    it('replaces an existing file', () => {
      const file = writeDocument('out.json', { old: true });
      new Config({ sample_int: 9 }).serialize(tempDir, 'out.json');
      expect(JSON.parse(readFileSync(file, 'utf-8'))).toHaveProperty('sample_int', 9);
    });

    it('logs the written path at info level', () => {
      const logger = createLoggerSpy();
      new Config().serialize(tempDir, 'out.json', { logger });
      expect(logger.info).toHaveBeenCalledWith('config_serialized', {
        path: join(tempDir, 'out.json'),
      });
    });

    it('rejects a missing output directory', () => {
      const logger = createLoggerSpy();
      const missing = join(tempDir, 'no-such-dir');
      const error = catchError(() => {
        new Config().serialize(missing, 'out.json', { logger });
      });

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toHaveProperty('message', `Path '${missing}' does not exist`);
      expect(logger.critical).toHaveBeenCalledWith(
        'config_write_failed',
        expect.objectContaining({ error: 'NotFoundError' })
      );
    });

    it('rejects an output directory that is a file', () => {
      const file = writeDocument('not-a-dir', {});
      const error = catchError(() => {
        new Config().serialize(file, 'out.json');
      });

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toHaveProperty('message', `Output directory '${file}' is not a directory`);
    });

    it('rejects a field mutated into an invalid value and writes nothing', () => {
      const config = new Config();
      config.sample_int = 1.5;
      const error = catchError(() => {
        config.serialize(tempDir, 'never.json');
      });

      expect(error).toBeInstanceOf(TypeMismatchError);
      expect(error).toHaveProperty('field', 'sample_int');
      expect(() => readFileSync(join(tempDir, 'never.json'))).toThrow();
    });

    it('rejects an integer too large to write back exactly', () => {
      const config = new Config({ sample_int: 2 ** 60 });
      const error = catchError(() => {
        config.serialize(tempDir, 'big.json');
      });

      expect(error).toBeInstanceOf(TypeMismatchError);
      expect(error).toHaveProperty('received', 'unsafe-int');
      expect(() => readFileSync(join(tempDir, 'big.json'))).toThrow();
    });

    it('rejects a string left in sample_bool', () => {
      const config = new Config();
      Reflect.set(config, 'sample_bool', 'yes');
      const error = catchError(() => {
        config.serialize(tempDir, 'out.json');
      });
      expect(error).toHaveProperty(
        'message',
        `Invalid type for 'sample_bool': expected one of (null, bool), got string "yes"`
      );
    });

    it('names the nested field of a mutated entry', () => {
      const entry = new ObjectEntry(1, 'one');
      const config = new Config({ object_list: [entry] });
      Reflect.set(entry, 'obj_desc', 5);

      const error = catchError(() => {
        config.serialize(tempDir, 'out.json');
      });
      expect(error).toBeInstanceOf(TypeMismatchError);
      expect(error).toHaveProperty('field', 'object_list[0].obj_desc');
      expect(error).toHaveProperty('expected', ['null', 'string']);
      expect(error).toHaveProperty('within', ['list<ObjectEntry>', 'null']);
    });

    it('rejects a plain object in place of an entry', () => {
      const config = new Config();
      Reflect.set(config, 'object_list', [{ obj_id: 1, obj_desc: null }]);

      const error = catchError(() => {
        config.serialize(tempDir, 'out.json');
      });
      expect(error).toHaveProperty('field', 'object_list[0]');
      expect(error).toHaveProperty('expected', ['ObjectEntry']);
      expect(error).toHaveProperty('received', 'object');
    });
  });

  describe('round trip', () => {
    const entryArb = fc.record({
      obj_id: fc.option(fc.integer(), { nil: null }),
      obj_desc: fc.option(fc.string(), { nil: null }),
    });

    const fieldsArb = fc.record({
      sample_bool: fc.option(fc.boolean(), { nil: null }),
      sample_string: fc.option(fc.string(), { nil: null }),
      sample_int: fc.option(fc.integer(), { nil: null }),
      simple_list: fc.option(fc.array(fc.string(), { maxLength: 5 }), { nil: null }),
      object_list: fc.option(fc.array(entryArb, { maxLength: 5 }), { nil: null }),
      with_path: fc.boolean(),
    });

    it('reads back exactly what was written', () => {
      fc.assert(
        fc.property(fieldsArb, (fields) => {
          const original = new Config({
            sample_bool: fields.sample_bool,
            sample_path: fields.with_path ? tempDir : null,
            sample_string: fields.sample_string,
            sample_int: fields.sample_int,
            simple_list: fields.simple_list,
            object_list:
              fields.object_list?.map((entry) => new ObjectEntry(entry.obj_id, entry.obj_desc)) ??
              null,
          });

          original.serialize(tempDir, 'round-trip.json');
          const reloaded = Config.deserialize(join(tempDir, 'round-trip.json'));

          expect(configToJson(reloaded)).toEqual(configToJson(original));
        }),
        { numRuns: 50 }
      );
    });

    it('writes the same document twice for an unchanged config', () => {
      const file = writeDocument('source.json', {
        sample_bool: 'y',
        sample_path: tempDir,
        simple_list: ['x'],
        object_list: [{ obj_desc: 'd' }],
      });

      Config.deserialize(file).serialize(tempDir, 'first.json');
      Config.deserialize(join(tempDir, 'first.json')).serialize(tempDir, 'second.json');

      expect(readFileSync(join(tempDir, 'second.json'), 'utf-8')).toBe(
        readFileSync(join(tempDir, 'first.json'), 'utf-8')
      );
    });
  });

  describe('field independence', () => {
    it('does not share list storage between loads', () => {
      const file = writeDocument('shared.json', { simple_list: ['a'] });
      const first = Config.deserialize(file);
      const second = Config.deserialize(file);

      first.simple_list?.push('b');
      expect(second.simple_list).toEqual(['a']);
    });
  });
});
