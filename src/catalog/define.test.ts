import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { resolveBatch } from '../batch/index.js';
import { emitBatch } from '../emitter/index.js';
import {
  CatalogDefinitionError,
  defineBatch,
  defineEnum,
  defineModel,
  defineNativeEnum,
  isSourceBatch,
} from './define.js';

enum Level {
  LOW = 1,
  HIGH = 2,
}

describe('Structured catalogs', () => {
  describe('defineEnum', () => {
    it('should name members after their values', () => {
      const Color = defineEnum('Color', ['red', 'green'], { description: 'Paint colors' });
      expect(Color.declaration.members).toEqual([
        { name: 'red', value: 'red' },
        { name: 'green', value: 'green' },
      ]);
      expect(Color.declaration.description).toBe('Paint colors');
      expect(Color.declaration.schema).toBe(Color.schema);
      expect(Color.schema.parse('green')).toBe('green');
    });
  });

  describe('defineNativeEnum', () => {
    it('should skip reverse mappings of numeric enums', () => {
      const defined = defineNativeEnum('Level', Level);
      expect(defined.declaration.members).toEqual([
        { name: 'LOW', value: 1 },
        { name: 'HIGH', value: 2 },
      ]);
      expect(defined.declaration.enumObject).toBe(Level);
    });
  });

  describe('defineModel', () => {
    const Color = defineEnum('Color', ['red', 'green']);
    const Widget = defineModel(
      'Widget',
      {
        id: z.string().uuid(),
        color: Color.schema.optional().describe('Paint color'),
        tags: z.array(z.string()).default([]),
        owner: z.string().nullable().optional(),
      },
      { aliases: { owner: 'ownerName' }, description: 'A widget.' }
    );

    it('should read field properties from the shape', () => {
      const fields = Widget.declaration.fields;
      expect(fields.map((field) => field.name)).toEqual(['id', 'color', 'tags', 'owner']);
      expect(fields.map((field) => field.required)).toEqual([true, false, false, false]);
      expect(fields[1]?.description).toBe('Paint color');
      expect(fields[2]?.default).toEqual([]);
      expect(fields[3]?.alias).toBe('ownerName');
    });

    it('should keep the referenced schema identity', () => {
      const color = Widget.declaration.fields[1];
      expect(color?.type.kind === 'Schema' ? color.type.schema : undefined).toBe(Color.schema);
    });

    it('should emit references to declared enums', () => {
      const result = emitBatch(resolveBatch(defineBatch('widgets', [Color, Widget])));
      expect(result.interfaces).toEqual([
        [
          '/** A widget. */',
          'export interface Widget {',
          '  id: string;',
          '  /** Paint color */',
          '  color?: Color;',
          '  tags?: string[];',
          '  ownerName?: string | null;',
          '}',
        ].join('\n'),
      ]);
      expect(result.warnings).toEqual([]);
    });

    it('should reject aliases for unknown fields', () => {
      expect(() => defineModel('Thing', { a: z.string() }, { aliases: { b: 'B' } })).toThrow(
        CatalogDefinitionError
      );
    });

    it('should reject defaults without a JSON form', () => {
      expect(() => defineModel('Thing', { seen: z.map(z.string(), z.number()).default(new Map()) })).toThrow(
        "Default of 'Thing.seen' is not representable as JSON"
      );
    });
  });

  describe('numeric enum values', () => {
    it('should reject values that would name a member with a number', () => {
      expect(() => defineEnum('Code', ['ok', '1'])).toThrow(
        "Value '1' of enum 'Code' cannot name a member; use defineNativeEnum"
      );
      expect(() => defineEnum('Code', ['NaN'])).toThrow(CatalogDefinitionError);
    });

    it('should accept values that only start with a digit', () => {
      expect(defineEnum('Size', ['1x', '2x']).declaration.members).toEqual([
        { name: '1x', value: '1x' },
        { name: '2x', value: '2x' },
      ]);
    });
  });

  describe('defineBatch', () => {
    it('should keep entry order', () => {
      const A = defineEnum('A', ['a']);
      const B = defineModel('B', { a: A.schema });
      const batch = defineBatch('pair', [A, B], { description: 'Two things' });
      expect(batch.name).toBe('pair');
      expect(batch.description).toBe('Two things');
      expect(batch.declarations.map((declaration) => declaration.name)).toEqual(['A', 'B']);
    });

    it('should reject duplicate names', () => {
      const first = defineEnum('Same', ['a']);
      const second = defineModel('Same', {});
      expect(() => defineBatch('dup', [first, second])).toThrow(
        "Duplicate declaration 'Same' in batch 'dup'"
      );
    });
  });

  describe('isSourceBatch', () => {
    it('should accept defined batches', () => {
      expect(isSourceBatch(defineBatch('ok', [defineEnum('E', ['x'])]))).toBe(true);
    });

    it('should reject other values', () => {
      expect(isSourceBatch(null)).toBe(false);
      expect(isSourceBatch({ name: 'x' })).toBe(false);
      expect(isSourceBatch({ name: 'x', declarations: [{ kind: 'Table', name: 'T' }] })).toBe(false);
    });
  });
});
