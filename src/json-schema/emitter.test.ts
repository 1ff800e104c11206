import { describe, expect, it } from 'vitest';
import { resolveBatch, type SourceBatch, type TypeSource } from '../batch/index.js';
import { ANY, MAP_OF_ANY, listOf, literal, mapOf, namedRef, optional, primitive } from '../descriptor/index.js';
import {
  JSON_SCHEMA_DRAFT,
  emitJsonSchemaDocument,
  lowerToJsonSchema,
  serializeJsonSchemaDocument,
} from './emitter.js';

function annotation(text: string): TypeSource {
  return { kind: 'Annotation', annotation: text };
}

const widgets: SourceBatch = {
  name: 'widgets',
  description: 'Widget payloads',
  declarations: [
    {
      kind: 'Enum',
      name: 'Color',
      members: [
        { name: 'RED', value: 'red' },
        { name: 'GREEN', value: 'green' },
      ],
    },
    {
      kind: 'Model',
      name: 'Widget',
      description: 'A widget.',
      fields: [
        { name: 'id', type: annotation('UUID'), required: true },
        { name: 'color', type: annotation('Color'), required: true, description: 'Paint color' },
        { name: 'tags', type: annotation('list[str]'), required: false, default: [] },
        { name: 'owner', alias: 'ownerName', type: annotation('str | None'), required: false },
        { name: 'parts', type: annotation('list[Part]'), required: true },
      ],
    },
  ],
};

describe('JSON Schema emitter', () => {
  describe('lowerToJsonSchema', () => {
    const none = new Set<string>();

    it('should map primitives with formats', () => {
      expect(lowerToJsonSchema(primitive('int'), none)).toEqual({ type: 'integer' });
      expect(lowerToJsonSchema(primitive('datetime'), none)).toEqual({
        type: 'string',
        format: 'date-time',
      });
      expect(lowerToJsonSchema(ANY, none)).toEqual({});
    });

    it('should accept anything for unknown primitive names', () => {
      expect(lowerToJsonSchema(primitive('Decimal'), none)).toEqual({});
    });

    it('should keep map value types', () => {
      expect(lowerToJsonSchema(mapOf(primitive('int')), none)).toEqual({
        type: 'object',
        additionalProperties: { type: 'integer' },
      });
      expect(lowerToJsonSchema(MAP_OF_ANY, none)).toEqual({ type: 'object' });
    });

    it('should lower literals to const or enum', () => {
      expect(lowerToJsonSchema(literal(['a']), none)).toEqual({ const: 'a' });
      expect(lowerToJsonSchema(literal(['a', 1]), none)).toEqual({ enum: ['a', 1] });
    });

    it('should lower optional list elements', () => {
      expect(lowerToJsonSchema(listOf(optional(primitive('str'))), none)).toEqual({
        type: 'array',
        items: { anyOf: [{ type: 'string' }, { type: 'null' }] },
      });
    });

    it('should reference declared names only', () => {
      expect(lowerToJsonSchema(namedRef('Part'), new Set(['Part']))).toEqual({
        $ref: '#/definitions/Part',
      });
      expect(lowerToJsonSchema(namedRef('Part'), none)).toEqual({});
    });
  });

  describe('emitJsonSchemaDocument', () => {
    const document = emitJsonSchemaDocument(resolveBatch(widgets));

    it('should emit document metadata', () => {
      expect(document.$schema).toBe(JSON_SCHEMA_DRAFT);
      expect(document.$id).toBe('urn:schema-typegen:widgets');
      expect(document.title).toBe('widgets');
      expect(document.description).toBe('Widget payloads');
      expect(Object.keys(document.definitions)).toEqual(['Color', 'Widget']);
    });

    it('should emit enum definitions with their values', () => {
      expect(document.definitions.Color).toEqual({
        title: 'Color',
        type: 'string',
        enum: ['red', 'green'],
      });
    });

    it('should emit model definitions keyed by wire name', () => {
      expect(document.definitions.Widget).toEqual({
        title: 'Widget',
        description: 'A widget.',
        type: 'object',
        properties: {
          id: { type: 'string', format: 'uuid' },
          color: { allOf: [{ $ref: '#/definitions/Color' }], description: 'Paint color' },
          tags: { type: 'array', items: { type: 'string' }, default: [] },
          ownerName: { anyOf: [{ type: 'string' }, { type: 'null' }] },
          parts: { type: 'array', items: {} },
        },
        required: ['id', 'color', 'parts'],
      });
    });

    it('should type numeric enums', () => {
      const doc = emitJsonSchemaDocument(
        resolveBatch({
          name: 'levels',
          declarations: [
            {
              kind: 'Enum',
              name: 'Level',
              members: [
                { name: 'LOW', value: 1 },
                { name: 'HIGH', value: 2 },
              ],
            },
          ],
        })
      );
      expect(doc.definitions.Level).toEqual({ title: 'Level', type: 'integer', enum: [1, 2] });
      expect(doc.description).toBeUndefined();
    });

    it('should omit required when every field is optional', () => {
      const doc = emitJsonSchemaDocument(
        resolveBatch({
          name: 'loose',
          declarations: [
            {
              kind: 'Model',
              name: 'Loose',
              fields: [{ name: 'note', type: annotation('str'), required: false }],
            },
          ],
        })
      );
      expect(doc.definitions.Loose).toEqual({
        title: 'Loose',
        type: 'object',
        properties: { note: { type: 'string' } },
      });
    });
  });

  describe('prototype-named keys', () => {
    const doc = emitJsonSchemaDocument(
      resolveBatch({
        name: 'odd',
        declarations: [
          {
            kind: 'Model',
            name: 'Odd',
            fields: [
              { name: '__proto__', type: annotation('str'), required: true },
              { name: 'b', type: annotation('int'), required: true },
            ],
          },
        ],
      })
    );

    it('should keep a __proto__ field as a property', () => {
      const definition = doc.definitions.Odd;
      expect(Object.keys(definition?.properties ?? {})).toEqual(['__proto__', 'b']);
      expect(definition?.required).toEqual(['__proto__', 'b']);
    });

    it('should serialize the __proto__ property', () => {
      expect(serializeJsonSchemaDocument(doc)).toContain(
        '"__proto__": {\n          "type": "string"\n        }'
      );
    });
  });

  describe('serializeJsonSchemaDocument', () => {
    it('should indent with two spaces and end with a newline', () => {
      const text = serializeJsonSchemaDocument(
        emitJsonSchemaDocument(resolveBatch({ name: 'empty', declarations: [] }))
      );
      expect(text).toBe(
        [
          '{',
          '  "$schema": "http://json-schema.org/draft-07/schema#",',
          '  "$id": "urn:schema-typegen:empty",',
          '  "title": "empty",',
          '  "definitions": {}',
          '}',
          '',
        ].join('\n')
      );
    });
  });
});
