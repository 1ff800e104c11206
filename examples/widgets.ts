/**
 * A structured batch. Point a `module` entry in typegen.toml at the compiled
 * JavaScript of a file like this one:
 *
 * ```toml
 * [[batches]]
 * name = "widgets"
 * module = "build/widgets.js"
 * ```
 *
 * Schemas reused by identity (`Color.schema`) become references; a schema
 * rebuilt with `.describe()` on the enum itself would not.
 */

import { z } from 'zod';
import { defineBatch, defineEnum, defineModel } from '../src/index.js';

export const Color = defineEnum('Color', ['red', 'green', 'blue'], {
  description: 'Paint colors',
});

export const Widget = defineModel(
  'Widget',
  {
    id: z.string().uuid(),
    color: Color.schema,
    tags: z.array(z.string()).default([]),
    owner: z.string().nullable().optional(),
    createdAt: z.string().datetime(),
  },
  { aliases: { owner: 'ownerName' }, description: 'A widget.' }
);

export const batch = defineBatch('widgets', [Color, Widget], {
  description: 'Widget payloads',
});
