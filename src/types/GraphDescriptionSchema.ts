/**
 * Runtime schemas for graph description documents (validation only).
 */

import { z } from 'zod';

/** Labels, property keys and role identifiers are spliced into Cypher text, never bound. */
export const IDENTIFIER_TOKEN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const PropertyScalarSchema = z.union([z.string(), z.number().finite(), z.boolean()]);

export const PropertyValueSchema = z.union([PropertyScalarSchema, z.array(PropertyScalarSchema), z.null()]);

// Assigning `__proto__` on a plain object replaces its prototype instead of adding a key
const PROTOTYPE_KEY = '__proto__';

export const PropertyKeySchema = z
  .string()
  .regex(IDENTIFIER_TOKEN, 'property key must be an identifier (letters, digits, underscore)')
  .refine((key) => key !== PROTOTYPE_KEY, `'${PROTOTYPE_KEY}' cannot be used as a property key`);

const ItemIdSchema = z.string().refine((id) => id !== PROTOTYPE_KEY, `'${PROTOTYPE_KEY}' cannot be used as an id`);

export const GraphItemInputSchema = z
  .object({
    label: z
      .string()
      .min(1, 'label is required')
      .regex(IDENTIFIER_TOKEN, 'label must be an identifier (letters, digits, underscore)'),
    properties: z.record(PropertyKeySchema, PropertyValueSchema).default({}),
  })
  .strict();

export const GraphDescriptionInputSchema = z
  .object({
    nodes: z.record(ItemIdSchema, z.unknown()).default({}),
    edges: z.record(ItemIdSchema, z.unknown()).default({}),
  })
  .passthrough();

export type GraphItemInput = z.infer<typeof GraphItemInputSchema>;

/** Flatten zod issues into `path: message` lines */
export function formatIssues(error: z.ZodError, prefix: string[] = []): string[] {
  return error.issues.map((issue) => {
    const path = [...prefix, ...issue.path.map(String)].join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
