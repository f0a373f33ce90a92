/**
 * Field schema descriptor for one extractable template field.
 *
 * Schemas are supplied per template variant and validated at call time;
 * no per-schema types are generated.
 */

import { z } from 'zod';

export const FieldTypeSchema = z.enum(['text', 'boolean', 'enumerated']);

export type FieldType = z.infer<typeof FieldTypeSchema>;

export const FieldSchemaEntrySchema = z
  .object({
    name: z
      .string()
      .trim()
      .min(1, 'field name must not be empty')
      .max(200)
      .regex(/^[A-Za-z0-9_.\-]+$/, 'field name may only contain letters, digits, _ . -'),
    /** Ordered section, subsection, sub-subsection */
    sectionPath: z.array(z.string().trim().min(1)).default([]),
    type: FieldTypeSchema,
    /** Allowed values for enumerated fields */
    options: z.array(z.string().trim().min(1)).optional(),
    defaultValue: z.string().optional(),
    description: z.string().optional(),
    /** Phrases whose presence supports a YES for boolean fields */
    positiveIndicators: z.array(z.string().min(1)).optional(),
    /** Phrases that negate a boolean field ("no conveyor") */
    negativeIndicators: z.array(z.string().min(1)).optional(),
    synonyms: z.array(z.string().min(1)).optional(),
    /** Canonical unit for numeric text fields (e.g. "psi", "V") */
    unit: z.string().trim().min(1).optional(),
    /** Boolean fields sharing a group allow at most one YES */
    exclusiveGroup: z.string().trim().min(1).optional(),
    /** Lower wins inside an exclusive group */
    priority: z.number().int().optional(),
    /** Section prefixes whose YES selections this text field summarises; "*" for all */
    summaryOf: z.array(z.string().min(1)).optional(),
    /** Companion fields expected to be filled whenever this one is */
    requires: z.array(z.string().min(1)).optional(),
  })
  .superRefine((entry, ctx) => {
    if (entry.type === 'enumerated' && (!entry.options || entry.options.length === 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['options'],
        message: `enumerated field "${entry.name}" must declare at least one option`,
      });
    }
    if (entry.summaryOf && entry.type !== 'text') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['summaryOf'],
        message: `summary field "${entry.name}" must be of type text`,
      });
    }
    if (entry.exclusiveGroup && entry.type !== 'boolean') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['exclusiveGroup'],
        message: `exclusive group member "${entry.name}" must be of type boolean`,
      });
    }
  });

export type FieldSchemaEntry = z.infer<typeof FieldSchemaEntrySchema>;

export const FieldSchemaSchema = z.array(FieldSchemaEntrySchema).min(1, 'schema must declare at least one field');

/**
 * Key identifying the sub-subsection a field belongs to.
 */
export function sectionKey(entry: Pick<FieldSchemaEntry, 'sectionPath'>): string {
  return entry.sectionPath.join(' > ');
}
