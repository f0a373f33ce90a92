/**
 * TemplateSchemaProvider reading `<dir>/<variant>.json` field schemas.
 *
 * A schema file is either an array of field entries or `{ "fields": [...] }`.
 * Parsed schemas are cached per variant.
 *
 * @module services/providers/json-template
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { type FieldSchemaEntry, FieldSchemaSchema } from '../../models/field-schema.js';
import type { TemplateSchemaProvider } from '../../models/ports.js';
import { validateInput, ValidationError } from '../../utils/validation.js';

const VARIANT_PATTERN = /^[A-Za-z0-9_-]+$/;

const TemplateFileSchema = z.union([FieldSchemaSchema, z.object({ fields: FieldSchemaSchema })]);

export class JsonTemplateSchemaProvider implements TemplateSchemaProvider {
  private readonly cache = new Map<string, FieldSchemaEntry[]>();

  constructor(private readonly templatesDir: string) {}

  async getSchema(variant: string): Promise<FieldSchemaEntry[]> {
    if (!VARIANT_PATTERN.test(variant)) {
      throw new ValidationError(`Invalid template variant name: "${variant}"`, { variant });
    }
    const cached = this.cache.get(variant);
    if (cached) return cached;

    const filePath = path.join(this.templatesDir, `${variant}.json`);
    if (!fs.existsSync(filePath)) {
      throw new ValidationError(`No schema for template variant "${variant}"`, { filePath });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
    } catch (error) {
      throw new ValidationError(
        `Template schema is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        { filePath }
      );
    }

    const template = validateInput(TemplateFileSchema, parsed);
    const schema = Array.isArray(template) ? template : template.fields;
    this.cache.set(variant, schema);
    return schema;
  }

  listVariants(): string[] {
    if (!fs.existsSync(this.templatesDir)) return [];
    return fs
      .readdirSync(this.templatesDir)
      .filter((name) => name.endsWith('.json'))
      .map((name) => name.slice(0, -'.json'.length))
      .filter((name) => VARIANT_PATTERN.test(name))
      .sort();
  }
}
