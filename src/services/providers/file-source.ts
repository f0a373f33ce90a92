/**
 * SourceTextProvider reading plain-text documents from disk.
 *
 * A handle is a path (absolute, or relative to the base directory). Line
 * items are read from an optional sidecar file next to the document:
 * `quote.txt` -> `quote.items.json`, a JSON array of line items.
 *
 * @module services/providers/file-source
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { LineItemSchema, type SourceDocument, type SourceTextProvider } from '../../models/ports.js';
import { validateInput, ValidationError } from '../../utils/validation.js';

const LineItemsFileSchema = z.array(LineItemSchema);

export function sidecarPath(documentPath: string): string {
  const parsed = path.parse(documentPath);
  return path.join(parsed.dir, `${parsed.name}.items.json`);
}

export class FileSourceTextProvider implements SourceTextProvider {
  constructor(private readonly baseDir: string = process.cwd()) {}

  async getSource(handle: string): Promise<SourceDocument> {
    const documentPath = path.resolve(this.baseDir, handle);
    if (!fs.existsSync(documentPath)) {
      throw new ValidationError(`Source document not found: ${documentPath}`, { handle });
    }

    const text = await fs.promises.readFile(documentPath, 'utf-8');
    const itemsPath = sidecarPath(documentPath);
    if (!fs.existsSync(itemsPath)) {
      return { text, lineItems: [] };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.promises.readFile(itemsPath, 'utf-8'));
    } catch (error) {
      throw new ValidationError(
        `Line items file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        { itemsPath }
      );
    }
    return { text, lineItems: validateInput(LineItemsFileSchema, parsed) };
  }
}
