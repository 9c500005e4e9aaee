/**
 * Input validation
 *
 * zod schemas for everything that enters from outside the library:
 * CLI arguments, provider selections, document paths.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import {
  documentKindOf,
  extensionOf,
  isSupportedExtension,
  SUPPORTED_EXTENSIONS,
  type Document,
} from '../models/document.js';
import { PROVIDER_IDS } from '../models/provider.js';
import { COMPARISON_MODEL_NAMES } from '../services/llm/config.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failing path
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const issuePath = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${issuePath}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

/**
 * Build the immutable Document for a path.
 *
 * @throws ValidationError when the file is missing, not a file, or of an unsupported type
 */
export function toDocument(filePath: string): Document {
  const extension = extensionOf(filePath);
  if (!isSupportedExtension(extension)) {
    throw new ValidationError(
      `Unsupported file type: ${extension ? `.${extension}` : '(none)'}. ` +
        `Supported: ${SUPPORTED_EXTENSIONS.map((e) => `.${e}`).join(', ')}`
    );
  }

  let stat: fs.Stats;
  try {
    stat = fs.statSync(filePath);
  } catch (error) {
    throw new ValidationError(
      `File not found: ${filePath} (${error instanceof Error ? error.message : String(error)})`
    );
  }
  if (!stat.isFile()) {
    throw new ValidationError(`Not a file: ${filePath}`);
  }

  return {
    path: filePath,
    fileName: path.basename(filePath),
    extension,
    kind: documentKindOf(extension),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLI INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ProviderIdSchema = z.enum(PROVIDER_IDS);

export const ComparisonModelSchema = z.enum(COMPARISON_MODEL_NAMES);

/**
 * Comma-separated provider list, e.g. "textract,mistral". Duplicates collapse.
 */
export const ProviderListSchema = z
  .string()
  .transform((raw) => [...new Set(raw.split(',').map((p) => p.trim()).filter(Boolean))])
  .pipe(z.array(ProviderIdSchema).min(1, 'At least one provider is required'));

export const CompareCommandInput = z.object({
  file: z.string().min(1, 'A document path is required'),
  providers: ProviderListSchema.default(PROVIDER_IDS.join(',')),
  compare: ComparisonModelSchema.optional(),
  segmented: z.boolean().default(false),
  json: z.boolean().default(false),
  sequential: z.boolean().default(false),
});

export type CompareCommand = z.infer<typeof CompareCommandInput>;

export const ListCommandInput = z.object({
  directory: z.string().min(1, 'A directory is required'),
});
