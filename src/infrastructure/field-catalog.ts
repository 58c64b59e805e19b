import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';
import { fieldKindSchema, recordTypeSchema } from '../domain/schemas.js';
import type { FieldKind, RecordType } from '../domain/types.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'field-catalog' });

const currentDir = dirname(fileURLToPath(import.meta.url));

/** Nearest `config/` directory above this module, so sources and the build read the same files. */
function findConfigDir(start: string): string {
  let dir = start;
  for (;;) {
    const candidate = join(dir, 'config');
    if (existsSync(join(candidate, 'field-catalog.yaml'))) return candidate;
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`No config directory found above ${start}`);
    }
    dir = parent;
  }
}

export const CONFIG_DIR = process.env.REVIEW_CONFIG_DIR ?? findConfigDir(currentDir);

const fieldSpecSchema = z.object({
  kind: fieldKindSchema,
  entityKey: z.string().min(1).optional(),
  pointValue: z.boolean().default(false),
  impact: z.enum(['financial', 'contractual', 'none']).default('none'),
  corroborates: z.string().min(1).optional(),
});

const recordTypeSpecSchema = z.object({
  eventKey: z.array(z.string()).default([]),
  descriptorFields: z.array(z.string()).default([]),
  fields: z.record(z.string(), fieldSpecSchema),
});

const catalogSchema = z.object({
  refundKeywords: z.array(z.string().min(1)),
  paymentKeywords: z.array(z.string().min(1)),
  currencyAliases: z.record(z.string(), z.string().length(3)),
  recordTypes: z.record(recordTypeSchema, recordTypeSpecSchema),
});

export type FieldSpec = z.infer<typeof fieldSpecSchema>;
export type RecordTypeSpec = z.infer<typeof recordTypeSpecSchema>;
export type FieldCatalog = z.infer<typeof catalogSchema>;

const FREE_TEXT_SPEC: FieldSpec = { kind: 'free_text', pointValue: false, impact: 'none' };

export function readConfigFile(filename: string): string {
  return readFileSync(join(CONFIG_DIR, filename), 'utf-8');
}

export function parseFieldCatalog(source: string): Result<FieldCatalog, AppError> {
  let document: unknown;
  try {
    document = YAML.parse(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(createAppError(ErrorCode.FIELD_CATALOG_INVALID, 'Field catalog is not valid YAML', false, message));
  }

  const parsed = catalogSchema.safeParse(document);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return err(createAppError(ErrorCode.FIELD_CATALOG_INVALID, 'Field catalog failed validation', false, details));
  }

  return ok(parsed.data);
}

let instance: FieldCatalog | null = null;

export function getFieldCatalog(): FieldCatalog {
  if (!instance) {
    const result = parseFieldCatalog(readConfigFile('field-catalog.yaml'));
    if (!result.ok) {
      log.fatal({ errorCode: result.error.code, details: result.error.details }, result.error.message);
      throw new Error(`[${result.error.code}] ${result.error.message}`);
    }
    instance = result.value;
  }
  return instance;
}

export function getRecordTypeSpec(catalog: FieldCatalog, recordType: RecordType): RecordTypeSpec {
  return catalog.recordTypes[recordType] ?? { eventKey: [], descriptorFields: [], fields: {} };
}

/**
 * Catalog entry for a field. Unknown fields are free text unless the
 * extractor declared a type; a declared type overrides the catalog kind.
 */
export function resolveFieldSpec(
  catalog: FieldCatalog,
  recordType: RecordType,
  fieldName: string,
  expectedType?: FieldKind,
): FieldSpec {
  const spec = getRecordTypeSpec(catalog, recordType).fields[fieldName] ?? FREE_TEXT_SPEC;
  return expectedType !== undefined ? { ...spec, kind: expectedType } : spec;
}
