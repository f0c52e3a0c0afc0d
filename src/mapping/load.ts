import fs from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import { getMappingDir } from '../config.js';
import { ConversionError } from '../convert/errors.js';
import type { SourceFormat } from '../records/types.js';
import { MappingFileSchema, type MappingFile } from './schema.js';
import type { FieldMappingTable, MappingRule } from './types.js';

export interface LoadMappingOptions {
  mappingDir?: string;
}

export function mappingPathFor(format: SourceFormat, mappingDir?: string): string {
  return path.join(getMappingDir(mappingDir), `${format}.yaml`);
}

function describeIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function buildMappingTable(file: MappingFile): FieldMappingTable {
  const rules: MappingRule[] = Object.entries(file.fields).flatMap(([source, entries]) =>
    entries.map((entry) => Object.freeze({ ...entry, source }))
  );
  return Object.freeze({
    format: file.format,
    defaultEntryType: file.entryType,
    rules: Object.freeze(rules),
  });
}

/**
 * Validates already-parsed mapping data. Any problem is fatal: a partially valid table is never returned.
 */
export function parseMappingTable(data: unknown, format: SourceFormat, origin: string): FieldMappingTable {
  const result = MappingFileSchema.safeParse(data);
  if (!result.success) {
    throw new ConversionError(
      'MAPPING_INVALID',
      `Invalid mapping configuration in ${origin}: ${describeIssues(result.error.issues)}`
    );
  }
  if (result.data.format !== format) {
    throw new ConversionError(
      'MAPPING_INVALID',
      `Mapping configuration in ${origin} is declared for ${result.data.format}, expected ${format}`
    );
  }
  return buildMappingTable(result.data);
}

export async function loadMappingTable(
  format: SourceFormat,
  opts: LoadMappingOptions = {}
): Promise<FieldMappingTable> {
  const filePath = mappingPathFor(format, opts.mappingDir);

  let source: string;
  try {
    source = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConversionError('MAPPING_MISSING', `Cannot read mapping configuration ${filePath}`, { cause: error });
  }

  let data: unknown;
  try {
    data = parseYaml(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConversionError('MAPPING_INVALID', `Malformed YAML in ${filePath}: ${reason}`, { cause: error });
  }

  return parseMappingTable(data, format, filePath);
}
