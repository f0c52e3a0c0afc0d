import { z } from 'zod';
import { CANONICAL_FIELDS, SOURCE_FORMATS } from '../records/types.js';

const CanonicalFieldSchema = z.enum(CANONICAL_FIELDS);
const SourceFormatSchema = z.enum(SOURCE_FORMATS);

function compilePattern(source: string, ctx: z.RefinementCtx): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid pattern: ${error instanceof Error ? error.message : String(error)}`,
    });
    return z.NEVER;
  }
}

const ruleBase = {
  field: CanonicalFieldSchema.describe('Canonical field this source field feeds'),
  also: z.array(z.string().min(1)).optional().describe('Extra source fields appended before the transform'),
  match: z
    .string()
    .min(1)
    .transform(compilePattern)
    .optional()
    .describe('Only source values matching this pattern feed the rule'),
};

const IdentityRuleSchema = z.object({ ...ruleBase, transform: z.literal('identity') }).strict();

const SplitRuleSchema = z
  .object({ ...ruleBase, transform: z.literal('split'), argument: z.string().min(1) })
  .strict();

const JoinRuleSchema = z
  .object({ ...ruleBase, transform: z.literal('join'), argument: z.string() })
  .strict();

const FirstNWordsRuleSchema = z
  .object({
    ...ruleBase,
    transform: z.literal('first-n-words'),
    argument: z.coerce.number().int().positive(),
  })
  .strict();

const YearExtractRuleSchema = z.object({ ...ruleBase, transform: z.literal('year-extract') }).strict();

const ValueMapRuleSchema = z
  .object({
    ...ruleBase,
    transform: z.literal('value-map'),
    values: z.record(z.string(), z.string().min(1)),
    default: z.string().min(1).optional(),
  })
  .strict();

const DoiExtractRuleSchema = z.object({ ...ruleBase, transform: z.literal('doi-extract') }).strict();

const NamePairsRuleSchema = z.object({ ...ruleBase, transform: z.literal('name-pairs') }).strict();

const IssnExtractRuleSchema = z.object({ ...ruleBase, transform: z.literal('issn-extract') }).strict();

const RuleUnionSchema = z.discriminatedUnion('transform', [
  IdentityRuleSchema,
  SplitRuleSchema,
  JoinRuleSchema,
  FirstNWordsRuleSchema,
  YearExtractRuleSchema,
  ValueMapRuleSchema,
  DoiExtractRuleSchema,
  NamePairsRuleSchema,
  IssnExtractRuleSchema,
]);

function withDefaultTransform(value: unknown): unknown {
  if (typeof value === 'string') {
    return { field: value, transform: 'identity' };
  }
  if (value !== null && typeof value === 'object' && !Array.isArray(value) && !('transform' in value)) {
    return { ...value, transform: 'identity' };
  }
  return value;
}

/** A rule may be written as a bare canonical field name when no transform is needed. */
export const MappingRuleSchema = z.preprocess(withDefaultTransform, RuleUnionSchema);

/** One source field may feed several canonical fields: a list of rules, tried in order. */
const MappingRuleListSchema = z.preprocess(
  (value) => (Array.isArray(value) ? value : [value]),
  z.array(MappingRuleSchema).min(1)
);

export const MappingFileSchema = z
  .object({
    format: SourceFormatSchema,
    entryType: z.string().min(1).describe('Entry type used when no rule yields one'),
    fields: z
      .record(z.string().min(1), MappingRuleListSchema)
      .refine((fields) => Object.keys(fields).length > 0, { message: 'at least one field rule is required' }),
  })
  .strict();

export type MappingRuleEntry = z.infer<typeof RuleUnionSchema>;
export type MappingFile = z.infer<typeof MappingFileSchema>;
