import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { STAT_FIELDS } from './stats.js';
import { COMPARISON_OPERATORS, SEVERITIES, type RuleDefinition } from './types.js';

export class RuleConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'RuleConfigError';
  }
}

const RuleBaseSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1).optional(),
  stat_field: z.enum(STAT_FIELDS),
  normalize_by_duration: z.boolean().default(false),
  severity: z.enum(SEVERITIES).default('info'),
  message_template: z.string().min(1),
});

const PercentileFields = {
  percentile: z.number().gt(0).max(100),
  direction: z.enum(['high', 'low']).default('high'),
};

const RuleSchema = z.discriminatedUnion('condition_type', [
  RuleBaseSchema.extend({
    condition_type: z.literal('absolute'),
    operator: z.enum(COMPARISON_OPERATORS),
    threshold: z.number(),
  }).strict(),
  RuleBaseSchema.extend({ condition_type: z.literal('personal_max') }).strict(),
  RuleBaseSchema.extend({
    condition_type: z.literal('personal_min'),
    min_value: z.number().optional(),
  }).strict(),
  RuleBaseSchema.extend({ condition_type: z.literal('population_percentile'), ...PercentileFields }).strict(),
  RuleBaseSchema.extend({ condition_type: z.literal('player_percentile'), ...PercentileFields }).strict(),
]);

const RuleFileSchema = z
  .object({ rules: z.array(RuleSchema) })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.rules.forEach((rule, index) => {
      if (seen.has(rule.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rules', index, 'id'],
          message: `Duplicate rule id "${rule.id}"`,
        });
      }
      seen.add(rule.id);
    });
  });

type RuleInput = z.infer<typeof RuleSchema>;

const toRuleDefinition = (input: RuleInput): RuleDefinition => {
  const base = {
    id: input.id,
    name: input.name ?? input.id,
    statField: input.stat_field,
    normalizeByDuration: input.normalize_by_duration,
    severity: input.severity,
    messageTemplate: input.message_template,
  };

  switch (input.condition_type) {
    case 'absolute':
      return { ...base, kind: 'absolute', operator: input.operator, threshold: input.threshold };
    case 'personal_max':
      return { ...base, kind: 'personal_max' };
    case 'personal_min':
      return { ...base, kind: 'personal_min', minValue: input.min_value ?? null };
    case 'population_percentile':
      return { ...base, kind: 'population_percentile', percentile: input.percentile, direction: input.direction };
    case 'player_percentile':
      return { ...base, kind: 'player_percentile', percentile: input.percentile, direction: input.direction };
  }
};

/** Validates a parsed rule document. Any invalid entry rejects the whole set. */
export const parseRuleSet = (document: unknown): RuleDefinition[] => {
  const parsed = RuleFileSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new RuleConfigError(`Invalid rule configuration (${issues.length} issue(s))`, issues);
  }
  return parsed.data.rules.map(toRuleDefinition);
};

export const loadRuleSet = async (path: string): Promise<RuleDefinition[]> => {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new RuleConfigError(`Cannot read rule configuration at ${path}: ${err instanceof Error ? err.message : err}`);
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new RuleConfigError(`Rule configuration at ${path} is not valid JSON: ${err instanceof Error ? err.message : err}`);
  }

  return parseRuleSet(document);
};
