import { z } from 'zod';

import { ConfigError } from './errors.js';
import { countCaptureGroups, describePatternError } from './patterns.js';
import { DEFAULT_CONTACT_FORMAT, findUnknownPlaceholders } from './template.js';

/**
 * File-level schemas mirror the configuration documents as operators write
 * them (snake_case keys). `compileConfigDocument` turns a validated document
 * into the tagged rules the engine consumes.
 */

const PatternSchema = z
  .string()
  .min(1, 'Pattern must not be empty')
  .superRefine((value, context) => {
    const problem = describePatternError(value);
    if (problem) {
      context.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid pattern: ${problem}` });
    }
  });

const StaticValueSchema = z.union([z.string(), z.array(z.string())]);

const FieldRuleInputSchema = z
  .object({
    static: StaticValueSchema.optional(),
    regex_any: z.array(PatternSchema).optional()
  })
  .strict();

const TextSourceSchema = z.enum(['none', 'pages']);

const ServicesRuleInputSchema = FieldRuleInputSchema.extend({
  text_source: TextSourceSchema.default('none')
}).strict();

const PhoneRuleInputSchema = z
  .object({
    regex_any: z.array(PatternSchema).optional(),
    prefer: z.array(PatternSchema).default([]),
    required_min: z.number().int().default(1)
  })
  .strict();

const ContactPersonRuleInputSchema = z
  .object({
    static: z.string().optional(),
    page: z.string().url().optional(),
    regex: PatternSchema.optional(),
    format: z
      .string()
      .default(DEFAULT_CONTACT_FORMAT)
      .superRefine((value, context) => {
        const unknown = findUnknownPlaceholders(value);
        if (unknown.length > 0) {
          context.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown placeholder(s): ${unknown.map((name) => `{${name}}`).join(', ')}`
          });
        }
      })
  })
  .strict()
  .superRefine((value, context) => {
    if (value.regex && !describePatternError(value.regex) && countCaptureGroups(value.regex) < 1) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['regex'],
        message: 'Contact person pattern must capture the name in group 1'
      });
    }
  });

const OgNameInputSchema = z
  .object({
    url: z.string().url().optional()
  })
  .strict();

const SelectorsInputSchema = z
  .object({
    og_name: OgNameInputSchema.optional(),
    address: FieldRuleInputSchema,
    phones: PhoneRuleInputSchema,
    services: ServicesRuleInputSchema,
    contact_person: ContactPersonRuleInputSchema
  })
  .strict();

export const OrganizationInputSchema = z
  .object({
    contact_pages: z.array(z.string().url()).min(1, 'At least one contact page is required'),
    selectors: SelectorsInputSchema
  })
  .strict();

export type OrganizationInput = z.input<typeof OrganizationInputSchema>;

export const ConfigDocumentSchema = z.record(z.string().min(1), OrganizationInputSchema);

export type ConfigDocument = z.input<typeof ConfigDocumentSchema>;

export type FieldRule =
  | { readonly kind: 'static'; readonly value: string | readonly string[] }
  | { readonly kind: 'regexAny'; readonly patterns: readonly string[] };

export type PhoneCandidateSource =
  | { readonly kind: 'patterns'; readonly patterns: readonly string[] }
  | { readonly kind: 'generic' };

export interface PhoneRule {
  readonly source: PhoneCandidateSource;
  readonly preferPatterns: readonly string[];
  readonly requiredMin: number;
}

export type ServicesTextSource = z.infer<typeof TextSourceSchema>;

export interface ServicesRule {
  readonly rule: FieldRule;
  readonly textSource: ServicesTextSource;
}

export interface ContactPersonRule {
  readonly static?: string;
  readonly page?: string;
  readonly pattern?: string;
  readonly format: string;
}

export interface OrganizationSelectors {
  readonly address: FieldRule;
  readonly phones: PhoneRule;
  readonly services: ServicesRule;
  readonly contactPerson: ContactPersonRule;
  readonly ogName?: { readonly url?: string };
}

export interface OrganizationConfig {
  readonly id: string;
  readonly contactPages: readonly string[];
  readonly selectors: OrganizationSelectors;
}

const hasStaticValue = (value: string | readonly string[] | undefined): value is string | readonly string[] => {
  return value !== undefined && value.length > 0;
};

export function compileFieldRule(input: z.infer<typeof FieldRuleInputSchema>): FieldRule {
  if (hasStaticValue(input.static)) {
    return { kind: 'static', value: input.static };
  }
  return { kind: 'regexAny', patterns: input.regex_any ?? [] };
}

export function compilePhoneRule(input: z.infer<typeof PhoneRuleInputSchema>): PhoneRule {
  return {
    source: input.regex_any ? { kind: 'patterns', patterns: input.regex_any } : { kind: 'generic' },
    preferPatterns: input.prefer,
    requiredMin: input.required_min
  };
}

export function compileContactPersonRule(
  input: z.infer<typeof ContactPersonRuleInputSchema>
): ContactPersonRule {
  return {
    static: input.static ? input.static : undefined,
    page: input.page,
    pattern: input.regex,
    format: input.format
  };
}

export function compileOrganizationConfig(
  id: string,
  input: z.infer<typeof OrganizationInputSchema>
): OrganizationConfig {
  const { selectors } = input;
  const { text_source: textSource, ...servicesRule } = selectors.services;
  return {
    id,
    contactPages: input.contact_pages,
    selectors: {
      address: compileFieldRule(selectors.address),
      phones: compilePhoneRule(selectors.phones),
      services: { rule: compileFieldRule(servicesRule), textSource },
      contactPerson: compileContactPersonRule(selectors.contact_person),
      ogName: selectors.og_name
    }
  };
}

export const formatIssues = (error: z.ZodError): string[] => {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
};

/**
 * Validates and compiles a whole configuration document. Organizations keep
 * the order in which the document declares them.
 */
export function compileConfigDocument(
  document: unknown,
  source = 'inline'
): ReadonlyMap<string, OrganizationConfig> {
  const result = ConfigDocumentSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new ConfigError(source, formatIssues(result.error));
  }

  const organizations = new Map<string, OrganizationConfig>();
  for (const [id, entry] of Object.entries(result.data)) {
    organizations.set(id, compileOrganizationConfig(id, entry));
  }
  return organizations;
}
