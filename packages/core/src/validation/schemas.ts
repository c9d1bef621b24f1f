/**
 * Zod schemas for connector descriptors
 */

import { z } from 'zod';
import { INGESTION_TYPES } from '../types/index.js';
import { SEMVER_PATTERN } from '../utils/index.js';

const ID_PATTERN = /^[A-Za-z0-9_.-]+$/;
const KEY_PATTERN = /^[A-Za-z0-9_]+$/;
// Keys and ids become property names of plain objects.
const RESERVED_NAME = '__proto__';

const nonBlank = z.string().refine((value) => value.trim().length > 0, {
  message: 'must not be blank',
});

/** Ingestion category enum */
export const ingestionTypeSchema = z.enum(INGESTION_TYPES);

const fieldBase = {
  label: nonBlank,
  key: z
    .string()
    .regex(KEY_PATTERN, 'must contain only letters, digits and underscores')
    .refine((key) => key !== RESERVED_NAME, { message: `must not be '${RESERVED_NAME}'` }),
  mandatory: z.boolean(),
  description: z.string().optional(),
};

export const textFieldSchema = z
  .object({
    ...fieldBase,
    type: z.literal('text'),
    default: z.string().optional(),
  })
  .strict();

export const passwordFieldSchema = z
  .object({
    ...fieldBase,
    type: z.literal('password'),
    default: z.string().optional(),
  })
  .strict();

export const numberFieldSchema = z
  .object({
    ...fieldBase,
    type: z.literal('number'),
    default: z.number().finite().optional(),
  })
  .strict();

export const choiceOptionSchema = z
  .object({
    key: nonBlank,
    value: z.string(),
  })
  .strict();

export const choiceFieldSchema = z
  .object({
    ...fieldBase,
    type: z.literal('choice'),
    choices: z.array(choiceOptionSchema).min(1),
    default: z.string().optional(),
  })
  .strict();

/** Single configuration field, discriminated on `type` */
export const configurationFieldSchema = z
  .discriminatedUnion('type', [
    textFieldSchema,
    passwordFieldSchema,
    numberFieldSchema,
    choiceFieldSchema,
  ])
  .superRefine((field, ctx) => {
    if (field.type !== 'choice') return;

    const seen = new Set<string>();
    field.choices.forEach((choice, i) => {
      if (seen.has(choice.value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'must be unique among choices',
          path: ['choices', i, 'value'],
        });
      }
      seen.add(choice.value);
    });

    if (field.default !== undefined && !seen.has(field.default)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'must be one of the declared choice values',
        path: ['default'],
      });
    }
  });

/**
 * Top-level descriptor attributes. Field entries are checked one by one
 * afterwards so unknown types and duplicate keys get their own errors.
 */
export const descriptorEnvelopeSchema = z.object({
  name: nonBlank,
  id: z
    .string()
    .regex(ID_PATTERN, 'must contain only letters, digits, dots, dashes and underscores')
    .refine((id) => id !== RESERVED_NAME, { message: `must not be '${RESERVED_NAME}'` }),
  version: z.string().regex(SEMVER_PATTERN, 'must be a semantic version (x.y.z)'),
  mapping: nonBlank.optional(),
  types: z
    .array(ingestionTypeSchema)
    .min(1, 'must list at least one ingestion type')
    .superRefine((types, ctx) => {
      const seen = new Set<string>();
      types.forEach((type, i) => {
        if (seen.has(type)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate ingestion type: ${type}`,
            path: [i],
          });
        }
        seen.add(type);
      });
    }),
  description: z.string().optional(),
  configuration: z.array(z.unknown()),
});

export type ConfigurationFieldInput = z.infer<typeof configurationFieldSchema>;
export type DescriptorEnvelopeInput = z.infer<typeof descriptorEnvelopeSchema>;

/** Human-readable message for a single zod issue */
export function describeIssue(issue: z.ZodIssue): string {
  const attribute = issue.path[issue.path.length - 1];
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
    return typeof attribute === 'string'
      ? `Missing required attribute '${attribute}'`
      : 'Missing required value';
  }
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    return `Unrecognized attribute(s): ${issue.keys.join(', ')}`;
  }
  if (typeof attribute === 'string') {
    return `Attribute '${attribute}' ${lowerFirst(issue.message)}`;
  }
  return issue.message;
}

export function formatZodError(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

function lowerFirst(value: string): string {
  return value.length > 0 ? value.charAt(0).toLowerCase() + value.slice(1) : value;
}
