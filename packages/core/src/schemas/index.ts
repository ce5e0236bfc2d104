/**
 * Configuration validation schemas using Zod
 */

import { z, type ZodError } from 'zod';
import { ConfigurationError, type ErrorDetail } from '../utils/errors.js';

// ============================================================================
// Parameters
// ============================================================================

export const ParameterTypeSchema = z.enum(['string', 'integer', 'float', 'boolean', 'array']);

export type ParameterType = z.infer<typeof ParameterTypeSchema>;

export interface ParameterItemConfig {
  type: ParameterType;
  description?: string;
  items?: ParameterItemConfig;
}

export const ParameterItemSchema: z.ZodType<ParameterItemConfig> = z.lazy(() =>
  z
    .object({
      type: ParameterTypeSchema,
      description: z.string().optional(),
      items: ParameterItemSchema.optional(),
    })
    .refine((item) => item.type !== 'array' || item.items !== undefined, {
      message: 'array parameters must declare "items"',
      path: ['items'],
    })
);

export const AuthServiceSchema = z.object({
  name: z.string().min(1),
  field: z.string().min(1),
});

export type AuthServiceConfig = z.infer<typeof AuthServiceSchema>;

export const ParameterConfigSchema = z
  .object({
    name: z.string().min(1),
    type: ParameterTypeSchema,
    description: z.string().optional(),
    // Defaults to true unless a default value is declared
    required: z.boolean().optional(),
    default: z.unknown().optional(),
    items: ParameterItemSchema.optional(),
    authServices: z.array(AuthServiceSchema).min(1).optional(),
  })
  .superRefine((param, ctx) => {
    if (param.type === 'array' && param.items === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'array parameters must declare "items"',
        path: ['items'],
      });
    }
    if (param.required === true && param.default !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'a parameter with a default must not be required',
        path: ['default'],
      });
    }
  })
  .transform(({ required, ...param }) => ({
    ...param,
    required: required ?? param.default === undefined,
  }));

export type ParameterConfig = z.infer<typeof ParameterConfigSchema>;
export type ParameterConfigInput = z.input<typeof ParameterConfigSchema>;

export const ParametersSchema = z.array(ParameterConfigSchema).superRefine((params, ctx) => {
  const seen = new Set<string>();
  params.forEach((param, index) => {
    if (seen.has(param.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duplicate parameter name "${param.name}"`,
        path: [index, 'name'],
      });
    }
    seen.add(param.name);
  });
});

// ============================================================================
// MongoDB tool
// ============================================================================

export const MONGODB_TOOL_KIND = 'mongodb-atlas';

export const MongoDBToolConfigSchema = z.object({
  name: z.string().min(1),
  kind: z.literal(MONGODB_TOOL_KIND),
  source: z.string().min(1),
  description: z.string().min(1),
  collection: z.string().min(1),
  // Unknown kinds are reported at invocation
  operation: z.string().min(1).default('find'),
  query: z.record(z.unknown()),
  authRequired: z.array(z.string().min(1)).default([]),
  parameters: ParametersSchema.default([]),
  requestBody: z.string().optional(),
});

export type MongoDBToolConfig = z.infer<typeof MongoDBToolConfigSchema>;
export type MongoDBToolConfigInput = z.input<typeof MongoDBToolConfigSchema>;

// ============================================================================
// MongoDB source
// ============================================================================

export const MONGODB_SOURCE_KIND = 'mongodb';

export const MongoDBSourceConfigSchema = z.object({
  name: z.string().min(1),
  kind: z.literal(MONGODB_SOURCE_KIND),
  uri: z.string().min(1),
  database: z.string().min(1),
});

export type MongoDBSourceConfig = z.infer<typeof MongoDBSourceConfigSchema>;

// ============================================================================
// Helpers
// ============================================================================

function toDetails(error: ZodError): ErrorDetail[] {
  return error.errors.map((e) => ({
    field: e.path.join('.'),
    message: e.message,
  }));
}

/**
 * Validate a raw tool configuration entry
 */
export function parseToolConfig(raw: unknown): MongoDBToolConfig {
  const result = MongoDBToolConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('Invalid tool configuration', toDetails(result.error));
  }
  return result.data;
}

/**
 * Validate a raw source configuration entry
 */
export function parseSourceConfig(raw: unknown): MongoDBSourceConfig {
  const result = MongoDBSourceConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('Invalid source configuration', toDetails(result.error));
  }
  return result.data;
}
