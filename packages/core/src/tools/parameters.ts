/**
 * Parameter validation and manifest projection
 */

import { z } from 'zod';
import type {
  ParameterConfig,
  ParameterItemConfig,
  ParameterType,
} from '../schemas/index.js';
import { ConfigurationError, ValidationError } from '../utils/errors.js';
import {
  ParamValues,
  type Claims,
  type ItemManifest,
  type JsonSchemaProperty,
  type McpInputSchema,
  type ParamValue,
  type ParameterManifest,
} from './types.js';

const JSON_SCHEMA_TYPES: Record<ParameterType, JsonSchemaProperty['type']> = {
  string: 'string',
  integer: 'integer',
  float: 'number',
  boolean: 'boolean',
  array: 'array',
};

function valueSchema(item: ParameterItemConfig): z.ZodTypeAny {
  switch (item.type) {
    case 'string':
      return z.string();
    case 'integer':
      return z.number().int();
    case 'float':
      return z.number().finite();
    case 'boolean':
      return z.boolean();
    case 'array':
      // ParameterItemSchema guarantees items on arrays
      return z.array(item.items ? valueSchema(item.items) : z.unknown());
  }
}

function describeType(item: ParameterItemConfig): string {
  if (item.type === 'array' && item.items) {
    return `array of ${describeType(item.items)}`;
  }
  return item.type;
}

function checkValue(param: ParameterConfig, value: unknown): unknown {
  const result = valueSchema(param).safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      `parameter "${param.name}" expects ${describeType(param)}`,
      param.name
    );
  }
  return result.data;
}

function valueFromClaims(param: ParameterConfig, claims: Claims): unknown {
  for (const service of param.authServices ?? []) {
    const serviceClaims = claims[service.name];
    if (serviceClaims !== undefined && serviceClaims[service.field] !== undefined) {
      return serviceClaims[service.field];
    }
  }
  throw new ValidationError(
    `missing or invalid authentication for parameter "${param.name}"`,
    param.name
  );
}

/**
 * Validate raw caller input and identity claims against a parameter schema.
 * Unknown keys are rejected; parameters bound to auth services read their
 * value from the claims and ignore caller input.
 */
export function parseParams(
  parameters: readonly ParameterConfig[],
  data: Record<string, unknown>,
  claims: Claims
): ParamValues {
  const declared = new Set(parameters.map((param) => param.name));
  for (const key of Object.keys(data)) {
    if (!declared.has(key)) {
      throw new ValidationError(`unknown parameter "${key}"`, key);
    }
  }

  const values: ParamValue[] = [];
  for (const param of parameters) {
    if (param.authServices) {
      values.push({ name: param.name, value: checkValue(param, valueFromClaims(param, claims)) });
      continue;
    }

    const raw = data[param.name];
    if (raw === undefined || raw === null) {
      if (param.required) {
        throw new ValidationError(`parameter "${param.name}" is required`, param.name);
      }
      if (param.default !== undefined) {
        values.push({ name: param.name, value: param.default });
      }
      continue;
    }

    values.push({ name: param.name, value: checkValue(param, raw) });
  }

  return new ParamValues(values);
}

/**
 * Reject declared defaults that don't match their parameter's type
 */
export function assertParameterDefaults(parameters: readonly ParameterConfig[]): void {
  for (const param of parameters) {
    if (param.default === undefined) continue;
    if (!valueSchema(param).safeParse(param.default).success) {
      throw new ConfigurationError(
        `default for parameter "${param.name}" must be ${describeType(param)}`,
        [{ field: param.name, message: 'default does not match declared type' }]
      );
    }
  }
}

function itemManifest(item: ParameterItemConfig): ItemManifest {
  return {
    type: item.type,
    description: item.description ?? '',
    ...(item.items ? { items: itemManifest(item.items) } : {}),
  };
}

export function parametersManifest(parameters: readonly ParameterConfig[]): ParameterManifest[] {
  return parameters.map((param) => ({
    name: param.name,
    ...itemManifest(param),
    required: param.required,
    authSources: (param.authServices ?? []).map((service) => service.name),
  }));
}

function jsonSchemaProperty(item: ParameterItemConfig): JsonSchemaProperty {
  return {
    type: JSON_SCHEMA_TYPES[item.type],
    description: item.description ?? '',
    ...(item.items ? { items: jsonSchemaProperty(item.items) } : {}),
  };
}

/**
 * Input schema for remote callers. Claim-bound parameters are filled in by
 * the host, so they are left out.
 */
export function parametersInputSchema(parameters: readonly ParameterConfig[]): McpInputSchema {
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];
  for (const param of parameters) {
    if (param.authServices) continue;
    properties[param.name] = jsonSchemaProperty(param);
    if (param.required) required.push(param.name);
  }
  return { type: 'object', properties, required };
}
