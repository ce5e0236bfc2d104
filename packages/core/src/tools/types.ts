/**
 * Tool framework types
 */

import type { Document } from 'mongodb';
import type { ParameterType } from '../schemas/index.js';
import { InternalError } from '../utils/errors.js';

/**
 * Verified identity claims, keyed by auth service name
 */
export type Claims = Record<string, Record<string, unknown>>;

export interface ToolContext {
  correlationId: string;
  signal?: AbortSignal;
}

export interface ParamValue {
  name: string;
  value: unknown;
}

export interface ItemManifest {
  type: ParameterType;
  description: string;
  items?: ItemManifest;
}

export interface ParameterManifest extends ItemManifest {
  name: string;
  required: boolean;
  authSources: string[];
}

export interface Manifest {
  description: string;
  parameters: ParameterManifest[];
  authRequired: string[];
}

export interface JsonSchemaProperty {
  type: 'string' | 'integer' | 'number' | 'boolean' | 'array';
  description: string;
  items?: JsonSchemaProperty;
}

export interface McpInputSchema {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

export interface McpManifest {
  name: string;
  description: string;
  inputSchema: McpInputSchema;
}

export interface ToolResult {
  success: boolean;
  data?: Document[];
  error?: {
    code: string;
    message: string;
    retryable: boolean;
    details?: Array<{ field?: string; message: string }>;
  };
}

export interface Tool {
  readonly name: string;
  readonly kind: string;
  invoke(params: ParamValues, context: ToolContext): Promise<Document[]>;
  parseParams(data: Record<string, unknown>, claims: Claims): ParamValues;
  manifest(): Manifest;
  mcpManifest(): McpManifest;
  authorized(verifiedAuthServices: readonly string[]): boolean;
}

/**
 * Validated parameter values in declaration order
 */
export class ParamValues {
  private readonly entries: readonly ParamValue[];

  constructor(entries: ParamValue[] = []) {
    const names = new Set<string>();
    for (const entry of entries) {
      if (names.has(entry.name)) {
        throw new InternalError(`duplicate parameter value "${entry.name}"`);
      }
      names.add(entry.name);
    }
    this.entries = Object.freeze([...entries]);
  }

  get size(): number {
    return this.entries.length;
  }

  get(name: string): unknown {
    return this.entries.find((entry) => entry.name === name)?.value;
  }

  has(name: string): boolean {
    return this.entries.some((entry) => entry.name === name);
  }

  toArray(): readonly ParamValue[] {
    return this.entries;
  }

  asMap(): Record<string, unknown> {
    const map: Record<string, unknown> = {};
    for (const { name, value } of this.entries) {
      map[name] = value;
    }
    return map;
  }
}
