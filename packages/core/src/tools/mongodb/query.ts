/**
 * Query and pipeline construction for MongoDB tools
 */

import type { Document } from 'mongodb';
import { MissingOrInvalidParameterError } from '../../utils/errors.js';
import type { ParamValues } from '../types.js';

export const VECTOR_SEARCH_PARAMS = {
  index: 'indexName',
  queryVector: 'queryVector',
  path: 'path',
} as const;

export interface VectorSearchOptions {
  numCandidates: number;
  limit: number;
}

export interface VectorSearchPlan {
  pipeline: Document[];
  path: string;
}

/**
 * Overlay parameter values onto a copy of the template. The template itself
 * is never written to.
 */
export function bindQuery(
  template: Readonly<Document>,
  params: ParamValues,
  exclude: readonly string[] = []
): Document {
  const filter: Document = { ...template };
  for (const { name, value } of params.toArray()) {
    if (exclude.includes(name)) continue;
    filter[name] = value;
  }
  return filter;
}

/**
 * One stage per parameter, keyed by parameter name
 */
export function buildAggregatePipeline(params: ParamValues): Document[] {
  return params.toArray().map(({ name, value }) => ({ [name]: value }));
}

function requireString(params: ParamValues, name: string): string {
  if (!params.has(name)) {
    throw new MissingOrInvalidParameterError(name, 'missing required parameter');
  }
  const value = params.get(name);
  if (typeof value !== 'string' || value.length === 0) {
    throw new MissingOrInvalidParameterError(name, 'parameter must be a non-empty string');
  }
  return value;
}

function requireVector(params: ParamValues, name: string): number[] {
  if (!params.has(name)) {
    throw new MissingOrInvalidParameterError(name, 'missing required parameter');
  }
  const value = params.get(name);
  if (
    !Array.isArray(value) ||
    value.length === 0 ||
    !value.every((n): n is number => typeof n === 'number' && Number.isFinite(n))
  ) {
    throw new MissingOrInvalidParameterError(name, 'parameter must be an array of numbers');
  }
  return value;
}

/**
 * Build a $vectorSearch pipeline. Remaining parameters and the template
 * become an equality $match ahead of the search stage.
 */
export function buildVectorSearchPipeline(
  template: Readonly<Document>,
  params: ParamValues,
  options: VectorSearchOptions
): VectorSearchPlan {
  const index = requireString(params, VECTOR_SEARCH_PARAMS.index);
  const queryVector = requireVector(params, VECTOR_SEARCH_PARAMS.queryVector);
  const path = requireString(params, VECTOR_SEARCH_PARAMS.path);

  const filter = bindQuery(template, params, Object.values(VECTOR_SEARCH_PARAMS));
  const pipeline: Document[] = [];
  if (Object.keys(filter).length > 0) {
    pipeline.push({ $match: filter });
  }
  pipeline.push({
    $vectorSearch: {
      index,
      queryVector,
      path,
      numCandidates: options.numCandidates,
      limit: options.limit,
    },
  });

  return { pipeline, path };
}
