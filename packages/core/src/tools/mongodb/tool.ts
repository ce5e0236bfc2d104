/**
 * MongoDB query tool
 * Binds a declarative tool configuration to a MongoDB source and runs
 * find, aggregate or $vectorSearch operations against one collection
 */

import type { Document } from 'mongodb';
import { config } from '../../config/index.js';
import {
  MONGODB_TOOL_KIND,
  type MongoDBToolConfig,
  type ParameterConfig,
} from '../../schemas/index.js';
import { isMongoDBSource } from '../../sources/mongodb.js';
import type { DocumentCursor, MongoDBSource, SourceMap } from '../../sources/types.js';
import {
  CancelledError,
  ConfigurationError,
  CursorError,
  DecodeError,
  QueryExecutionError,
  UnsupportedOperationError,
} from '../../utils/errors.js';
import { createToolLogger, type Logger } from '../../utils/logger.js';
import { isAuthorized } from '../auth.js';
import {
  assertParameterDefaults,
  parametersInputSchema,
  parametersManifest,
  parseParams,
} from '../parameters.js';
import type {
  Claims,
  Manifest,
  McpManifest,
  ParamValues,
  Tool,
  ToolContext,
} from '../types.js';
import {
  bindQuery,
  buildAggregatePipeline,
  buildVectorSearchPipeline,
  type VectorSearchOptions,
} from './query.js';

export type Operation = 'find' | 'aggregate' | 'vectorSearch';

const OPERATIONS: readonly Operation[] = ['find', 'aggregate', 'vectorSearch'];

function isOperation(operation: string): operation is Operation {
  return OPERATIONS.some((known) => known === operation);
}

function isDocument(value: unknown): value is Document {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError('Invocation cancelled', signal.reason);
  }
}

function openCursor(open: () => DocumentCursor, action: string): DocumentCursor {
  try {
    return open();
  } catch (error) {
    throw new QueryExecutionError(`unable to execute ${action}: ${errorMessage(error)}`, error);
  }
}

function omitFrom(value: unknown, path: string): unknown {
  if (Array.isArray(value)) return value.map((item) => omitFrom(item, path));
  return isDocument(value) ? omitPath(value, path) : value;
}

/**
 * Copy of the document without the (possibly dotted) path. Arrays along
 * the path are traversed element by element.
 */
function omitPath(doc: Document, path: string): Document {
  const copy: Document = { ...doc };
  if (Object.prototype.hasOwnProperty.call(copy, path)) {
    delete copy[path];
    return copy;
  }
  const [head, ...rest] = path.split('.');
  if (rest.length > 0 && head in copy) {
    copy[head] = omitFrom(copy[head], rest.join('.'));
  }
  return copy;
}

export interface MongoDBToolOptions {
  vectorSearch?: VectorSearchOptions;
}

export class MongoDBTool implements Tool {
  readonly kind = MONGODB_TOOL_KIND;
  readonly name: string;
  readonly description: string;
  readonly collectionName: string;
  readonly databaseName: string;
  readonly operation: string;
  readonly authRequired: readonly string[];
  readonly parameters: readonly ParameterConfig[];
  readonly requestBody?: string;

  private readonly source: MongoDBSource;
  private readonly query: Readonly<Document>;
  private readonly vectorSearchOptions: VectorSearchOptions;
  private readonly toolManifest: Manifest;
  private readonly toolMcpManifest: McpManifest;
  private readonly log: Logger;

  constructor(toolConfig: MongoDBToolConfig, source: MongoDBSource, options: MongoDBToolOptions = {}) {
    this.name = toolConfig.name;
    this.description = toolConfig.description;
    this.collectionName = toolConfig.collection;
    this.databaseName = source.databaseName;
    this.operation = toolConfig.operation;
    this.authRequired = Object.freeze([...toolConfig.authRequired]);
    this.parameters = Object.freeze([...toolConfig.parameters]);
    this.requestBody = toolConfig.requestBody;
    this.source = source;
    // Shared by every invocation; overlays always go to a copy
    this.query = Object.freeze({ ...toolConfig.query });
    this.vectorSearchOptions = options.vectorSearch ?? {
      numCandidates: config.vectorSearch.numCandidates,
      limit: config.vectorSearch.limit,
    };

    this.toolManifest = Object.freeze({
      description: this.description,
      parameters: parametersManifest(this.parameters),
      authRequired: [...this.authRequired],
    });
    this.toolMcpManifest = Object.freeze({
      name: this.name,
      description: this.description,
      inputSchema: parametersInputSchema(this.parameters),
    });
    this.log = createToolLogger({ toolName: this.name });
  }

  async invoke(params: ParamValues, context: ToolContext): Promise<Document[]> {
    const log = this.log.child({ correlationId: context.correlationId });
    const operation = this.operation;

    if (!isOperation(operation)) {
      throw new UnsupportedOperationError(`unsupported operation "${operation}"`, operation);
    }

    switch (operation) {
      case 'find':
        return this.find(params, context, log);
      case 'aggregate':
        return this.aggregate(params, log);
      case 'vectorSearch':
        return this.vectorSearch(params, context, log);
      default: {
        const unreachable: never = operation;
        throw new UnsupportedOperationError(`unsupported operation "${unreachable}"`, unreachable);
      }
    }
  }

  parseParams(data: Record<string, unknown>, claims: Claims): ParamValues {
    return parseParams(this.parameters, data, claims);
  }

  manifest(): Manifest {
    return this.toolManifest;
  }

  mcpManifest(): McpManifest {
    return this.toolMcpManifest;
  }

  authorized(verifiedAuthServices: readonly string[]): boolean {
    return isAuthorized(this.authRequired, verifiedAuthServices);
  }

  private async find(params: ParamValues, context: ToolContext, log: Logger): Promise<Document[]> {
    const filter = bindQuery(this.query, params);
    log.debug({ filter }, 'Executing find');

    const collection = this.source.collection(this.collectionName);
    const results = await this.drain(() => collection.find(filter), context.signal, 'query', log);

    log.debug({ count: results.length }, 'Find complete');
    return results;
  }

  private aggregate(params: ParamValues, log: Logger): never {
    const filter = bindQuery(this.query, params);
    const pipeline = buildAggregatePipeline(params);
    log.debug({ filter, pipeline }, 'Aggregate pipeline constructed');

    throw new UnsupportedOperationError('aggregate operation is not implemented', 'aggregate');
  }

  private async vectorSearch(
    params: ParamValues,
    context: ToolContext,
    log: Logger
  ): Promise<Document[]> {
    const { pipeline, path } = buildVectorSearchPipeline(this.query, params, this.vectorSearchOptions);
    log.debug({ stages: pipeline.length, path }, 'Executing vector search');

    const collection = this.source.collection(this.collectionName);
    const results = await this.drain(
      () => collection.aggregate(pipeline),
      context.signal,
      'vector search',
      log
    );

    // The stored embedding is never returned to the caller
    return results.map((doc) => omitPath(doc, path));
  }

  /**
   * Read a cursor to exhaustion, closing it on every exit path
   */
  private async drain(
    open: () => DocumentCursor,
    signal: AbortSignal | undefined,
    action: string,
    log: Logger
  ): Promise<Document[]> {
    throwIfCancelled(signal);

    const cursor = openCursor(open, action);

    const closeCursor = async (): Promise<void> => {
      try {
        await cursor.close();
      } catch (error) {
        log.warn({ error }, 'Failed to close cursor');
      }
    };
    const onAbort = (): void => {
      void closeCursor();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const results: Document[] = [];
    try {
      const iterator = cursor[Symbol.asyncIterator]();
      for (;;) {
        let next: IteratorResult<unknown>;
        try {
          next = await iterator.next();
        } catch (error) {
          throwIfCancelled(signal);
          if (results.length === 0) {
            throw new QueryExecutionError(`unable to execute ${action}: ${errorMessage(error)}`, error);
          }
          throw new CursorError(`cursor error: ${errorMessage(error)}`, error);
        }
        // A closed driver cursor ends quietly, so an abort can look like exhaustion
        throwIfCancelled(signal);
        if (next.done) break;

        if (!isDocument(next.value)) {
          throw new DecodeError(`unable to parse document at position ${results.length}`);
        }
        results.push(next.value);
      }
      return results;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await closeCursor();
    }
  }
}

/**
 * Bind a tool configuration to its source
 */
export function initializeMongoDBTool(
  toolConfig: MongoDBToolConfig,
  sources: SourceMap,
  options?: MongoDBToolOptions
): MongoDBTool {
  const source = sources.get(toolConfig.source);
  if (!source) {
    throw new ConfigurationError(`no source named "${toolConfig.source}" configured`);
  }
  if (!isMongoDBSource(source)) {
    throw new ConfigurationError(`invalid source for "${MONGODB_TOOL_KIND}" tool`);
  }
  assertParameterDefaults(toolConfig.parameters);

  return new MongoDBTool(toolConfig, source, options);
}
