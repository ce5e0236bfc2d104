/**
 * Toolset
 * Binds configured tools to their sources and runs invocations with
 * authorization, parameter validation and a deadline
 */

import { v4 as uuidv4 } from 'uuid';
import { config } from '../config/index.js';
import { parseToolConfig } from '../schemas/index.js';
import type { SourceMap } from '../sources/types.js';
import {
  ConfigurationError,
  InternalError,
  NotFoundError,
  TimeoutError,
  UnauthorizedError,
  isAppError,
  type AppError,
} from '../utils/errors.js';
import { createToolLogger, logger } from '../utils/logger.js';
import { initializeMongoDBTool, type MongoDBToolOptions } from './mongodb/tool.js';
import type { Claims, Manifest, McpManifest, Tool, ToolResult } from './types.js';

export interface InvocationContext {
  correlationId?: string;
  verifiedAuthServices: readonly string[];
  claims: Claims;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface ToolFailure {
  name: string;
  error: ConfigurationError;
}

export interface ToolsetOptions extends MongoDBToolOptions {
  timeoutMs?: number;
}

function toResult(error: AppError): ToolResult {
  const { error: body } = error.toResponse();
  return {
    success: false,
    error: {
      code: body.code,
      message: body.message,
      retryable: body.retryable,
      details: body.details,
    },
  };
}

function toConfigurationError(error: unknown): ConfigurationError {
  if (error instanceof ConfigurationError) return error;
  const message = error instanceof Error ? error.message : 'Unknown error';
  return new ConfigurationError(message);
}

export class Toolset {
  private tools: Map<string, Tool> = new Map();
  private readonly timeoutMs: number;

  readonly failures: ToolFailure[] = [];

  constructor(options: ToolsetOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? config.tools.timeoutMs;
  }

  /**
   * Build a toolset from raw configuration entries. A broken entry is
   * logged and recorded; the remaining tools are still bound.
   */
  static initialize(
    configs: readonly unknown[],
    sources: SourceMap,
    options: ToolsetOptions = {}
  ): Toolset {
    const toolset = new Toolset(options);
    configs.forEach((raw, index) => {
      const name = toolset.describeEntry(raw, index);
      try {
        toolset.register(initializeMongoDBTool(parseToolConfig(raw), sources, options));
      } catch (error) {
        const failure = toConfigurationError(error);
        toolset.failures.push({ name, error: failure });
        logger.error(
          { toolName: name, errorMessage: failure.message, errorDetails: failure.details },
          'Tool initialization failed'
        );
      }
    });
    logger.info(
      { tools: toolset.getNames().length, failures: toolset.failures.length },
      'Toolset initialized'
    );
    return toolset;
  }

  /**
   * Register a bound tool
   */
  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      throw new ConfigurationError(`tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
    logger.info({ toolName: tool.name, kind: tool.kind }, 'Tool registered');
  }

  /**
   * Get a tool by name
   */
  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  /**
   * Get all registered tool names
   */
  getNames(): string[] {
    return Array.from(this.tools.keys());
  }

  getManifests(): Record<string, Manifest> {
    const manifests: Record<string, Manifest> = {};
    for (const [name, tool] of this.tools) {
      manifests[name] = tool.manifest();
    }
    return manifests;
  }

  getMcpManifests(): McpManifest[] {
    return Array.from(this.tools.values(), (tool) => tool.mcpManifest());
  }

  /**
   * Run one invocation. Failures come back as a result, never as a throw.
   */
  async execute(
    toolName: string,
    args: Record<string, unknown>,
    context: InvocationContext
  ): Promise<ToolResult> {
    const invocationId = uuidv4();
    const correlationId = context.correlationId ?? invocationId;
    const log = createToolLogger({ toolName, invocationId, correlationId });
    const startTime = Date.now();

    const tool = this.tools.get(toolName);
    if (!tool) {
      log.warn('Tool not found');
      return toResult(new NotFoundError(`Tool '${toolName}'`));
    }

    if (!tool.authorized(context.verifiedAuthServices)) {
      log.warn('Caller not authorized for tool');
      return toResult(new UnauthorizedError(`tool '${toolName}' requires authentication`));
    }

    const timeoutMs = context.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new TimeoutError()), timeoutMs);
    const forwardAbort = (): void => controller.abort(context.signal?.reason);
    if (context.signal?.aborted) {
      forwardAbort();
    } else {
      context.signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    let result: ToolResult;
    try {
      const params = tool.parseParams(args, context.claims);
      log.info({ params: params.toArray().map((p) => p.name) }, 'Executing tool');

      const data = await tool.invoke(params, { correlationId, signal: controller.signal });
      result = { success: true, data };
    } catch (error) {
      if (controller.signal.reason instanceof TimeoutError) {
        result = toResult(new TimeoutError(`Tool '${toolName}' timed out after ${timeoutMs}ms`));
      } else if (isAppError(error)) {
        result = toResult(error);
      } else {
        log.error({ error }, 'Unexpected tool failure');
        result = toResult(new InternalError('Unexpected tool failure', error));
      }
    } finally {
      clearTimeout(timer);
      context.signal?.removeEventListener('abort', forwardAbort);
    }

    log.info(
      {
        success: result.success,
        errorCode: result.error?.code,
        count: result.data?.length,
        latencyMs: Date.now() - startTime,
      },
      'Tool execution complete'
    );

    return result;
  }

  private describeEntry(raw: unknown, index: number): string {
    if (typeof raw === 'object' && raw !== null && 'name' in raw && typeof raw.name === 'string') {
      return raw.name;
    }
    return `#${index}`;
  }
}
