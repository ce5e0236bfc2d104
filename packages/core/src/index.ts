/**
 * Document Query Tools - public entry point
 */

export { config, type Config } from './config/index.js';
export * from './schemas/index.js';
export * from './sources/types.js';
export {
  closeSource,
  connectMongoDBSource,
  createMongoDBSource,
  isMongoDBSource,
  type ConnectedMongoDBSource,
} from './sources/mongodb.js';
export * from './tools/types.js';
export { isAuthorized } from './tools/auth.js';
export {
  assertParameterDefaults,
  parametersInputSchema,
  parametersManifest,
  parseParams,
} from './tools/parameters.js';
export {
  VECTOR_SEARCH_PARAMS,
  bindQuery,
  buildAggregatePipeline,
  buildVectorSearchPipeline,
  type VectorSearchOptions,
  type VectorSearchPlan,
} from './tools/mongodb/query.js';
export {
  MongoDBTool,
  initializeMongoDBTool,
  type MongoDBToolOptions,
  type Operation,
} from './tools/mongodb/tool.js';
export {
  Toolset,
  type InvocationContext,
  type ToolFailure,
  type ToolsetOptions,
} from './tools/registry.js';
export * from './utils/errors.js';
export { createToolLogger, logger, type Logger } from './utils/logger.js';
