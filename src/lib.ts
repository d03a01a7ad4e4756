/**
 * Library exports for programmatic usage
 */
export { CareMcpServer, type CareMcpServerOptions, type ListedTool } from './mcp-server.js';
export { AuthHandler, type AuthProvider, type AuthHandlerOptions } from './auth.js';
export { loadConfig, buildConfig, hasCredentials, type CareConfig } from './config.js';
export { HttpClient, type ApiClient, type ApiRequest, type ApiResponse } from './http-client.js';
export { RefResolver, resolveRef, isReference } from './ref-resolver.js';
export { SchemaParser, getParamType } from './schema-parser.js';
export {
  Whitelist,
  matchesDenyPattern,
  isInAllowList,
  isOperationAllowed,
  type WhitelistPolicy,
} from './whitelist.js';
export { EnhancementCatalog, type Enhancement } from './enhancements.js';
export {
  ToolFactory,
  type GeneratedTool,
  type ToolResponse,
  type ToolInputSchema,
} from './tool-factory.js';
export { ToolGenerator, type ToolSink } from './tool-generator.js';
export { analyzeSchema, type SchemaAnalysis } from './schema-analysis.js';
export { ConsoleLogger, JsonLogger, createLogger, LogLevel, type Logger } from './logger.js';
export * from './errors.js';
export type * from './types/openapi.js';
