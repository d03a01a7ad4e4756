/**
 * MCP server exposing the generated Care API tools
 *
 * Startup is sequential: authenticate, fetch the schema, generate tools,
 * then connect a transport. The server is the generation driver's sink.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { AuthHandler, type AuthProvider } from './auth.js';
import { hasCredentials, type CareConfig } from './config.js';
import { SERVER_VERSION } from './constants.js';
import { EnhancementCatalog } from './enhancements.js';
import {
  SchemaFetchError,
  ToolNotFoundError,
  generateCorrelationId,
  toError,
} from './errors.js';
import { HttpClient, type ApiClient } from './http-client.js';
import { ConsoleLogger, type Logger } from './logger.js';
import { SchemaParser } from './schema-parser.js';
import { ToolFactory, type GeneratedTool, type ToolResponse } from './tool-factory.js';
import { ToolGenerator, type ToolSink } from './tool-generator.js';
import { Whitelist } from './whitelist.js';

export interface CareMcpServerOptions {
  config: CareConfig;
  logger?: Logger;
  client?: ApiClient;
  auth?: AuthProvider;
  /** Overrides CARE_WHITELIST_FILE and the built-in allow-list */
  whitelist?: Whitelist;
  /** Overrides CARE_ENHANCEMENTS_FILE and the built-in catalog */
  catalog?: EnhancementCatalog;
}

export type ListedTool = Pick<GeneratedTool, 'name' | 'description' | 'inputSchema' | 'annotations'>;

export class CareMcpServer implements ToolSink {
  private readonly server: Server;
  private readonly config: CareConfig;
  private readonly logger: Logger;
  private readonly client: ApiClient;
  private readonly auth: AuthProvider;
  private readonly parser: SchemaParser;
  private readonly tools = new Map<string, GeneratedTool>();
  private whitelist?: Whitelist;
  private catalog?: EnhancementCatalog;

  constructor(options: CareMcpServerOptions) {
    this.config = options.config;
    this.logger = options.logger ?? new ConsoleLogger();
    this.client = options.client ?? new HttpClient({
      timeoutMs: this.config.requestTimeoutMs,
      logger: this.logger,
    });
    this.auth = options.auth ?? new AuthHandler({
      loginUrl: this.config.loginUrl,
      refreshUrl: this.config.refreshUrl,
      username: this.config.username,
      password: this.config.password,
      accessToken: this.config.accessToken,
      client: this.client,
      logger: this.logger,
    });
    this.parser = new SchemaParser({
      schemaUrl: this.config.schemaUrl,
      client: this.client,
      logger: this.logger,
      timeoutMs: this.config.schemaTimeoutMs,
    });
    this.whitelist = options.whitelist;
    this.catalog = options.catalog;

    this.server = new Server(
      {
        name: this.config.serverName,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  /**
   * Authenticate, load the schema and generate tools
   *
   * @returns number of registered tools
   * @throws SchemaFetchError when the schema cannot be loaded
   */
  async initialize(): Promise<number> {
    const whitelist = await this.loadWhitelist();
    const catalog = await this.loadCatalog();

    if (hasCredentials(this.config)) {
      const authenticated = await this.auth.authenticate();
      if (!authenticated) {
        this.logger.warn('Authentication failed, continuing without a token');
      }
    } else {
      this.logger.warn('No Care API credentials configured, requests are sent unauthenticated');
    }

    if (!(await this.parser.fetch())) {
      throw new SchemaFetchError(`Failed to load API schema from ${this.config.schemaUrl}`, {
        schemaUrl: this.config.schemaUrl,
      });
    }

    const factory = new ToolFactory({
      baseUrl: this.config.baseUrl,
      client: this.client,
      auth: this.auth,
      catalog,
      logger: this.logger,
      timeoutMs: this.config.requestTimeoutMs,
    });

    const count = new ToolGenerator(this.parser, whitelist, factory, this.logger).generateAll(this);
    this.logger.info('Server initialized', { tools: count, baseUrl: this.config.baseUrl });
    return count;
  }

  registerTool(tool: GeneratedTool): void {
    if (this.tools.has(tool.name)) {
      this.logger.warn('Replacing tool with duplicate name', { tool: tool.name });
    }
    this.tools.set(tool.name, tool);
  }

  getToolNames(): string[] {
    return [...this.tools.keys()];
  }

  listTools(): ListedTool[] {
    return [...this.tools.values()].map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
      annotations: tool.annotations,
    }));
  }

  async callTool(name: string, args: Record<string, unknown> = {}): Promise<ToolResponse> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name);
    }
    return tool.invoke(args);
  }

  private async loadWhitelist(): Promise<Whitelist> {
    if (!this.whitelist) {
      this.whitelist = this.config.whitelistFile
        ? await Whitelist.fromFile(this.config.whitelistFile)
        : new Whitelist();
      this.logger.info('Loaded whitelist', {
        source: this.config.whitelistFile ?? 'built-in',
        allowed: this.whitelist.getAllowedOperations().length,
      });
    }
    return this.whitelist;
  }

  private async loadCatalog(): Promise<EnhancementCatalog> {
    if (!this.catalog) {
      this.catalog = this.config.enhancementsFile
        ? await EnhancementCatalog.fromFile(this.config.enhancementsFile)
        : new EnhancementCatalog();
      this.logger.info('Loaded enhancements', {
        source: this.config.enhancementsFile ?? 'built-in',
        entries: this.catalog.size,
      });
    }
    return this.catalog;
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: this.listTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const name = request.params.name;
      try {
        const result = await this.callTool(name, request.params.arguments ?? {});
        return {
          content: [
            {
              type: 'text',
              text: JSON.stringify(result, null, 2),
            },
          ],
        };
      } catch (err) {
        const correlationId = generateCorrelationId();
        const error = toError(err);
        this.logger.error('CallTool handler error', error, { correlationId, toolName: name });

        if (error instanceof ToolNotFoundError) {
          throw new Error(`${error.message} (correlation ID: ${correlationId})`);
        }
        throw new Error(`Internal error (correlation ID: ${correlationId})`);
      }
    });
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async runStdio(): Promise<void> {
    await this.connect(new StdioServerTransport());
    this.logger.info('MCP server running on stdio', { tools: this.tools.size });
  }

  async stop(): Promise<void> {
    await this.server.close();
  }
}
