import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { Dispatcher } from './dispatcher.js';
import { logger } from './logger.js';
import { buildPrompt, prompts, toToolContent } from './prompts.js';
import { EndpointCatalogue } from './tools/index.js';
import { toInputSchema } from './tools/schema.js';

// Exposes the endpoint catalogue to MCP clients over stdio
export class HemisServer {
  private server: Server;

  constructor(
    private readonly catalogue: EndpointCatalogue,
    private readonly dispatcher: Dispatcher
  ) {
    this.server = new Server(
      {
        name: 'hemis-mcp',
        version: '1.0.0',
      },
      {
        capabilities: {
          tools: {},
          prompts: {},
        },
      }
    );

    this.setupRequestHandlers();
  }

  private setupRequestHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      logger.debug('Received ListToolsRequest');
      return {
        tools: this.catalogue.list().map(spec => ({
          name: spec.name,
          description: spec.description,
          inputSchema: toInputSchema(spec),
        })),
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async request => {
      const { name, arguments: args } = request.params;
      logger.info({ tool: name }, 'Received CallToolRequest');

      const result = await this.dispatcher.invoke(name, args ?? {});
      return toToolContent(result);
    });

    this.server.setRequestHandler(ListPromptsRequestSchema, async () => {
      return {
        prompts,
      };
    });

    this.server.setRequestHandler(GetPromptRequestSchema, async request => {
      return buildPrompt(request.params.name, request.params.arguments);
    });
  }

  // Starts the server using stdio transport
  public async start() {
    const transport = new StdioServerTransport();
    logger.info('Connecting HEMIS MCP server to stdio transport');
    try {
      await this.server.connect(transport);
      logger.info('HEMIS MCP server running on stdio');
    } catch (error: unknown) {
      logger.error({ err: error }, 'Error connecting server to stdio transport');
      throw error;
    }
  }
}
