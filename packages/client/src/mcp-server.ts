/**
 * treeport MCP Server
 * Exposes remote directory browsing to LLMs via MCP
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { Chalk } from 'chalk';
import { z } from 'zod';
import { BrowseClient } from './client.js';
import type { ClientConfig } from './config.js';
import { formatChangeRoot, formatListing } from './format.js';

const plain = new Chalk({ level: 0 });

const ConnectArgs = z.object({
  host: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
});

const ListArgs = z.object({
  path: z.string().optional(),
});

const ChangeDirectoryArgs = z.object({
  path: z.string().min(1),
});

function text(message: string): CallToolResult {
  return { content: [{ type: 'text', text: message }] };
}

export class TreeportMCPServer {
  private server: Server;
  private client: BrowseClient | null = null;

  constructor(private readonly defaults: ClientConfig) {
    this.server = new Server(
      {
        name: 'treeport-mcp',
        version: '0.1.0',
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
    this.server.onerror = (error) => {
      console.error('[MCP Server] Error:', error);
    };
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.getTools(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.handleToolCall(request.params.name, request.params.arguments ?? {})
    );
  }

  getTools(): Tool[] {
    return [
      {
        name: 'treeport_connect',
        description: 'Connect to a treeport server. Must be called before browsing.',
        inputSchema: {
          type: 'object',
          properties: {
            host: {
              type: 'string',
              description: `Server host (default ${this.defaults.host})`,
            },
            port: {
              type: 'number',
              description: `Server port (default ${this.defaults.port})`,
            },
          },
        },
      },
      {
        name: 'treeport_ls',
        description: 'List a directory on the server, relative to the current directory. Large trees are truncated and say so.',
        inputSchema: {
          type: 'object',
          properties: {
            path: {
              type: 'string',
              description: 'Relative path to list (omit for the current directory)',
            },
          },
        },
      },
      {
        name: 'treeport_cd',
        description: 'Change the current directory on the server. Use ".." to go up one level.',
        inputSchema: {
          type: 'object',
          properties: {
            path: {
              type: 'string',
              description: 'Relative path of the new directory, or ".."',
            },
          },
          required: ['path'],
        },
      },
      {
        name: 'treeport_disconnect',
        description: 'Disconnect from the treeport server.',
        inputSchema: {
          type: 'object',
          properties: {},
        },
      },
    ];
  }

  async handleToolCall(name: string, args: Record<string, unknown>): Promise<CallToolResult> {
    try {
      switch (name) {
        case 'treeport_connect':
          return await this.handleConnect(ConnectArgs.parse(args));
        case 'treeport_ls':
          return await this.handleList(ListArgs.parse(args));
        case 'treeport_cd':
          return await this.handleChangeDirectory(ChangeDirectoryArgs.parse(args));
        case 'treeport_disconnect':
          return this.handleDisconnect();
        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    } catch (error) {
      const message = error instanceof z.ZodError
        ? `Invalid arguments: ${error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`).join('; ')}`
        : error instanceof Error ? error.message : String(error);

      return {
        content: [
          {
            type: 'text',
            text: `Error: ${message}`,
          },
        ],
        isError: true,
      };
    }
  }

  private async handleConnect(args: z.infer<typeof ConnectArgs>): Promise<CallToolResult> {
    const client = this.client;
    if (client && client.isConnected()) {
      return text(`Already connected to ${client.getServerAddress()}`);
    }

    const next = new BrowseClient({
      host: args.host ?? this.defaults.host,
      port: args.port ?? this.defaults.port,
    });
    await next.connect();
    this.client = next;

    return text(`Connected to treeport server at ${next.getServerAddress()}`);
  }

  private async handleList(args: z.infer<typeof ListArgs>): Promise<CallToolResult> {
    const client = this.ensureConnected();
    return text(formatListing(await client.list(args.path ?? ''), plain));
  }

  private async handleChangeDirectory(args: z.infer<typeof ChangeDirectoryArgs>): Promise<CallToolResult> {
    const client = this.ensureConnected();
    const reply = await client.changeRoot(args.path);
    return text(formatChangeRoot(reply, args.path, plain));
  }

  private handleDisconnect(): CallToolResult {
    if (!this.client) {
      return text('Not connected');
    }
    const address = this.client.getServerAddress();
    this.client.disconnect();
    this.client = null;
    return text(`Disconnected from ${address}`);
  }

  private ensureConnected(): BrowseClient {
    if (!this.client || !this.client.isConnected()) {
      throw new Error('Not connected to treeport. Call treeport_connect first.');
    }
    return this.client;
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    console.error('treeport MCP Server running on stdio');
    console.error(`Default server: ${this.defaults.host}:${this.defaults.port}`);
  }

  async close(): Promise<void> {
    this.client?.disconnect();
    this.client = null;
    await this.server.close();
  }
}
