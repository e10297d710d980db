#!/usr/bin/env node

/**
 * Section Editor MCP Server
 * Exposes section parsing, replacement, merging and checking via MCP tools
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
  CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import {
  handleListSections,
  handleReplaceSections,
  handleMergeSections,
  handleCheckSections,
  handleTrimTrailingWhitespace,
} from './handlers.js';
import { loadConfig, validateConfiguration, ServerConfig } from './config.js';
import packageJson from '../package.json';

const SOURCE_PROPERTIES = {
  text: {
    type: 'string',
    description: 'Text containing SECTION-START[name] / SECTION-END markers',
  },
  file_path: {
    type: 'string',
    description: 'File to read instead of text (relative paths resolve against the base directory)',
  },
};

// Create server instance
const server = new Server(
  {
    name: 'section-editor',
    version: packageJson.version,
  },
  {
    capabilities: {
      tools: {},
      prompts: {},
    },
    instructions: `Sections open with SECTION-START[name] and close with SECTION-END. Use merge_sections to regenerate a file without losing hand-edited sections. Run check_sections first when a file fails to parse.`,
  }
);

/**
 * List available tools
 */
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      {
        name: 'list_sections',
        description: 'Parse text or file into a tree of named sections. Returns nested outline.',
        inputSchema: {
          type: 'object',
          properties: SOURCE_PROPERTIES,
        },
      },
      {
        name: 'replace_sections',
        description:
          'Replace the content of named sections. Children and surrounding text are kept.',
        inputSchema: {
          type: 'object',
          properties: {
            ...SOURCE_PROPERTIES,
            sections: {
              type: 'object',
              additionalProperties: { type: 'string' },
              description: 'Map of section name to new content (e.g., {"imports": "import x;"})',
            },
            write: {
              type: 'boolean',
              description: 'Write the result back to file_path',
              default: false,
            },
          },
          required: ['sections'],
        },
      },
      {
        name: 'merge_sections',
        description:
          'Merge hand-edited sections of an existing text into newly generated text.',
        inputSchema: {
          type: 'object',
          properties: {
            generated: { type: 'string', description: 'Newly generated text' },
            generated_file: { type: 'string', description: 'File with newly generated text' },
            existing: { type: 'string', description: 'Existing, hand-edited text' },
            existing_file: { type: 'string', description: 'Existing, hand-edited file' },
            write: {
              type: 'boolean',
              description: 'Write the merged text back to existing_file',
              default: false,
            },
          },
        },
      },
      {
        name: 'check_sections',
        description: 'Check section markers. Reports every malformed, unmatched or unclosed marker.',
        inputSchema: {
          type: 'object',
          properties: SOURCE_PROPERTIES,
        },
      },
      {
        name: 'trim_trailing_whitespace',
        description: 'Remove trailing whitespace from every line.',
        inputSchema: {
          type: 'object',
          properties: SOURCE_PROPERTIES,
        },
      },
    ],
  };
});

/**
 * Setup request handlers with configuration
 *
 * Creates closure over config to avoid global mutable state
 */
function setupRequestHandlers(config: ServerConfig): void {
  /**
   * Handle tool calls
   */
  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;

    try {
      switch (name) {
        case 'list_sections':
          return await handleListSections(args, config);

        case 'replace_sections':
          return await handleReplaceSections(args, config);

        case 'merge_sections':
          return await handleMergeSections(args, config);

        case 'check_sections':
          return handleCheckSections(args, config);

        case 'trim_trailing_whitespace':
          return await handleTrimTrailingWhitespace(args, config);

        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    } catch (error) {
      if (error instanceof Error) {
        throw error;
      }
      throw new Error(`Tool execution failed: ${String(error)}`);
    }
  });

  /**
   * Get prompt content
   */
  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const { name } = request.params;

    if (name === 'regenerate-file') {
      return {
        messages: [
          {
            role: 'user',
            content: {
              type: 'text',
              text: `# Regenerate a File With Sections

Files under ${config.baseDir} may contain hand-edited regions between
SECTION-START[name] and SECTION-END lines.

When regenerating such a file:
1. Call check_sections on the existing file and fix reported errors
2. Produce the new text with the same section markers
3. Call merge_sections with generated text and existing_file
4. Review "dropped" names before writing

Never edit text between markers you did not generate.`,
            },
          },
        ],
      };
    }

    throw new Error(`Unknown prompt: ${name}`);
  });
}

/**
 * List available prompts
 */
server.setRequestHandler(ListPromptsRequestSchema, async () => {
  return {
    prompts: [
      {
        name: 'regenerate-file',
        description: 'Regenerate a file while keeping its hand-edited sections',
        arguments: [],
      },
    ],
  };
});

/**
 * Start the server
 */
async function main(): Promise<void> {
  try {
    // Load and validate configuration
    const config = loadConfig();
    validateConfiguration(config);

    console.error('Section editor configuration loaded:');
    console.error(`  Base directory: ${config.baseDir}`);
    console.error(`  Line separator: ${JSON.stringify(config.lineSeparator)}`);
    console.error(
      `  Concurrency: ${config.concurrency > 0 ? config.concurrency : 'sequential'}`
    );

    process.on('SIGINT', () => {
      console.error('[SHUTDOWN] Received SIGINT, exiting...');
      process.exit(0);
    });

    process.on('SIGTERM', () => {
      console.error('[SHUTDOWN] Received SIGTERM, exiting...');
      process.exit(0);
    });

    // Setup request handlers with config closure
    setupRequestHandlers(config);

    console.error('[STARTUP] Connecting stdio transport...');
    const transport = new StdioServerTransport();
    await server.connect(transport);
    console.error('Section Editor MCP Server running on stdio');
  } catch (error) {
    if (error instanceof Error) {
      console.error('Fatal error during startup:', error.message);
    } else {
      console.error('Fatal error during startup:', String(error));
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  if (error instanceof Error) {
    console.error('Fatal error:', error.message);
  } else {
    console.error('Fatal error:', String(error));
  }
  process.exit(1);
});
