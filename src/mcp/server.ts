/**
 * cardpack MCP server
 *
 * Lets MCP clients ask for a context pack before answering, and manage the
 * cards behind it, without going through the CLI.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { CARD_TYPES, CARD_PRIORITIES, SENSITIVITY_MODES } from '../cards/types.js';
import type { CardStore } from '../cards/store.js';
import type { ContextPackBuilder } from '../core/context-pack.js';
import type { PackConfig } from '../config/index.js';
import { errorMessage } from '../errors.js';
import { openWorkspace } from '../workspace.js';

export const SERVER_NAME = 'cardpack';
export const SERVER_VERSION = '0.1.0';

const MAX_TEXT_LENGTH = 2000;
const MAX_PROMPT_LENGTH = 8000;

const ContextPackSchema = z.object({
  prompt: z.string().trim().min(1).max(MAX_PROMPT_LENGTH),
  persona: z.string().trim().min(1).optional(),
  max_cards: z.number().int().min(0).max(50).optional(),
  min_relevance: z.number().min(0).max(1).optional(),
  sensitivity: z.enum(SENSITIVITY_MODES).optional(),
  site_id: z.string().max(200).optional(),
});

const CardAddSchema = z.object({
  type: z.enum(CARD_TYPES),
  text: z.string().trim().min(1).max(MAX_TEXT_LENGTH),
  domain: z.array(z.string()).optional(),
  priority: z.enum(CARD_PRIORITIES).optional(),
  tags: z.array(z.string()).optional(),
  persona: z.string().trim().min(1).optional(),
});

const CardListSchema = z.object({
  persona: z.string().trim().min(1).optional(),
  type: z.enum(CARD_TYPES).optional(),
  limit: z.number().int().min(1).max(200).optional().default(50),
});

const CardRemoveSchema = z.object({
  id: z.string().trim().min(1).max(50),
});

export const TOOLS = [
  {
    name: 'cpack_context_pack',
    description: `Get the user's personal context for a prompt.

Call this BEFORE answering a personal request (shopping, food, health, work,
advice). The result lists the user's relevant constraints, preferences, goals
and capabilities. Follow [HARD] constraints strictly.`,
    inputSchema: {
      type: 'object' as const,
      properties: {
        prompt: { type: 'string', description: 'The user prompt you are about to answer' },
        persona: { type: 'string', description: 'Persona to draw cards from (default from config)' },
        max_cards: { type: 'number', description: 'Maximum cards (default from config)' },
        min_relevance: { type: 'number', description: 'Relevance threshold 0..1 (default from config)' },
        sensitivity: { type: 'string', enum: [...SENSITIVITY_MODES] },
        site_id: { type: 'string', description: 'Client or site the pack is for' },
      },
      required: ['prompt'],
    },
  },
  {
    name: 'cpack_card_add',
    description: `Remember a fact about the user as a memory card.

Use when the user states a lasting constraint, preference, goal or capability.`,
    inputSchema: {
      type: 'object' as const,
      properties: {
        type: { type: 'string', enum: [...CARD_TYPES] },
        text: { type: 'string', description: 'The fact, in one sentence' },
        domain: { type: 'array', items: { type: 'string' }, description: 'e.g. shopping, eating, health, work' },
        priority: { type: 'string', enum: [...CARD_PRIORITIES] },
        tags: { type: 'array', items: { type: 'string' } },
        persona: { type: 'string' },
      },
      required: ['type', 'text'],
    },
  },
  {
    name: 'cpack_card_list',
    description: 'List stored memory cards in storage order.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        persona: { type: 'string' },
        type: { type: 'string', enum: [...CARD_TYPES] },
        limit: { type: 'number', description: 'Max results (default 50)' },
      },
      required: [],
    },
  },
  {
    name: 'cpack_card_remove',
    description: 'Delete a memory card that is wrong or outdated.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        id: { type: 'string', description: 'Card id' },
      },
      required: ['id'],
    },
  },
];

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export interface ToolDeps {
  store: CardStore;
  builder: ContextPackBuilder;
  defaults: PackConfig;
}

function text(value: string, isError?: boolean): ToolResult {
  return { content: [{ type: 'text', text: value }], ...(isError ? { isError } : {}) };
}

/**
 * Tool dispatcher, separate from the transport so it can be driven directly
 */
export function createToolHandler(deps: ToolDeps): (name: string, args: unknown) => Promise<ToolResult> {
  const { store, builder, defaults } = deps;

  return async (name, args) => {
    try {
      switch (name) {
        case 'cpack_context_pack': {
          const input = ContextPackSchema.parse(args ?? {});
          const pack = await builder.build({
            draftPrompt: input.prompt,
            persona: input.persona ?? defaults.persona,
            maxCards: input.max_cards ?? defaults.maxCards,
            minRelevance: input.min_relevance ?? defaults.minRelevance,
            sensitivityMode: input.sensitivity ?? defaults.sensitivityMode,
            siteId: input.site_id,
          });

          if (!pack.packText) {
            return text('No stored context is relevant to this prompt.');
          }
          return text(pack.packText);
        }

        case 'cpack_card_add': {
          const input = CardAddSchema.parse(args ?? {});
          const card = store.addCard({ ...input, persona: input.persona ?? defaults.persona });
          return text(`✓ Added ${card.type}: "${card.text.slice(0, 50)}${card.text.length > 50 ? '...' : ''}"\nID: ${card.id}`);
        }

        case 'cpack_card_list': {
          const input = CardListSchema.parse(args ?? {});
          const cards = store.listCards(input);

          if (cards.length === 0) {
            return text('No cards stored yet.');
          }

          return text(
            cards
              .map((card) => `[${card.type.toUpperCase()}] ${card.text}\n  ID: ${card.id}`)
              .join('\n\n')
          );
        }

        case 'cpack_card_remove': {
          const input = CardRemoveSchema.parse(args ?? {});
          return store.deleteCard(input.id)
            ? text(`✓ Removed card ${input.id}`)
            : text(`Card '${input.id}' not found`, true);
        }

        default:
          return text(`Unknown tool: ${name}`, true);
      }
    } catch (error) {
      const message = error instanceof z.ZodError
        ? error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
        : errorMessage(error);
      return text(`Error: ${message}`, true);
    }
  };
}

/**
 * Initialize and run the MCP server over stdio
 */
export async function runMcpServer(): Promise<void> {
  // stdout belongs to the protocol; logs go to stderr at warn and above
  const workspace = openWorkspace({ logLevel: 'warn' });
  const handle = createToolHandler({
    store: workspace.store,
    builder: workspace.builder,
    defaults: workspace.config.pack,
  });

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));
  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    handle(request.params.name, request.params.arguments)
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = () => {
    workspace.close();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
