import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { createToolHandler, type ToolResult } from '../../src/mcp/server.js';
import { initProject } from '../../src/config/index.js';
import { openWorkspace, type Workspace } from '../../src/workspace.js';
import { silentLogger } from '../../src/logger.js';

function firstText(result: ToolResult): string {
  return result.content[0]?.text ?? '';
}

describe('MCP tool handler', () => {
  let dir: string;
  let workspace: Workspace;
  let handle: ReturnType<typeof createToolHandler>;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cpack-mcp-test-'));
    initProject(dir);
    workspace = openWorkspace({ cwd: dir, env: {}, logger: silentLogger });
    handle = createToolHandler({
      store: workspace.store,
      builder: workspace.builder,
      defaults: workspace.config.pack,
    });
  });

  afterEach(() => {
    workspace.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reports when no context is relevant', async () => {
    const result = await handle('cpack_context_pack', { prompt: 'find me the cheapest pans' });
    expect(firstText(result)).toBe('No stored context is relevant to this prompt.');
    expect(result.isError).toBeUndefined();
  });

  it('adds a card and serves it in a pack', async () => {
    const added = await handle('cpack_card_add', {
      type: 'preference',
      text: 'User prioritizes quality over price, not the cheapest option',
      domain: ['shopping'],
      tags: ['profile'],
    });
    const id = workspace.store.getCards('Personal')[0]?.id;
    expect(firstText(added)).toBe(
      `✓ Added preference: "User prioritizes quality over price, not the cheap..."\nID: ${id}`
    );

    const pack = await handle('cpack_context_pack', { prompt: 'find me the cheapest pans' });
    expect(firstText(pack)).toBe(
      '--- PERSONAL CONTEXT ---\n\nPREFERENCES:\n• User prioritizes quality over price, not the cheapest option\n\n--- END PERSONAL CONTEXT ---'
    );
  });

  it('lists and removes cards', async () => {
    await handle('cpack_card_add', { type: 'goal', text: 'Run a marathon' });
    const card = workspace.store.getCards('Personal')[0];

    const listed = await handle('cpack_card_list', {});
    expect(firstText(listed)).toBe(`[GOAL] Run a marathon\n  ID: ${card?.id}`);

    const removed = await handle('cpack_card_remove', { id: card?.id });
    expect(firstText(removed)).toBe(`✓ Removed card ${card?.id}`);
    expect(firstText(await handle('cpack_card_list', {}))).toBe('No cards stored yet.');
  });

  it('flags errors', async () => {
    const missing = await handle('cpack_card_remove', { id: 'nope' });
    expect(missing).toEqual({ content: [{ type: 'text', text: "Card 'nope' not found" }], isError: true });

    const unknown = await handle('cpack_forget_everything', {});
    expect(firstText(unknown)).toBe('Unknown tool: cpack_forget_everything');

    const invalid = await handle('cpack_context_pack', {});
    expect(invalid).toEqual({ content: [{ type: 'text', text: 'Error: prompt: Required' }], isError: true });
  });
});
