import { describe, it, expect, vi, beforeEach } from 'vitest';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { McpNotesAdapter } from '../../adapters/obsidian/McpNotesAdapter.js';
import { NotesError } from '../../utils/errors.js';

const client = vi.hoisted(() => ({
  connect: vi.fn(),
  callTool: vi.fn(),
  close: vi.fn(),
}));

// Mock the MCP SDK so no server process is spawned
vi.mock('@modelcontextprotocol/sdk/client/index.js', () => ({
  Client: vi.fn(function () {
    return client;
  }),
}));

vi.mock('@modelcontextprotocol/sdk/client/stdio.js', () => ({
  StdioClientTransport: vi.fn(function () {
    return {};
  }),
  getDefaultEnvironment: () => ({ PATH: '/usr/bin' }),
}));

describe('McpNotesAdapter', () => {
  const config = {
    notesMcpCommand: 'obsidian-mcp-server',
    notesMcpArgs: ['--vault', 'Main'],
    obsidianApiKey: 'test-key',
  };

  beforeEach(() => {
    vi.clearAllMocks();
    client.connect.mockResolvedValue(undefined);
    client.close.mockResolvedValue(undefined);
    client.callTool.mockResolvedValue({ content: [] });
  });

  async function connectedAdapter(): Promise<McpNotesAdapter> {
    const adapter = new McpNotesAdapter(config);
    await adapter.connect();
    return adapter;
  }

  it('spawns the configured server with the API key', async () => {
    await connectedAdapter();

    expect(StdioClientTransport).toHaveBeenCalledWith({
      command: 'obsidian-mcp-server',
      args: ['--vault', 'Main'],
      env: { PATH: '/usr/bin', OBSIDIAN_API_KEY: 'test-key' },
    });
    expect(client.connect).toHaveBeenCalledTimes(1);
  });

  it('wraps connection failures', async () => {
    client.connect.mockRejectedValue(new Error('spawn ENOENT'));
    const adapter = new McpNotesAdapter(config);

    await expect(adapter.connect()).rejects.toThrow('Failed to connect to note service via "obsidian-mcp-server"');
  });

  it('refuses calls before connecting', async () => {
    const adapter = new McpNotesAdapter(config);
    await expect(adapter.getFileContents('a.md')).rejects.toThrow('Note service session is not connected');
  });

  it('reads file contents from text content', async () => {
    client.callTool.mockResolvedValue({
      content: [
        { type: 'text', text: '# 2024-03-15' },
        { type: 'image', data: 'x', mimeType: 'image/png' },
        { type: 'text', text: '## Notes' },
      ],
    });
    const adapter = await connectedAdapter();

    await expect(adapter.getFileContents('Daily Notes/2024-03-15.md')).resolves.toBe('# 2024-03-15\n## Notes');
    expect(client.callTool).toHaveBeenCalledWith({
      name: 'obsidian_get_file_contents',
      arguments: { filepath: 'Daily Notes/2024-03-15.md' },
    });
  });

  it('treats a failed read as a missing note', async () => {
    client.callTool.mockResolvedValue({ content: [{ type: 'text', text: 'File does not exist' }], isError: true });
    const adapter = await connectedAdapter();

    await expect(adapter.getFileContents('Daily Notes/2024-03-15.md')).resolves.toBeNull();
  });

  it('sends patches with the tool argument names', async () => {
    const adapter = await connectedAdapter();

    await adapter.patchContent({
      path: 'Daily Notes/2024-03-15.md',
      targetType: 'heading',
      target: 'Notes',
      operation: 'append',
      content: '\nhello\n',
    });

    expect(client.callTool).toHaveBeenCalledWith({
      name: 'obsidian_patch_content',
      arguments: {
        filepath: 'Daily Notes/2024-03-15.md',
        target_type: 'heading',
        target: 'Notes',
        operation: 'append',
        content: '\nhello\n',
      },
    });
  });

  it('reports tool errors on writes', async () => {
    client.callTool.mockResolvedValue({ content: [{ type: 'text', text: 'boom' }], isError: true });
    const adapter = await connectedAdapter();

    const result = adapter.appendContent('Daily Notes/2024-03-15.md', 'x');
    await expect(result).rejects.toBeInstanceOf(NotesError);
    await expect(result).rejects.toThrow('Failed to append to note Daily Notes/2024-03-15.md: boom');
  });

  it('rejects malformed tool responses', async () => {
    client.callTool.mockResolvedValue({ content: 'nope' });
    const adapter = await connectedAdapter();

    await expect(adapter.appendContent('a.md', 'x')).rejects.toThrow(
      'Unexpected response from note service tool obsidian_append_content'
    );
  });

  it('uses custom tool names', async () => {
    const adapter = new McpNotesAdapter(config, {
      getFileContents: 'read_note',
      appendContent: 'append_note',
      patchContent: 'patch_note',
    });
    await adapter.connect();

    await adapter.appendContent('a.md', 'x');

    expect(client.callTool).toHaveBeenCalledWith({ name: 'append_note', arguments: { filepath: 'a.md', content: 'x' } });
  });

  it('closes the session once', async () => {
    const adapter = await connectedAdapter();

    await adapter.close();
    await adapter.close();

    expect(client.close).toHaveBeenCalledTimes(1);
  });
});
