import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { z } from 'zod';
import type { NoteSession, PatchContentParams } from '../../ports/NotesPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { NotesError } from '../../utils/errors.js';

export interface McpToolNames {
  getFileContents: string;
  appendContent: string;
  patchContent: string;
}

export const DEFAULT_TOOL_NAMES: McpToolNames = {
  getFileContents: 'obsidian_get_file_contents',
  appendContent: 'obsidian_append_content',
  patchContent: 'obsidian_patch_content',
};

const toolResultSchema = z.object({
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
    .default([]),
  isError: z.boolean().optional(),
});

type ToolResult = z.infer<typeof toolResultSchema>;

/** Note service reached through an MCP server that exposes the vault as tools. */
export class McpNotesAdapter implements NoteSession {
  private readonly logger = createLogger({ adapter: 'McpNotesAdapter' });
  private readonly command: string;
  private readonly args: string[];
  private readonly apiKey?: string;
  private client: Client | null = null;

  constructor(
    config: Pick<Config, 'notesMcpCommand' | 'notesMcpArgs' | 'obsidianApiKey'>,
    private readonly tools: McpToolNames = DEFAULT_TOOL_NAMES
  ) {
    this.command = config.notesMcpCommand;
    this.args = config.notesMcpArgs;
    this.apiKey = config.obsidianApiKey;
  }

  async connect(): Promise<void> {
    const logger = this.logger.child({ method: 'connect', command: this.command });
    const transport = new StdioClientTransport({
      command: this.command,
      args: this.args,
      env: {
        ...getDefaultEnvironment(),
        ...(this.apiKey ? { OBSIDIAN_API_KEY: this.apiKey } : {}),
      },
    });
    const client = new Client({ name: 'daily-note-importer', version: '0.1.0' });

    try {
      await client.connect(transport);
    } catch (error) {
      logger.error({ error }, 'Failed to start note service session');
      throw new NotesError(`Failed to connect to note service via "${this.command}"`, { cause: error });
    }

    this.client = client;
    logger.info('Connected to note service');
  }

  async close(): Promise<void> {
    if (!this.client) {
      return;
    }
    const client = this.client;
    this.client = null;
    await client.close();
    this.logger.debug({ method: 'close' }, 'Closed note service session');
  }

  async getFileContents(path: string): Promise<string | null> {
    const result = await this.callTool(this.tools.getFileContents, { filepath: path });
    if (result.isError) {
      this.logger.debug({ method: 'getFileContents', path, reason: textOf(result) }, 'Note not available');
      return null;
    }
    return textOf(result);
  }

  async appendContent(path: string, content: string): Promise<void> {
    const result = await this.callTool(this.tools.appendContent, { filepath: path, content });
    if (result.isError) {
      throw new NotesError(`Failed to append to note ${path}: ${textOf(result)}`);
    }
  }

  async patchContent(params: PatchContentParams): Promise<void> {
    const result = await this.callTool(this.tools.patchContent, {
      filepath: params.path,
      target_type: params.targetType,
      target: params.target,
      operation: params.operation,
      content: params.content,
    });
    if (result.isError) {
      throw new NotesError(`Failed to patch note ${params.path}: ${textOf(result)}`);
    }
  }

  private async callTool(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    if (!this.client) {
      throw new NotesError('Note service session is not connected');
    }

    let response: unknown;
    try {
      response = await this.client.callTool({ name, arguments: args });
    } catch (error) {
      this.logger.error({ method: 'callTool', tool: name, error }, 'Note service call failed');
      throw new NotesError(`Note service call ${name} failed`, { cause: error });
    }

    const parsed = toolResultSchema.safeParse(response);
    if (!parsed.success) {
      throw new NotesError(`Unexpected response from note service tool ${name}`, { cause: parsed.error });
    }
    return parsed.data;
  }
}

function textOf(result: ToolResult): string {
  return result.content
    .filter((item) => item.type === 'text')
    .map((item) => item.text ?? '')
    .join('\n');
}
