import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const configSchema = z.object({
  // Exports
  exportFolder: z.string().min(1).default('Supernote Exports'),
  validExtensions: z
    .array(z.string().regex(/^\.[^.\s]+$/, 'Extensions must look like ".txt"'))
    .min(1)
    .default(['.txt']),
  processedSuffix: z.string().min(1).default('.processed'),

  // Daily notes
  dailyNotesFolder: z.string().min(1).default('Daily Notes'),
  noteSectionHeading: z.string().min(1).default('Notes'),
  templatePath: z.string().optional(),
  noteDateSource: z.enum(['now', 'filename', 'modified']).default('now'),
  timezone: z.string().default('UTC').refine(isKnownTimeZone, 'Unknown time zone'),

  // Note service
  notesBackend: z.enum(['mcp', 'vault']).default('mcp'),
  notesMcpCommand: z.string().min(1).default('obsidian-mcp-server'),
  notesMcpArgs: z.array(z.string()).default([]),
  obsidianApiKey: z.string().optional(),
  obsidianVaultPath: z.string().optional(),

  // App
  importSchedule: z.string().optional(),
  dryRun: booleanFlag,
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type Config = z.infer<typeof configSchema>;
export type NoteDateSource = Config['noteDateSource'];

export function parseConfig(source: NodeJS.ProcessEnv): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key]?.trim();
    return value === '' ? undefined : value;
  };
  const list = (key: string, separator: string | RegExp): string[] | undefined =>
    env(key)
      ?.split(separator)
      .map((item) => item.trim())
      .filter(Boolean);

  const raw = {
    exportFolder: env('EXPORT_FOLDER'),
    validExtensions: list('VALID_EXTENSIONS', ','),
    processedSuffix: env('PROCESSED_SUFFIX'),
    dailyNotesFolder: env('DAILY_NOTES_FOLDER'),
    noteSectionHeading: env('NOTE_SECTION_HEADING'),
    templatePath: env('TEMPLATE_PATH'),
    noteDateSource: env('NOTE_DATE_SOURCE'),
    timezone: env('TIMEZONE'),
    notesBackend: env('NOTES_BACKEND'),
    notesMcpCommand: env('NOTES_MCP_COMMAND'),
    notesMcpArgs: list('NOTES_MCP_ARGS', /\s+/),
    obsidianApiKey: env('OBSIDIAN_API_KEY'),
    obsidianVaultPath: env('OBSIDIAN_VAULT_PATH'),
    importSchedule: env('IMPORT_SCHEDULE'),
    dryRun: env('DRY_RUN')?.toLowerCase(),
    logLevel: env('LOG_LEVEL'),
  };

  try {
    return configSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { cause: error });
    }
    throw error;
  }
}

export function loadConfig(): Config {
  return parseConfig(process.env);
}
