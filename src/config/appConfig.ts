import { readFile, writeFile } from 'node:fs/promises';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import type { ILogger } from '../ports/logger';
import { silentLogger } from '../adapters/logger/consoleLogger';
import { isMissing } from '../adapters/json/jsonFileStore';

const EnvSchema = z.object({
  LEDGER_DATA_FILE: z.string().min(1).default('net_worth_refactored.json'),
  LEDGER_CONFIG_FILE: z.string().min(1).default('app_config.json'),
  LEDGER_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface AppConfig {
  dataFile: string;
  configFile: string;
  logLevel: z.infer<typeof EnvSchema>['LEDGER_LOG_LEVEL'];
}

/** Reads `.env` into process.env first unless an explicit env is given. */
export function loadConfig(env?: Record<string, string | undefined>): AppConfig {
  if (!env) loadDotenv();
  const parsed = EnvSchema.parse(env ?? process.env);
  return {
    dataFile: parsed.LEDGER_DATA_FILE,
    configFile: parsed.LEDGER_CONFIG_FILE,
    logLevel: parsed.LEDGER_LOG_LEVEL,
  };
}

const AppConfigFileSchema = z.object({
  last_opened_file: z.string().min(1).optional(),
});

/** Remembers which data file was used last. */
export class AppConfigFile {
  constructor(private readonly path: string, private readonly log: ILogger = silentLogger){}

  async lastOpenedFile(): Promise<string | null> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (e) {
      if (isMissing(e)) return null;
      throw e;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      this.log.warn(`ignoring unreadable ${this.path}`);
      return null;
    }
    const parsed = AppConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn(`ignoring unreadable ${this.path}`);
      return null;
    }
    return parsed.data.last_opened_file ?? null;
  }

  async rememberOpenedFile(file: string): Promise<void> {
    await writeFile(this.path, JSON.stringify({ last_opened_file: file }, null, 4) + '\n', 'utf8');
  }
}

/** The last opened file wins over the configured default. */
export async function resolveDataFile(config: AppConfig, file: AppConfigFile): Promise<string> {
  return (await file.lastOpenedFile()) ?? config.dataFile;
}
