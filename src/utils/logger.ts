import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export interface Logger {
  debug(message: string): Promise<void>;
  info(message: string): Promise<void>;
  warn(message: string): Promise<void>;
  error(message: string): Promise<void>;
}

export interface RunLoggerOptions {
  runLabel?: string;
  minLevel?: LogLevel;
  /** Mirror each line to the console. */
  verbose?: boolean;
}

function nowIso(): string {
  return new Date().toISOString();
}

export class RunLogger implements Logger {
  private readonly runLabel: string;
  private readonly minLevel: LogLevel;
  private readonly verbose: boolean;

  constructor(
    private readonly filePath: string,
    options: RunLoggerOptions = {},
  ) {
    this.runLabel = options.runLabel ?? 'Scrape run';
    this.minLevel = options.minLevel ?? 'INFO';
    this.verbose = options.verbose ?? false;
  }

  async init(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, '', { encoding: 'utf8', flag: 'a' });
    await this.write(`=== ${this.runLabel} started ${nowIso()} ===`);
  }

  async debug(message: string): Promise<void> {
    await this.log('DEBUG', message);
  }

  async info(message: string): Promise<void> {
    await this.log('INFO', message);
  }

  async warn(message: string): Promise<void> {
    await this.log('WARN', message);
  }

  async error(message: string): Promise<void> {
    await this.log('ERROR', message);
  }

  async close(): Promise<void> {
    await this.write(`=== ${this.runLabel} finished ${nowIso()} ===`);
  }

  private async log(level: LogLevel, message: string): Promise<void> {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }
    await this.write(`[${level}] ${message}`);
  }

  private async write(message: string): Promise<void> {
    const line = `${nowIso()} ${message}`;
    if (this.verbose) {
      console.log(line);
    }
    await appendFile(this.filePath, `${line}\n`, 'utf8');
  }
}

/** Discards everything; for callers that run without a log file. */
export const nullLogger: Logger = {
  debug: async () => undefined,
  info: async () => undefined,
  warn: async () => undefined,
  error: async () => undefined,
};
