import pino from 'pino';
import type { Logger } from '../../src/core/logging/index.js';

/**
 * Fake logger for testing.
 *
 * Fakes over mocks: a real pino logger whose destination is an in-memory
 * array, so it satisfies the Logger type and captures every line for
 * assertions.
 */
export interface LogEntry {
  level: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  msg?: string;
  fields: Record<string, unknown>;
}

const LEVEL_LABELS: Record<number, LogEntry['level']> = {
  10: 'trace',
  20: 'debug',
  30: 'info',
  40: 'warn',
  50: 'error',
  60: 'fatal',
};

export class FakeLogger {
  readonly entries: LogEntry[] = [];
  readonly logger: Logger;

  constructor(level: pino.LevelWithSilent = 'debug') {
    this.logger = pino(
      { level, base: null, timestamp: false },
      {
        write: (line: string) => {
          this.entries.push(toEntry(JSON.parse(line)));
        },
      }
    );
  }

  // ═══════════════════════════════════════════════════════════════════
  // Test Helpers
  // ═══════════════════════════════════════════════════════════════════

  clear(): void {
    this.entries.length = 0;
  }

  hasEntry(level: LogEntry['level'], msgContains: string): boolean {
    return this.entries.some((e) => e.level === level && e.msg?.includes(msgContains));
  }

  getEntries(level?: LogEntry['level']): LogEntry[] {
    return level ? this.entries.filter((e) => e.level === level) : [...this.entries];
  }
}

function toEntry(parsed: unknown): LogEntry {
  const fields: Record<string, unknown> = typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};
  const { level, msg, ...rest } = fields;
  return {
    level: (typeof level === 'number' && LEVEL_LABELS[level]) || 'info',
    msg: typeof msg === 'string' ? msg : undefined,
    fields: rest,
  };
}
