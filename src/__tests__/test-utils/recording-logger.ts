import type { Logger } from '../../utils/logger';

export interface LogLine {
  level: 'debug' | 'info' | 'warn' | 'error';
  msg: string;
  ctx: unknown[];
}

/** Logger that keeps every line in memory so tests can assert on events. */
export function recordingLogger(lines: LogLine[] = []): Logger & { lines: LogLine[]; events: () => string[] } {
  const make = (): Logger => ({
    debug: (msg, ...ctx) => void lines.push({ level: 'debug', msg, ctx }),
    info: (msg, ...ctx) => void lines.push({ level: 'info', msg, ctx }),
    warn: (msg, ...ctx) => void lines.push({ level: 'warn', msg, ctx }),
    error: (msg, ...ctx) => void lines.push({ level: 'error', msg, ctx }),
    child: () => make(),
  });
  return { ...make(), lines, events: () => lines.map((l) => l.msg) };
}
