/*
 * Lightweight structured logger with redaction and LOG_LEVEL support.
 * No external deps; outputs single-line JSON for easy ingestion.
 */

type Level = 'debug' | 'info' | 'warn' | 'error' | 'silent';
type ActiveLevel = Exclude<Level, 'silent'>;

const LEVELS: Record<ActiveLevel, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

const KNOWN_LEVELS: readonly Level[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLevel(value: string): value is Level {
  return (KNOWN_LEVELS as readonly string[]).includes(value);
}

function currentLevel(): Level {
  const lvl = String(process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLevel(lvl) ? lvl : 'info';
}

function levelEnabled(lvl: ActiveLevel): boolean {
  const cur = currentLevel();
  if (cur === 'silent') return false;
  return LEVELS[lvl] >= LEVELS[cur];
}

// Keys to redact in objects
const SENSITIVE_KEYS = new Set([
  'authorization',
  'password',
  'token',
  'apikey',
  'api_key',
  'x-api-key',
  'secret',
  'connectionstring',
  'database_url',
  'redis_url',
]);

function isObject(val: unknown): val is Record<string, unknown> {
  return !!val && typeof val === 'object' && !Array.isArray(val);
}

export function serializeError(err: Error): Record<string, unknown> {
  const out: Record<string, unknown> = { name: err.name, message: err.message };
  const code = 'code' in err ? err.code : undefined;
  if (typeof code === 'string' || typeof code === 'number') out.code = code;
  return out;
}

export function redactValue(value: unknown): unknown {
  if (value instanceof Error) return serializeError(value);
  if (typeof value === 'string') {
    // Bearer tokens or JWT-like strings
    if (/^Bearer\s+/i.test(value)) return 'Bearer [REDACTED]';
    if (/^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/.test(value)) return '[REDACTED_JWT]';
    // Credentials embedded in connection URLs
    if (/^[a-z][a-z0-9+.-]*:\/\/[^/\s:@]*:[^/\s@]+@/i.test(value)) {
      return value.replace(/\/\/([^/\s:@]*):[^/\s@]+@/, '//$1:[REDACTED]@');
    }
  }
  return value;
}

export function redactObject(input: Record<string, unknown>, allowList: string[] = []): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(input)) {
    const lowered = k.toLowerCase();
    if (SENSITIVE_KEYS.has(lowered) && !allowList.includes(lowered)) {
      out[k] = '[REDACTED]';
      continue;
    }
    if (v instanceof Error) out[k] = serializeError(v);
    else if (isObject(v)) out[k] = redactObject(v, allowList);
    else if (Array.isArray(v)) out[k] = v.map((i) => (isObject(i) ? redactObject(i, allowList) : redactValue(i)));
    else out[k] = redactValue(v);
  }
  return out;
}

function normalizeContext(ctx?: unknown): Record<string, unknown> | undefined {
  if (ctx == null) return undefined;
  if (ctx instanceof Error) return { error: serializeError(ctx) };
  if (isObject(ctx)) return ctx;
  return { value: ctx };
}

function write(level: ActiveLevel, msg: string, bindings: Record<string, unknown>, ctx?: unknown) {
  if (!levelEnabled(level)) return;
  const base: Record<string, unknown> = {
    level,
    msg,
    timestamp: new Date().toISOString(),
    ...bindings,
  };
  const normalized = normalizeContext(ctx);
  const payload = normalized ? { ...base, ...redactObject(normalized) } : base;
  // Single-line JSON for log processors
  const line = JSON.stringify(payload);
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

function toContext(args: unknown[]): unknown {
  if (args.length === 0) return undefined;
  if (args.length === 1) return args[0];
  return args;
}

export interface Logger {
  debug(msg: string, ...ctx: unknown[]): void;
  info(msg: string, ...ctx: unknown[]): void;
  warn(msg: string, ...ctx: unknown[]): void;
  error(msg: string, ...ctx: unknown[]): void;
  /** Returns a logger that stamps every line with `bindings` (e.g. `{ component: 'router' }`). */
  child(bindings: Record<string, unknown>): Logger;
}

function createLogger(bindings: Record<string, unknown>): Logger {
  return {
    debug: (msg, ...ctx) => write('debug', msg, bindings, toContext(ctx)),
    info: (msg, ...ctx) => write('info', msg, bindings, toContext(ctx)),
    warn: (msg, ...ctx) => write('warn', msg, bindings, toContext(ctx)),
    error: (msg, ...ctx) => write('error', msg, bindings, toContext(ctx)),
    child: (extra) => createLogger({ ...bindings, ...extra }),
  };
}

export const logger: Logger = createLogger({});

export type { Level };
