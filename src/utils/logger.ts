/*
 * Structured logger with redaction and LOG_LEVEL support.
 * Outputs single-line JSON for easy ingestion.
 */

type Level = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<Exclude<Level, 'silent'>, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

const KNOWN_LEVELS: readonly Level[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLevel(value: string): value is Level {
  return KNOWN_LEVELS.some((level) => level === value);
}

function currentLevel(): Level {
  const lvl = String(process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLevel(lvl) ? lvl : 'info';
}

function levelEnabled(lvl: Exclude<Level, 'silent'>): boolean {
  const cur = currentLevel();
  if (cur === 'silent') return false;
  return LEVELS[lvl] >= LEVELS[cur];
}

// Keys to redact in objects
const SENSITIVE_KEYS = new Set([
  'authorization',
  'cookie',
  'password',
  'token',
  'discordtoken',
  'discord_token',
  'admintoken',
  'admin_api_token',
  'apikey',
  'x-api-key',
  'secret',
]);

// Bot tokens: base64 user id, timestamp and HMAC separated by dots
const BOT_TOKEN_PATTERN = /^[A-Za-z0-9_-]{20,}\.[A-Za-z0-9_-]{4,}\.[A-Za-z0-9_-]{20,}$/;

function isObject(val: unknown): val is Record<string, unknown> {
  return !!val && typeof val === 'object' && !Array.isArray(val);
}

export function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    if (/^(Bearer|Bot)\s+/i.test(value)) return value.replace(/^(\w+)\s+.*$/, '$1 [REDACTED]');
    if (BOT_TOKEN_PATTERN.test(value)) return '[REDACTED_TOKEN]';
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
    if (isObject(v)) out[k] = redactObject(v, allowList);
    else if (Array.isArray(v)) out[k] = v.map((i) => (isObject(i) ? redactObject(i, allowList) : redactValue(i)));
    else out[k] = redactValue(v);
  }
  return out;
}

function serializeError(err: Error): Record<string, unknown> {
  const out: Record<string, unknown> = { name: err.name, message: err.message };
  if (currentLevel() === 'debug' && err.stack) out.stack = err.stack;
  return out;
}

function normalizeContext(ctx?: unknown): Record<string, unknown> | undefined {
  if (ctx == null) return undefined;
  if (ctx instanceof Error) return { error: serializeError(ctx) };
  if (isObject(ctx)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(ctx)) out[k] = v instanceof Error ? serializeError(v) : v;
    return out;
  }
  return { value: ctx };
}

function write(level: Exclude<Level, 'silent'>, msg: string, ctx?: unknown) {
  if (!levelEnabled(level)) return;
  const base: Record<string, unknown> = {
    level,
    msg,
    timestamp: new Date().toISOString(),
  };
  const normalized = normalizeContext(ctx);
  const payload = normalized ? { ...base, ...redactObject(normalized) } : base;
  const line = JSON.stringify(payload);
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

function toContext(args: unknown[]): unknown {
  if (args.length === 0) return undefined;
  if (args.length === 1) return args[0];
  return { values: args };
}

export const logger = {
  debug: (msg: string, ...ctx: unknown[]) => write('debug', msg, toContext(ctx)),
  info: (msg: string, ...ctx: unknown[]) => write('info', msg, toContext(ctx)),
  warn: (msg: string, ...ctx: unknown[]) => write('warn', msg, toContext(ctx)),
  error: (msg: string, ...ctx: unknown[]) => write('error', msg, toContext(ctx)),
};

export type { Level };
