import { performance } from 'node:perf_hooks';

export type TraceLevel = 'error' | 'warn' | 'info' | 'debug';

/** Every trace event of a generation run, with its payload. */
export type TraceEvents = {
  'generate.source': { file?: string; items: number; mode: unknown };
  'generate.manifest': { file?: string; functions: string[] };
  'classify.rejected': { code: string; item: string | null; line: number };
  'emit.declaration': { declaration: string; kind: string; symbols: string[] };
};

export type TraceEvent = keyof TraceEvents;

const EVENT_LEVELS: Record<TraceEvent, TraceLevel> = {
  'generate.source': 'info',
  'generate.manifest': 'debug',
  'classify.rejected': 'warn',
  'emit.declaration': 'debug',
};

const order: Record<TraceLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function envTraceEnabled(): boolean {
  const v = process.env.ABIFORGE_TRACE;
  return v === '1' || v === 'true' || v === 'yes';
}

function envTraceLevel(): TraceLevel {
  const v = (process.env.ABIFORGE_TRACE_LEVEL ?? '').toLowerCase();
  if (v === 'error' || v === 'warn' || v === 'info' || v === 'debug') return v;
  return 'info';
}

export function shouldTrace(level: TraceLevel): boolean {
  if (!envTraceEnabled()) return false;
  return order[level] <= order[envTraceLevel()];
}

type TracePayload<E extends TraceEvent> = {
  t: number;
  pid: number;
  level: TraceLevel;
  event: E;
  data: TraceEvents[E];
};

/**
 * One JSON line per event on stdout, when `ABIFORGE_TRACE` is set and the
 * event's level is within `ABIFORGE_TRACE_LEVEL` (default `info`).
 */
export function trace<E extends TraceEvent>(event: E, data: TraceEvents[E]) {
  const level = EVENT_LEVELS[event];
  if (!shouldTrace(level)) return;

  const payload: TracePayload<E> = {
    t: Number(performance.now().toFixed(3)),
    pid: process.pid,
    level,
    event,
    data,
  };

  // eslint-disable-next-line no-console
  console.log('[abiforge:trace]', JSON.stringify(payload));
}
