import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import type { TargetSetting } from '../target/targetTypes.js';
import { logDebug, setDebugEnabled } from './logger.js';

export type AbiforgeConfig = {
  /** Marker attribute name (default `abi_export`). */
  marker?: string;
  /** Consumer surface(s) to generate (default `c-abi`). */
  target?: TargetSetting;
  /** Cargo feature gating the host path in dual mode (default `python`). */
  hostFeature?: string;
  /** Name of the generated `#[pymodule]`; no module is emitted when unset. */
  hostModule?: string;
  /** Enable debug logs without env var */
  debug?: boolean;
  /** Throw when any declaration fails (default true). */
  failOnDiagnostics?: boolean;
};

const TARGETS: ReadonlySet<string> = new Set<TargetSetting>(['c-abi', 'host-extension', 'dual']);
const RUST_IDENT = /^[A-Za-z_]\w*$/;

let cached:
  | { loaded: true; config: AbiforgeConfig | null }
  | { loaded: false } = { loaded: false };

function configPath(projectRoot: string) {
  return join(projectRoot, 'abiforge.config.js');
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isTarget(v: unknown): v is TargetSetting {
  return typeof v === 'string' && TARGETS.has(v);
}

function optionalIdent(raw: Record<string, unknown>, key: string, source: string): string | undefined {
  const v = raw[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'string' || !RUST_IDENT.test(v)) {
    throw new Error(`Invalid abiforge config (${source}): \`${key}\` must be a Rust identifier`);
  }
  return v;
}

function optionalBoolean(raw: Record<string, unknown>, key: string, source: string): boolean | undefined {
  const v = raw[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'boolean') {
    throw new Error(`Invalid abiforge config (${source}): \`${key}\` must be a boolean`);
  }
  return v;
}

/** Validates the default export of a config module. */
export function parseConfig(value: unknown, source = 'abiforge.config.js'): AbiforgeConfig {
  if (!isRecord(value)) {
    throw new Error(`Invalid abiforge config (${source}): expected an object export`);
  }

  const target = value.target;
  if (target !== undefined && !isTarget(target)) {
    throw new Error(
      `Invalid abiforge config (${source}): \`target\` must be one of ${[...TARGETS].join(', ')}`,
    );
  }

  const hostFeature = value.hostFeature;
  if (hostFeature !== undefined && (typeof hostFeature !== 'string' || hostFeature.length === 0)) {
    throw new Error(`Invalid abiforge config (${source}): \`hostFeature\` must be a non-empty string`);
  }

  const config: AbiforgeConfig = {};
  const marker = optionalIdent(value, 'marker', source);
  const hostModule = optionalIdent(value, 'hostModule', source);
  const debug = optionalBoolean(value, 'debug', source);
  const failOnDiagnostics = optionalBoolean(value, 'failOnDiagnostics', source);

  if (marker !== undefined) config.marker = marker;
  if (target !== undefined) config.target = target;
  if (hostFeature !== undefined) config.hostFeature = hostFeature;
  if (hostModule !== undefined) config.hostModule = hostModule;
  if (debug !== undefined) config.debug = debug;
  if (failOnDiagnostics !== undefined) config.failOnDiagnostics = failOnDiagnostics;
  return config;
}

/**
 * Loads optional `abiforge.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<AbiforgeConfig | null> {
  if (cached.loaded) return cached.config;

  const p = configPath(projectRoot);
  if (!existsSync(p)) {
    cached = { loaded: true, config: null };
    return null;
  }

  // Dynamic import so there is zero cost when config isn't present.
  const url = pathToFileURL(resolve(p)).href;
  const mod: unknown = await import(url);
  const exported = isRecord(mod) && 'default' in mod ? mod.default : mod;
  const cfg = parseConfig(exported, p);
  if (cfg.debug) setDebugEnabled(true);
  cached = { loaded: true, config: cfg };
  logDebug('loaded config', { path: p });
  return cached.config;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
