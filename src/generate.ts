import { mkdirSync, writeFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { DEFAULT_MARKER, parseRustSource } from './parser/index.js';
import { classifyDeclaration } from './classify/classifyDeclaration.js';
import { emitDeclaration } from './emit/emitDeclaration.js';
import { SymbolRegistry } from './emit/symbolRegistry.js';
import type { EmittedItem, GeneratedArtifact, HostRegistration } from './emit/emitTypes.js';
import {
  C_ABI_ONLY,
  modeFromTarget,
  renderHostModule,
  renderItems,
  selectItems,
} from './target/emissionController.js';
import type { EmissionMode } from './target/targetTypes.js';
import { buildManifest, formatBindingSignature } from './manifest/buildManifest.js';
import type { BindingManifest } from './manifest/manifestTypes.js';
import {
  BindingDiagnosticsError,
  renderCompileError,
  type Diagnostic,
} from './diagnostics/diagnostics.js';
import { loadOptionalConfig, type AbiforgeConfig } from './dx/config.js';
import { logInfo } from './dx/logger.js';
import { trace } from './dx/trace.js';
import { warn } from './dx/warnings.js';

export type GenerateOptions = {
  marker?: string;
  mode?: EmissionMode;
  /** Emit a `#[pymodule]` with this name when the host path is built. */
  hostModule?: string;
  /** Reported on diagnostics. */
  file?: string;
};

export type GenerateResult = {
  /** The rewritten Rust source. */
  output: string;
  artifacts: GeneratedArtifact[];
  diagnostics: Diagnostic[];
  manifest: BindingManifest;
  hostRegistrations: HostRegistration[];
};

/**
 * State shared by every source of one build: emitted names, records that
 * carry a deallocator, and owners handed out as boxed pointers.
 */
export class BindingBuild {
  readonly registry = new SymbolRegistry();
  private readonly records = new Set<string>();
  private readonly boxedOwners = new Map<string, string>();

  noteRecord(name: string) {
    this.records.add(name);
  }

  noteBoxedOwner(owner: string, where: string) {
    if (!this.boxedOwners.has(owner)) this.boxedOwners.set(owner, where);
  }

  /** Warns about owners handed out as `*mut Owner` with no `<Owner>_free`. */
  checkDeallocators() {
    for (const [owner, where] of this.boxedOwners) {
      if (this.records.has(owner)) continue;
      warn({
        code: 'MISSING_DEALLOCATOR',
        message: `${owner} instances are returned as owning pointers (${where}) but no ${owner}_free is generated`,
        hint: `mark \`struct ${owner}\` for export as well`,
      });
    }
  }
}

type Replacement = { start: number; end: number; text: string };

function splice(source: string, replacements: Replacement[]): string {
  let out = '';
  let cursor = 0;
  for (const r of [...replacements].sort((a, b) => a.start - b.start)) {
    out += source.slice(cursor, r.start) + r.text;
    cursor = r.end;
  }
  return out + source.slice(cursor);
}

/**
 * Rewrites every marked item of one Rust source.
 *
 * Each failing declaration is replaced by a `compile_error!` and reported in
 * `diagnostics`; the other declarations are generated normally.
 */
export function generateSource(
  source: string,
  options: GenerateOptions = {},
  build?: BindingBuild,
): GenerateResult {
  const marker = options.marker ?? DEFAULT_MARKER;
  const mode = options.mode ?? C_ABI_ONLY;
  const state = build ?? new BindingBuild();
  const parsed = parseRustSource(source, { marker });

  const replacements: Replacement[] = [];
  const diagnostics: Diagnostic[] = [];
  const selected: EmittedItem[] = [];

  trace('generate.source', { file: options.file, items: parsed.items.length, mode });

  for (const marked of parsed.items) {
    const classified = classifyDeclaration(marked.item, { marker });
    const emitted = classified.ok ? emitDeclaration(classified.value, state.registry) : classified;

    if (!emitted.ok) {
      const d = options.file ? { ...emitted.diagnostic, file: options.file } : emitted.diagnostic;
      diagnostics.push(d);
      replacements.push({ start: marked.start, end: marked.end, text: renderCompileError(d) });
      continue;
    }

    const emission = emitted.value;
    if (classified.ok && classified.value.kind === 'dataRecord') state.noteRecord(emission.declaration);
    if (emission.boxedOwner) {
      state.noteBoxedOwner(emission.boxedOwner, `${options.file ?? 'source'}:${marked.item.line}`);
    }

    selected.push(...selectItems(emission.items, mode));
    replacements.push({ start: marked.start, end: marked.end, text: renderItems(emission.items, mode) });
  }

  const hostRegistrations = selected.flatMap((i) => (i.hostRegistration ? [i.hostRegistration] : []));
  let output = splice(source, replacements);
  if (options.hostModule) {
    const module = renderHostModule(hostRegistrations, options.hostModule, mode);
    if (module) output = `${output.replace(/\s*$/, '')}\n\n${module}\n`;
  }

  if (!build) state.checkDeallocators();

  const manifest = buildManifest(selected.filter((i) => i.gate !== 'host'));
  trace('generate.manifest', {
    file: options.file,
    functions: Object.values(manifest.functions).map(formatBindingSignature),
  });

  return {
    output,
    artifacts: selected.flatMap((i) => (i.symbol ? [{ symbol: i.symbol, source: i.source }] : [])),
    diagnostics,
    manifest,
    hostRegistrations,
  };
}

export type FileGenerateOptions = Omit<GenerateOptions, 'mode' | 'file'> & {
  target?: EmissionMode | 'c-abi' | 'host-extension' | 'dual';
  hostFeature?: string;
  /** Directory holding `abiforge.config.js` (default: cwd). */
  projectRoot?: string;
  failOnDiagnostics?: boolean;
};

export type FileJob = {
  input: string;
  /** Where to write the rewritten source; nothing is written when omitted. */
  output?: string;
};

async function resolveOptions(options: FileGenerateOptions) {
  const config: AbiforgeConfig = (await loadOptionalConfig(options.projectRoot)) ?? {};
  const target = options.target ?? config.target ?? 'c-abi';
  const mode =
    typeof target === 'string'
      ? modeFromTarget(target, options.hostFeature ?? config.hostFeature)
      : target;

  return {
    marker: options.marker ?? config.marker,
    hostModule: options.hostModule ?? config.hostModule,
    mode,
    failOnDiagnostics: options.failOnDiagnostics ?? config.failOnDiagnostics ?? true,
  };
}

/**
 * Generates several files as one build: names must be unique across all of
 * them, and the host module (if any) is appended to the first file.
 */
export async function generateFiles(
  jobs: FileJob[],
  options: FileGenerateOptions = {},
): Promise<GenerateResult[]> {
  const resolved = await resolveOptions(options);
  const build = new BindingBuild();
  const results: GenerateResult[] = [];

  for (const job of jobs) {
    const source = await readFile(job.input, 'utf8');
    const result = generateSource(
      source,
      { marker: resolved.marker, mode: resolved.mode, file: job.input },
      build,
    );
    results.push(result);
  }

  build.checkDeallocators();

  if (resolved.hostModule && results.length) {
    const registrations = results.flatMap((r) => r.hostRegistrations);
    const module = renderHostModule(registrations, resolved.hostModule, resolved.mode);
    if (module) results[0].output = `${results[0].output.replace(/\s*$/, '')}\n\n${module}\n`;
  }

  const diagnostics = results.flatMap((r) => r.diagnostics);
  if (diagnostics.length && resolved.failOnDiagnostics) {
    throw new BindingDiagnosticsError(diagnostics);
  }

  jobs.forEach((job, i) => {
    if (!job.output) return;
    mkdirSync(dirname(job.output), { recursive: true });
    writeFileSync(job.output, results[i].output, 'utf8');
    logInfo('wrote', { input: job.input, output: job.output, symbols: results[i].artifacts.length });
  });

  return results;
}

export async function generateFile(
  input: string,
  options: FileGenerateOptions & { output?: string } = {},
): Promise<GenerateResult> {
  const [result] = await generateFiles([{ input, output: options.output }], options);
  return result;
}
