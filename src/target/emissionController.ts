import type { EmissionGate, EmittedItem, HostRegistration } from '../emit/emitTypes.js';
import {
  DEFAULT_HOST_FEATURE,
  type EmissionMode,
  type TargetSetting,
} from './targetTypes.js';

export const C_ABI_ONLY: EmissionMode = { kind: 'single', target: 'c-abi' };

export function modeFromTarget(
  target: TargetSetting,
  hostFeature: string = DEFAULT_HOST_FEATURE,
): EmissionMode {
  if (target === 'dual') return { kind: 'dual', hostFeature };
  return { kind: 'single', target };
}

export function includesGate(mode: EmissionMode, gate: EmissionGate): boolean {
  if (gate === 'always' || mode.kind === 'dual') return true;
  return mode.target === 'c-abi' ? gate === 'c-abi' : gate === 'host';
}

export function includesHost(mode: EmissionMode): boolean {
  return includesGate(mode, 'host');
}

export function selectItems(items: EmittedItem[], mode: EmissionMode): EmittedItem[] {
  return items.filter((i) => includesGate(mode, i.gate));
}

function gateLine(mode: EmissionMode, gate: EmissionGate): string | null {
  if (mode.kind !== 'dual' || gate === 'always') return null;
  return gate === 'c-abi'
    ? `#[cfg(not(feature = "${mode.hostFeature}"))]`
    : `#[cfg(feature = "${mode.hostFeature}")]`;
}

function hostAttributeLines(mode: EmissionMode, attributes: string[]): string[] {
  if (mode.kind === 'dual') {
    return attributes.map((a) => `#[cfg_attr(feature = "${mode.hostFeature}", ${a})]`);
  }
  return mode.target === 'host-extension' ? attributes.map((a) => `#[${a}]`) : [];
}

/** Renders one item for the mode, or null when the mode leaves it out. */
export function renderItem(item: EmittedItem, mode: EmissionMode): string | null {
  if (!includesGate(mode, item.gate)) return null;
  const gate = gateLine(mode, item.gate);
  return [
    ...(gate ? [gate] : []),
    ...hostAttributeLines(mode, item.hostAttributes ?? []),
    item.source,
  ].join('\n');
}

export function renderItems(items: EmittedItem[], mode: EmissionMode): string {
  return items
    .map((i) => renderItem(i, mode))
    .filter((s): s is string => s !== null)
    .join('\n\n');
}

/**
 * `#[pymodule]` entry point registering every host function and class of a
 * build. Null when the mode has no host path or nothing to register.
 */
export function renderHostModule(
  registrations: HostRegistration[],
  moduleName: string,
  mode: EmissionMode,
): string | null {
  if (!includesHost(mode) || registrations.length === 0) return null;

  const lines = registrations.map((r) =>
    r.kind === 'function'
      ? `    m.add_function(pyo3::wrap_pyfunction!(${r.name}, m)?)?;`
      : `    m.add_class::<${r.name}>()?;`,
  );
  const gate = gateLine(mode, 'host');

  return [
    ...(gate ? [gate] : []),
    '#[pyo3::pymodule]',
    `fn ${moduleName}(m: &pyo3::Bound<'_, pyo3::types::PyModule>) -> pyo3::PyResult<()> {`,
    '    use pyo3::prelude::*;',
    ...lines,
    '    Ok(())',
    '}',
  ].join('\n');
}
