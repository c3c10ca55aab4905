import type { ContainerKind, PrimitiveKind } from '../oracle/oracleTypes.js';

/**
 * Which consumer path an item belongs to.
 *
 * `always` items (deallocators, record layout) exist whatever target is
 * selected; `c-abi` and `host` items are selected by the emission mode.
 */
export type EmissionGate = 'always' | 'c-abi' | 'host';

export type AbiType =
  | { kind: 'void' }
  | { kind: 'scalar'; primitive: PrimitiveKind }
  | { kind: 'pointer' }
  | { kind: 'record'; name: string }
  | { kind: 'container'; container: ContainerKind }
  | { kind: 'opaque'; text: string };

export type AbiSignature = {
  params: { name: string; type: AbiType }[];
  returns: AbiType;
};

export type RecordLayout = {
  name: string;
  fields: { name: string; type: AbiType }[];
};

export type HostRegistration = { kind: 'function' | 'class'; name: string };

/** One Rust item produced for a declaration. */
export type EmittedItem = {
  gate: EmissionGate;
  source: string;
  /** Exported C symbol, for `extern "C"` wrappers. */
  symbol?: string;
  signature?: AbiSignature;
  layout?: RecordLayout;
  /** Attribute bodies applied only when the host path is built. */
  hostAttributes?: string[];
  hostRegistration?: HostRegistration;
};

export type Emission = {
  declaration: string;
  items: EmittedItem[];
  /** Every name the declaration defines: wrappers, records, hidden inner functions. */
  symbols: string[];
  /** Owner type whose values this declaration hands out as `*mut Owner`. */
  boxedOwner?: string;
};

export type GeneratedArtifact = {
  symbol: string;
  source: string;
};
