import type { AbiType, EmittedItem } from '../emit/emitTypes.js';
import type { PrimitiveKind } from '../oracle/oracleTypes.js';
import type { BindingManifest, ManifestFunction } from './manifestTypes.js';

const SCALAR_NAMES: Record<PrimitiveKind, string> = {
  i8: 'int8_t',
  i16: 'int16_t',
  i32: 'int32_t',
  i64: 'int64_t',
  i128: 'int128_t',
  isize: 'intptr_t',
  u8: 'uint8_t',
  u16: 'uint16_t',
  u32: 'uint32_t',
  u64: 'uint64_t',
  u128: 'uint128_t',
  usize: 'size_t',
  f32: 'float',
  f64: 'double',
  bool: 'bool',
  // Rust `char` is a 32-bit Unicode scalar value.
  char: 'uint32_t',
};

export function abiTypeName(t: AbiType): string {
  switch (t.kind) {
    case 'void':
      return 'void';
    case 'scalar':
      return SCALAR_NAMES[t.primitive];
    case 'pointer':
      return 'pointer';
    case 'record':
      return `struct ${t.name}`;
    case 'container':
      return `rust:${t.container}`;
    case 'opaque':
      return 'opaque';
  }
}

/** Describes the C side of already selected items. */
export function buildManifest(items: EmittedItem[]): BindingManifest {
  const manifest: BindingManifest = { functions: {}, records: {} };

  for (const item of items) {
    if (item.symbol && item.signature) {
      manifest.functions[item.symbol] = {
        name: item.symbol,
        returns: abiTypeName(item.signature.returns),
        args: item.signature.params.map((p) => abiTypeName(p.type)),
      };
    }
    if (item.layout) {
      manifest.records[item.layout.name] = {
        fields: item.layout.fields.map((f) => ({ name: f.name, type: abiTypeName(f.type) })),
      };
    }
  }

  return manifest;
}

export function formatBindingSignature(fn: ManifestFunction): string {
  return `${fn.returns} ${fn.name}(${fn.args.join(', ')})`;
}
