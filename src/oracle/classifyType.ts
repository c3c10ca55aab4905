import type { TypeExpr } from '../parser/parserTypes.js';
import type {
  ContainerKind,
  PrimitiveKind,
  TypeDescriptor,
  TypePosition,
} from './oracleTypes.js';

const PRIMITIVES: ReadonlySet<string> = new Set<PrimitiveKind>([
  'i8',
  'i16',
  'i32',
  'i64',
  'i128',
  'isize',
  'u8',
  'u16',
  'u32',
  'u64',
  'u128',
  'usize',
  'f32',
  'f64',
  'bool',
  'char',
]);

const CONTAINERS: ReadonlySet<string> = new Set<ContainerKind>(['String', 'Vec']);

function isPrimitiveKind(name: string): name is PrimitiveKind {
  return PRIMITIVES.has(name);
}

function isContainerKind(name: string): name is ContainerKind {
  return CONTAINERS.has(name);
}

function lastSegment(type: Extract<TypeExpr, { kind: 'path' }>): string {
  return type.segments[type.segments.length - 1] ?? '';
}

export function isUnitType(type: TypeExpr | null): boolean {
  return type == null || (type.kind === 'tuple' && type.elements.length === 0);
}

/** Payloads of error/optional shapes must be fully zero-fillable. */
function classifyPayload(type: TypeExpr, shape: string): TypeDescriptor {
  const d = classifyType(type, 'return');
  if (d.kind === 'primitive' || d.kind === 'unit') return d;
  return {
    kind: 'unsupported',
    reason: `${shape} payload \`${type.text}\` is not FFI-compatible; only primitive or unit payloads are allowed`,
  };
}

function classifyShape(
  type: Extract<TypeExpr, { kind: 'path' }>,
  name: string,
  position: TypePosition,
): TypeDescriptor | null {
  if (name === 'Result' && type.args.length === 2) {
    if (position !== 'return') {
      return { kind: 'unsupported', reason: `\`${type.text}\` is only supported as a return type` };
    }
    const ok = classifyPayload(type.args[0], 'Result');
    if (ok.kind === 'unsupported') return ok;
    const err = classifyPayload(type.args[1], 'Result');
    if (err.kind === 'unsupported') return err;
    return { kind: 'errorShape', ok, err };
  }

  if (name === 'Option' && type.args.length === 1) {
    if (position !== 'return') {
      return { kind: 'unsupported', reason: `\`${type.text}\` is only supported as a return type` };
    }
    const inner = classifyPayload(type.args[0], 'Option');
    if (inner.kind === 'unsupported') return inner;
    return { kind: 'optionalShape', inner };
  }

  return null;
}

/**
 * Decides how a type crosses the C boundary.
 *
 * Anything that is not a primitive, unit, raw pointer, a one-level
 * `Result`/`Option` of those, or a duplicable container in field position
 * classifies as `unsupported`.
 */
export function classifyType(type: TypeExpr, position: TypePosition): TypeDescriptor {
  switch (type.kind) {
    case 'pointer':
      return { kind: 'opaquePointer', mutable: type.mutable };
    case 'tuple':
      if (type.elements.length === 0) return { kind: 'unit' };
      return { kind: 'unsupported', reason: `tuple \`${type.text}\` has no stable C layout` };
    case 'reference':
      return {
        kind: 'unsupported',
        reason: `reference \`${type.text}\` cannot cross the C boundary; use a raw pointer`,
      };
    case 'opaque':
      return { kind: 'unsupported', reason: `\`${type.text}\` is not FFI-compatible` };
    case 'path': {
      const name = lastSegment(type);

      const shape = classifyShape(type, name, position);
      if (shape) return shape;

      if (type.args.length === 0 && isPrimitiveKind(name)) {
        return { kind: 'primitive', primitive: name };
      }

      if (isContainerKind(name) && (name === 'Vec') === (type.args.length === 1)) {
        if (position === 'field') return { kind: 'duplicableContainer', container: name };
        return {
          kind: 'unsupported',
          reason: `\`${type.text}\` is only accepted as a record field`,
        };
      }

      return { kind: 'unsupported', reason: `\`${type.text}\` is not FFI-compatible` };
    }
  }
}

/** Descriptors a field accessor can be generated for. */
export function isAccessible(d: TypeDescriptor): boolean {
  return (
    d.kind === 'primitive' ||
    d.kind === 'unit' ||
    d.kind === 'opaquePointer' ||
    d.kind === 'duplicableContainer'
  );
}
