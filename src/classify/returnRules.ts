import type { TypeExpr } from '../parser/parserTypes.js';
import type { TypeDescriptor } from '../oracle/oracleTypes.js';
import { classifyType, isUnitType } from '../oracle/classifyType.js';
import type { MethodRole } from './declTypes.js';

export type CallableRole = MethodRole | 'freeFunction';

export type ReturnKind = 'unit' | 'owner' | 'value' | 'errorShape' | 'optionalShape';

export type ReturnStrategy =
  /** Export the callable's own return type unchanged. */
  | 'passThrough'
  /** Call for effect, return nothing. */
  | 'discard'
  /** Move the returned owner value into a `Box` and hand out `*mut Owner`. */
  | 'heapBox'
  /** Reshape `Result<T, E>` into a flag/ok/err record. */
  | 'errorRecord'
  /** Reshape `Option<T>` into a flag/value record. */
  | 'optionalRecord'
  | 'reject';

/**
 * How every exported callable returns across the C boundary.
 *
 * Any value of the owner type is heap-boxed, whatever the role, so the
 * foreign side releases every instance through the one `<Owner>_free`
 * wrapper. Constructors must produce an owner value; builder-style
 * instance methods returning the owner are boxed as well, but stay
 * instance methods (see `classifyMethod`).
 */
export const RETURN_RULES: Readonly<Record<CallableRole, Readonly<Record<ReturnKind, ReturnStrategy>>>> = {
  freeFunction: {
    unit: 'passThrough',
    owner: 'reject',
    value: 'passThrough',
    errorShape: 'errorRecord',
    optionalShape: 'optionalRecord',
  },
  constructor: {
    unit: 'reject',
    owner: 'heapBox',
    value: 'reject',
    errorShape: 'reject',
    optionalShape: 'reject',
  },
  staticFunction: {
    unit: 'discard',
    owner: 'heapBox',
    value: 'passThrough',
    errorShape: 'errorRecord',
    optionalShape: 'optionalRecord',
  },
  instanceMethod: {
    unit: 'discard',
    owner: 'heapBox',
    value: 'passThrough',
    errorShape: 'errorRecord',
    optionalShape: 'optionalRecord',
  },
};

/** `Self` or the owner's own name, without generic arguments. */
export function isOwnerType(type: TypeExpr | null, owner: string): boolean {
  if (!type || type.kind !== 'path' || type.args.length) return false;
  const name = type.segments[type.segments.length - 1];
  return name === 'Self' || name === owner;
}

export type ResolvedReturn =
  | { ok: true; kind: ReturnKind; strategy: Exclude<ReturnStrategy, 'reject'>; descriptor: TypeDescriptor }
  | { ok: false; reason: string };

export function resolveReturn(
  role: CallableRole,
  returnType: TypeExpr | null,
  owner: string | null,
): ResolvedReturn {
  let kind: ReturnKind;
  let descriptor: TypeDescriptor;

  if (isUnitType(returnType)) {
    kind = 'unit';
    descriptor = { kind: 'unit' };
  } else if (owner && isOwnerType(returnType, owner)) {
    kind = 'owner';
    descriptor = { kind: 'opaquePointer', mutable: true };
  } else if (returnType) {
    descriptor = classifyType(returnType, 'return');
    switch (descriptor.kind) {
      case 'unsupported':
        return { ok: false, reason: descriptor.reason };
      case 'errorShape':
        kind = 'errorShape';
        break;
      case 'optionalShape':
        kind = 'optionalShape';
        break;
      default:
        kind = 'value';
    }
  } else {
    // isUnitType covers a missing return type.
    return { ok: false, reason: 'missing return type' };
  }

  const strategy = RETURN_RULES[role][kind];
  if (strategy === 'reject') {
    const returned = returnType?.text ?? '()';
    return {
      ok: false,
      reason:
        role === 'constructor'
          ? `constructors must return the owner type, found \`${returned}\``
          : `\`${returned}\` cannot be returned from a ${role === 'freeFunction' ? 'free function' : role}`,
    };
  }
  return { ok: true, kind, strategy, descriptor };
}
