import type { SourceFunction, SourceItem, SourceParam, TypeExpr } from '../parser/parserTypes.js';
import type { Decl } from '../classify/declTypes.js';
import { classifyDeclaration } from '../classify/classifyDeclaration.js';
import { emitDeclaration } from '../emit/emitDeclaration.js';
import type { Emission, EmissionGate } from '../emit/emitTypes.js';
import type { SymbolRegistry } from '../emit/symbolRegistry.js';

// Hand-built items, so engine tests do not need the native parser.

export function path(name: string, ...args: TypeExpr[]): TypeExpr {
  const text = args.length ? `${name}<${args.map((a) => a.text).join(', ')}>` : name;
  return { kind: 'path', segments: name.split('::'), args, text };
}

export function ptr(mutable: boolean, pointee: TypeExpr): TypeExpr {
  return { kind: 'pointer', mutable, pointee, text: `*${mutable ? 'mut' : 'const'} ${pointee.text}` };
}

export function ref(mutable: boolean, referent: TypeExpr): TypeExpr {
  return { kind: 'reference', mutable, referent, text: `&${mutable ? 'mut ' : ''}${referent.text}` };
}

export function unit(): TypeExpr {
  return { kind: 'tuple', elements: [], text: '()' };
}

export function param(name: string, type: TypeExpr): SourceParam {
  return { pattern: name, name, type };
}

export function fn(
  name: string,
  params: SourceParam[],
  returnType: TypeExpr | null,
  body: string,
  extra: Partial<SourceFunction> = {},
): SourceFunction {
  return {
    kind: 'function',
    name,
    visibility: null,
    isUnsafe: false,
    isAsync: false,
    abi: null,
    isGeneric: false,
    receiver: 'none',
    params,
    returnType,
    body,
    text: `fn ${name}(${params.map((p) => `${p.pattern}: ${p.type.text}`).join(', ')})${
      returnType ? ` -> ${returnType.text}` : ''
    } ${body}`,
    marked: false,
    attributes: [],
    docs: [],
    line: 1,
    ...extra,
  };
}

export function mustClassify(item: SourceItem): Decl {
  const r = classifyDeclaration(item, { marker: 'abi_export' });
  if (!r.ok) throw new Error(r.diagnostic.message);
  return r.value;
}

export function mustEmit(item: SourceItem, registry?: SymbolRegistry): Emission {
  const r = emitDeclaration(mustClassify(item), registry);
  if (!r.ok) throw new Error(r.diagnostic.message);
  return r.value;
}

export function sources(e: Emission, gate?: EmissionGate): string[] {
  return e.items.filter((i) => gate === undefined || i.gate === gate).map((i) => i.source);
}
