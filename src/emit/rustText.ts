import type { TypeExpr } from '../parser/parserTypes.js';
import type { TypeDescriptor } from '../oracle/oracleTypes.js';
import type { Param } from '../classify/declTypes.js';
import type { AbiType } from './emitTypes.js';

export const ZEROED = 'unsafe { std::mem::zeroed() }';

const INDENT = '    ';

/**
 * Renders a type back to Rust, replacing `Self` with `selfName` so the
 * result is valid outside the impl block.
 */
export function renderType(t: TypeExpr, selfName?: string): string {
  switch (t.kind) {
    case 'path': {
      const segments = t.segments.map((s, i) =>
        selfName && s === 'Self' && i === t.segments.length - 1 ? selfName : s,
      );
      const args = t.args.length ? `<${t.args.map((a) => renderType(a, selfName)).join(', ')}>` : '';
      return `${segments.join('::')}${args}`;
    }
    case 'pointer':
      return `*${t.mutable ? 'mut' : 'const'} ${renderType(t.pointee, selfName)}`;
    case 'reference':
      return `&${t.mutable ? 'mut ' : ''}${renderType(t.referent, selfName)}`;
    case 'tuple':
      return `(${t.elements.map((e) => renderType(e, selfName)).join(', ')})`;
    case 'opaque':
      return t.text;
  }
}

/** Type arguments of a `Result<T, E>` / `Option<T>` return type. */
export function shapeArgs(t: TypeExpr | null): TypeExpr[] {
  return t?.kind === 'path' ? t.args : [];
}

/** Parameters as written, for re-emitting the original signature. */
export function originalParams(params: Param[]): string {
  return params.map((p) => `${p.pattern}: ${p.type.text}`).join(', ');
}

export function wrapperParams(params: Param[], selfName?: string): string[] {
  return params.map((p) => `${p.name}: ${renderType(p.type, selfName)}`);
}

export function returnSuffix(t: TypeExpr | null): string {
  return t ? ` -> ${t.text}` : '';
}

export function leadingLines(docs: string[], attributes: string[]): string[] {
  return [...docs, ...attributes];
}

export type ExternFn = {
  name: string;
  params: string[];
  returns: string | null;
  body: string[];
};

export function renderExternFn(f: ExternFn): string {
  const ret = f.returns ? ` -> ${f.returns}` : '';
  return [
    '#[no_mangle]',
    `pub extern "C" fn ${f.name}(${f.params.join(', ')})${ret} {`,
    ...f.body.map((l) => INDENT + l),
    '}',
  ].join('\n');
}

export function renderReprC(name: string, fields: [string, string][]): string {
  return [
    '#[repr(C)]',
    `pub struct ${name} {`,
    ...fields.map(([n, t]) => `${INDENT}pub ${n}: ${t},`),
    '}',
  ].join('\n');
}

export function errorRecordMatch(record: string, scrutinee: string): string[] {
  return [
    `match ${scrutinee} {`,
    `    Ok(value) => ${record} {`,
    '        is_ok: 1,',
    '        ok_value: value,',
    `        err_value: ${ZEROED},`,
    '    },',
    `    Err(err) => ${record} {`,
    '        is_ok: 0,',
    `        ok_value: ${ZEROED},`,
    '        err_value: err,',
    '    },',
    '}',
  ];
}

export function optionalRecordMatch(record: string, scrutinee: string): string[] {
  return [
    `match ${scrutinee} {`,
    `    Some(value) => ${record} {`,
    '        is_some: 1,',
    '        value,',
    '    },',
    `    None => ${record} {`,
    '        is_some: 0,',
    `        value: ${ZEROED},`,
    '    },',
    '}',
  ];
}

/**
 * Indents a member for placement inside an impl block. Only the first line
 * of each text is shifted; continuation lines keep their source indentation.
 */
export function renderMember(lines: string[], text: string): string {
  const [first, ...rest] = text.split('\n');
  return [...lines, first].map((l) => INDENT + l).concat(rest).join('\n');
}

export function renderImpl(header: string[], owner: string, members: string[]): string {
  return [...header, `impl ${owner} {`, members.join('\n\n'), '}'].join('\n');
}

export function abiTypeOf(d: TypeDescriptor, recordName?: string): AbiType {
  switch (d.kind) {
    case 'primitive':
      return { kind: 'scalar', primitive: d.primitive };
    case 'unit':
      return { kind: 'void' };
    case 'opaquePointer':
      return { kind: 'pointer' };
    case 'duplicableContainer':
      return { kind: 'container', container: d.container };
    case 'errorShape':
    case 'optionalShape':
      return recordName ? { kind: 'record', name: recordName } : { kind: 'opaque', text: d.kind };
    case 'unsupported':
      return { kind: 'opaque', text: d.reason };
  }
}
