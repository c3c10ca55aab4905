import type { DataRecordDecl, Field } from '../classify/declTypes.js';
import { classifyType, isAccessible } from '../oracle/classifyType.js';
import { attributePath } from '../parser/parseRust.js';
import { warn } from '../dx/warnings.js';
import type { Emission, EmittedItem } from './emitTypes.js';
import { abiTypeOf, leadingLines, renderExternFn, renderType } from './rustText.js';

export const PYCLASS_ATTRIBUTE = 'pyo3::pyclass(get_all, set_all)';

export function freeSymbol(name: string): string {
  return `${name}_free`;
}

function renderField(f: Field): string {
  return `${f.visibility ? `${f.visibility} ` : ''}${f.name}: ${f.type.text}`;
}

function renderStruct(decl: DataRecordDecl, attributes: string[]): string {
  const head = [...leadingLines(decl.docs, ['#[repr(C)]', ...attributes])];
  switch (decl.shape) {
    case 'named':
      return [
        ...head,
        `pub struct ${decl.name} {`,
        ...decl.fields.map((f) => `    ${renderField(f)},`),
        '}',
      ].join('\n');
    case 'tuple': {
      const fields = decl.fields.map((f) => `${f.visibility ? `${f.visibility} ` : ''}${f.type.text}`);
      return [...head, `pub struct ${decl.name}(${fields.join(', ')});`].join('\n');
    }
    case 'unit':
      return [...head, `pub struct ${decl.name};`].join('\n');
  }
}

/** Drops existing `repr` attributes; the record layout is always `repr(C)`. */
function layoutAttributes(decl: DataRecordDecl): string[] {
  const kept: string[] = [];
  for (const a of decl.attributes) {
    if (attributePath(a) !== 'repr') {
      kept.push(a);
      continue;
    }
    if (a.replace(/\s+/g, '') !== '#[repr(C)]') {
      warn({
        code: 'LAYOUT_OVERRIDDEN',
        message: `${decl.name}: \`${a}\` replaced by #[repr(C)]`,
        hint: 'exported records always use declaration-order C layout',
      });
    }
  }
  return kept;
}

function accessors(decl: DataRecordDecl, field: Field): EmittedItem[] {
  const d = classifyType(field.type, 'field');
  if (!isAccessible(d)) {
    warn({
      code: 'UNSUPPORTED_FIELD_SKIPPED',
      message: `${decl.name}.${field.name}: no accessors generated (${d.kind === 'unsupported' ? d.reason : d.kind})`,
    });
    return [];
  }

  const type = renderType(field.type, decl.name);
  const getter = `${decl.name}_get_${field.name}`;
  const setter = `${decl.name}_set_${field.name}`;
  const read = d.kind === 'duplicableContainer' ? `(*ptr).${field.name}.clone()` : `(*ptr).${field.name}`;

  return [
    {
      gate: 'c-abi',
      symbol: getter,
      source: renderExternFn({
        name: getter,
        params: [`ptr: *const ${decl.name}`],
        returns: type,
        body: [`unsafe { ${read} }`],
      }),
      signature: { params: [{ name: 'ptr', type: { kind: 'pointer' } }], returns: abiTypeOf(d) },
    },
    {
      gate: 'c-abi',
      symbol: setter,
      source: renderExternFn({
        name: setter,
        params: [`ptr: *mut ${decl.name}`, `value: ${type}`],
        returns: null,
        body: [`unsafe { (*ptr).${field.name} = value; }`],
      }),
      signature: {
        params: [
          { name: 'ptr', type: { kind: 'pointer' } },
          { name: 'value', type: abiTypeOf(d) },
        ],
        returns: { kind: 'void' },
      },
    },
  ];
}

export function emitRecord(decl: DataRecordDecl): Emission {
  const free = freeSymbol(decl.name);

  const record: EmittedItem = {
    gate: 'always',
    source: renderStruct(decl, layoutAttributes(decl)),
    hostAttributes: [PYCLASS_ATTRIBUTE],
    hostRegistration: { kind: 'class', name: decl.name },
    layout: {
      name: decl.name,
      fields: decl.fields.map((f) => ({ name: f.name, type: abiTypeOf(classifyType(f.type, 'field')) })),
    },
  };

  const dealloc: EmittedItem = {
    gate: 'always',
    symbol: free,
    source: renderExternFn({
      name: free,
      params: [`ptr: *mut ${decl.name}`],
      returns: null,
      body: ['if !ptr.is_null() {', '    unsafe { drop(Box::from_raw(ptr)); }', '}'],
    }),
    signature: { params: [{ name: 'ptr', type: { kind: 'pointer' } }], returns: { kind: 'void' } },
  };

  const fieldItems = decl.fields.flatMap((f) => accessors(decl, f));

  return {
    declaration: decl.name,
    symbols: [decl.name, free, ...fieldItems.flatMap((i) => (i.symbol ? [i.symbol] : []))],
    items: [record, dealloc, ...fieldItems],
  };
}
