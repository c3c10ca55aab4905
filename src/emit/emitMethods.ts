import type { Method, MethodCollectionDecl, MethodText } from '../classify/declTypes.js';
import { classifyMethod } from '../classify/classifyMethod.js';
import { freeName } from '../classify/paramNames.js';
import { resolveReturn } from '../classify/returnRules.js';
import { classifyType } from '../oracle/classifyType.js';
import type { AbiSignature, Emission, EmittedItem } from './emitTypes.js';
import { errorRecordName, optionalRecordName } from './emitFunction.js';
import {
  abiTypeOf,
  errorRecordMatch,
  optionalRecordMatch,
  renderExternFn,
  renderImpl,
  renderMember,
  renderReprC,
  renderType,
  shapeArgs,
  wrapperParams,
} from './rustText.js';

export const PYMETHODS_ATTRIBUTE = '#[pyo3::pymethods]';

function member(m: MethodText, extra: string[] = []): string {
  return renderMember([...m.docs, ...m.attributes, ...extra], m.text);
}

/** The protocol's constructor hook: a receiver-less method literally named `new`. */
function isHostConstructor(m: Method): boolean {
  return m.receiver === 'none' && m.name === 'new';
}

function methodWrapper(owner: string, m: Method): { items: EmittedItem[]; symbols: string[]; boxes: boolean } {
  const role = classifyMethod(m, owner);
  const ret = resolveReturn(role, m.returnType, owner);
  if (!ret.ok) throw new Error(`emitMethods: unclassified method \`${owner}::${m.name}\`: ${ret.reason}`);

  const name = `${owner}_${m.name}`;
  const params = wrapperParams(m.params, owner);
  const prelude: string[] = [];
  const abiParams: AbiSignature['params'] = [];

  // Receiver bindings must not shadow or repeat a parameter of the method.
  const taken = new Set(m.params.map((p) => p.name));
  const ptr = freeName('ptr', taken);
  const selfRef = freeName('self_ref', new Set([...taken, ptr]));

  if (m.receiver === 'shared') {
    params.unshift(`${ptr}: *const ${owner}`);
    prelude.push(`let ${selfRef} = unsafe { &*${ptr} };`);
  } else if (m.receiver === 'exclusive') {
    params.unshift(`${ptr}: *mut ${owner}`);
    prelude.push(`let ${selfRef} = unsafe { &mut *${ptr} };`);
  }
  if (m.receiver !== 'none') abiParams.push({ name: ptr, type: { kind: 'pointer' } });
  for (const p of m.params) {
    abiParams.push({ name: p.name, type: abiTypeOf(classifyType(p.type, 'param')) });
  }

  const args = m.params.map((p) => p.name).join(', ');
  const call = m.receiver === 'none' ? `${owner}::${m.name}(${args})` : `${selfRef}.${m.name}(${args})`;

  switch (ret.strategy) {
    case 'heapBox':
      return {
        boxes: true,
        symbols: [name],
        items: [
          {
            gate: 'c-abi',
            symbol: name,
            source: renderExternFn({
              name,
              params,
              returns: `*mut ${owner}`,
              body: [...prelude, `let obj = ${call};`, 'Box::into_raw(Box::new(obj))'],
            }),
            signature: { params: abiParams, returns: { kind: 'pointer' } },
          },
        ],
      };
    case 'discard':
      return {
        boxes: false,
        symbols: [name],
        items: [
          {
            gate: 'c-abi',
            symbol: name,
            source: renderExternFn({ name, params, returns: null, body: [...prelude, `${call};`] }),
            signature: { params: abiParams, returns: { kind: 'void' } },
          },
        ],
      };
    case 'passThrough':
      return {
        boxes: false,
        symbols: [name],
        items: [
          {
            gate: 'c-abi',
            symbol: name,
            source: renderExternFn({
              name,
              params,
              // passThrough always has a declared, non-unit return type.
              returns: m.returnType ? renderType(m.returnType, owner) : null,
              body: [...prelude, call],
            }),
            signature: { params: abiParams, returns: abiTypeOf(ret.descriptor) },
          },
        ],
      };
    case 'errorRecord':
    case 'optionalRecord': {
      const isError = ret.strategy === 'errorRecord';
      const record = isError ? errorRecordName(name) : optionalRecordName(name);
      const shape = shapeArgs(m.returnType).map((t) => renderType(t, owner));
      const fields: [string, string][] = isError
        ? [
            ['is_ok', 'u8'],
            ['ok_value', shape[0]],
            ['err_value', shape[1]],
          ]
        : [
            ['is_some', 'u8'],
            ['value', shape[0]],
          ];
      const d = ret.descriptor;
      const payloads = d.kind === 'errorShape' ? [d.ok, d.err] : d.kind === 'optionalShape' ? [d.inner] : [];
      const match = isError ? errorRecordMatch(record, call) : optionalRecordMatch(record, call);

      return {
        boxes: false,
        symbols: [name, record],
        items: [
          {
            gate: 'c-abi',
            source: renderReprC(record, fields),
            layout: {
              name: record,
              fields: fields.map(([n], i) => ({
                name: n,
                type: i === 0 ? { kind: 'scalar', primitive: 'u8' } : abiTypeOf(payloads[i - 1]),
              })),
            },
          },
          {
            gate: 'c-abi',
            symbol: name,
            source: renderExternFn({ name, params, returns: record, body: [...prelude, ...match] }),
            signature: { params: abiParams, returns: abiTypeOf(d, record) },
          },
        ],
      };
    }
  }
}

export function emitMethods(decl: MethodCollectionDecl): Emission {
  const { owner } = decl;
  const header = [...decl.docs, ...decl.attributes];
  const items: EmittedItem[] = [];

  if (decl.items.length) {
    items.push({
      gate: 'always',
      source: renderImpl(decl.attributes, owner, decl.items.map((t) => renderMember([], t))),
    });
  }

  items.push({
    gate: 'c-abi',
    source: renderImpl(header, owner, decl.members.map((m) => member(m))),
  });

  if (decl.methods.length) {
    items.push({
      gate: 'host',
      source: renderImpl(
        [...header, PYMETHODS_ATTRIBUTE],
        owner,
        decl.methods.map((m) => member(m, isHostConstructor(m) ? ['#[new]'] : [])),
      ),
    });
  }
  if (decl.retained.length) {
    items.push({
      gate: 'host',
      source: renderImpl(decl.attributes, owner, decl.retained.map((m) => member(m))),
    });
  }

  const symbols: string[] = [];
  let boxes = false;
  for (const m of decl.methods) {
    const w = methodWrapper(owner, m);
    items.push(...w.items);
    symbols.push(...w.symbols);
    boxes ||= w.boxes;
  }

  return {
    declaration: owner,
    items,
    symbols,
    ...(boxes ? { boxedOwner: owner } : {}),
  };
}
