import type { FunctionDecl } from '../classify/declTypes.js';
import { resolveReturn } from '../classify/returnRules.js';
import { classifyType } from '../oracle/classifyType.js';
import type { AbiSignature, Emission, EmittedItem } from './emitTypes.js';
import {
  abiTypeOf,
  errorRecordMatch,
  leadingLines,
  optionalRecordMatch,
  originalParams,
  renderExternFn,
  renderReprC,
  renderType,
  returnSuffix,
  shapeArgs,
  wrapperParams,
} from './rustText.js';

export function errorRecordName(base: string): string {
  return `CResult_${base}`;
}

export function optionalRecordName(base: string): string {
  return `COption_${base}`;
}

function paramSignature(decl: FunctionDecl): AbiSignature['params'] {
  return decl.params.map((p) => ({ name: p.name, type: abiTypeOf(classifyType(p.type, 'param')) }));
}

/** `#[pyo3::pyfunction]` twin: same signature and body, Result/Option returned natively. */
function hostFunction(decl: FunctionDecl): EmittedItem {
  return {
    gate: 'host',
    source: [
      ...leadingLines(decl.docs, decl.attributes),
      '#[pyo3::pyfunction]',
      `pub fn ${decl.name}(${originalParams(decl.params)})${returnSuffix(decl.returnType)} ${decl.body}`,
    ].join('\n'),
    hostRegistration: { kind: 'function', name: decl.name },
  };
}

export function emitFunction(decl: FunctionDecl): Emission {
  const ret = resolveReturn('freeFunction', decl.returnType, null);
  if (!ret.ok) throw new Error(`emitFunction: unclassified declaration \`${decl.name}\`: ${ret.reason}`);

  const host = hostFunction(decl);

  if (ret.strategy === 'passThrough') {
    const source = [
      ...leadingLines(decl.docs, decl.attributes),
      '#[no_mangle]',
      `pub extern "C" fn ${decl.name}(${originalParams(decl.params)})${returnSuffix(decl.returnType)} ${decl.body}`,
    ].join('\n');
    return {
      declaration: decl.name,
      symbols: [decl.name],
      items: [
        {
          gate: 'c-abi',
          source,
          symbol: decl.name,
          signature: { params: paramSignature(decl), returns: abiTypeOf(ret.descriptor) },
        },
        host,
      ],
    };
  }

  // Result / Option: the original body moves into a hidden inner function
  // and the export reshapes its value into a fully initialised record.
  const isError = ret.strategy === 'errorRecord';
  const record = isError ? errorRecordName(decl.name) : optionalRecordName(decl.name);
  const inner = `${decl.name}_inner`;
  const args = shapeArgs(decl.returnType).map((t) => renderType(t));
  const fields: [string, string][] = isError
    ? [
        ['is_ok', 'u8'],
        ['ok_value', args[0]],
        ['err_value', args[1]],
      ]
    : [
        ['is_some', 'u8'],
        ['value', args[0]],
      ];

  const payloads =
    ret.descriptor.kind === 'errorShape'
      ? [ret.descriptor.ok, ret.descriptor.err]
      : ret.descriptor.kind === 'optionalShape'
        ? [ret.descriptor.inner]
        : [];

  const recordItem: EmittedItem = {
    gate: 'c-abi',
    source: renderReprC(record, fields),
    layout: {
      name: record,
      fields: fields.map(([name], i) => ({
        name,
        type: i === 0 ? { kind: 'scalar', primitive: 'u8' } : abiTypeOf(payloads[i - 1]),
      })),
    },
  };

  const innerItem: EmittedItem = {
    gate: 'c-abi',
    source: [
      ...decl.attributes,
      `fn ${inner}(${originalParams(decl.params)})${returnSuffix(decl.returnType)} ${decl.body}`,
    ].join('\n'),
  };

  const call = `${inner}(${decl.params.map((p) => p.name).join(', ')})`;
  const wrapper: EmittedItem = {
    gate: 'c-abi',
    source: [
      ...decl.docs,
      renderExternFn({
        name: decl.name,
        params: wrapperParams(decl.params),
        returns: record,
        body: isError ? errorRecordMatch(record, call) : optionalRecordMatch(record, call),
      }),
    ].join('\n'),
    symbol: decl.name,
    signature: { params: paramSignature(decl), returns: abiTypeOf(ret.descriptor, record) },
  };

  return {
    declaration: decl.name,
    symbols: [decl.name, record, inner],
    items: [recordItem, innerItem, wrapper, host],
  };
}
