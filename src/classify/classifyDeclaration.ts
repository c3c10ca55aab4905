import type {
  SourceFunction,
  SourceImpl,
  SourceItem,
  SourceParam,
  SourceStruct,
} from '../parser/parserTypes.js';
import { classifyType } from '../oracle/classifyType.js';
import { diagnostic, type Diagnostic } from '../diagnostics/diagnostics.js';
import { trace } from '../dx/trace.js';
import type {
  Classified,
  DataRecordDecl,
  Decl,
  FunctionDecl,
  Method,
  MethodCollectionDecl,
  MethodText,
  Param,
} from './declTypes.js';
import { classifyMethod } from './classifyMethod.js';
import { freeName } from './paramNames.js';
import { resolveReturn, type CallableRole } from './returnRules.js';

export type ClassifyContext = {
  /** Attribute name, used in diagnostic messages. */
  marker: string;
};

function fail(d: Diagnostic): Classified<never> {
  trace('classify.rejected', { code: d.code, item: d.item, line: d.line });
  return { ok: false, diagnostic: d };
}

function toParams(params: SourceParam[]): Param[] {
  const taken = new Set(params.flatMap((p) => (p.name ? [p.name] : [])));
  return params.map((p, i) => {
    if (p.name) return { name: p.name, pattern: p.pattern, type: p.type };
    const name = freeName(`arg${i}`, taken);
    taken.add(name);
    return { name, pattern: p.pattern, type: p.type };
  });
}

/** Parameters must be primitives, unit or raw pointers. */
function checkParams(fn: SourceFunction, ctx: ClassifyContext, label: string): Diagnostic | null {
  for (const p of fn.params) {
    const d = classifyType(p.type, 'param');
    if (d.kind === 'unsupported') {
      return diagnostic(
        'TYPE_ERROR',
        `#[${ctx.marker}] on \`${label}\`: parameter \`${p.pattern}\`: ${d.reason}`,
        label,
        fn.line,
      );
    }
  }
  return null;
}

function checkCallable(
  fn: SourceFunction,
  role: CallableRole,
  owner: string | null,
  ctx: ClassifyContext,
  label: string,
): Diagnostic | null {
  if (fn.isUnsafe) {
    return diagnostic(
      'SAFETY_ERROR',
      `#[${ctx.marker}] cannot be applied to unsafe function \`${label}\` directly: ` +
        `exporting it as extern "C" would hide its safety obligation from callers`,
      label,
      fn.line,
    );
  }
  if (fn.isAsync) {
    return diagnostic(
      'SAFETY_ERROR',
      `#[${ctx.marker}] cannot be applied to async function \`${label}\`: ` +
        `an extern "C" wrapper would return without awaiting its body`,
      label,
      fn.line,
    );
  }
  if (fn.abi !== null && fn.abi !== 'C') {
    return diagnostic(
      'TYPE_ERROR',
      `#[${ctx.marker}] on \`${label}\`: declared ABI \`extern "${fn.abi}"\` conflicts with the generated extern "C" wrapper`,
      label,
      fn.line,
    );
  }
  if (fn.isGeneric) {
    return diagnostic(
      'TYPE_ERROR',
      `#[${ctx.marker}] on \`${label}\`: generic functions cannot be exported across the C ABI`,
      label,
      fn.line,
    );
  }
  if (fn.receiver === 'owned') {
    return diagnostic(
      'TYPE_ERROR',
      `#[${ctx.marker}] on \`${label}\`: consuming \`self\` receivers cannot be exported; take \`&self\` or \`&mut self\``,
      label,
      fn.line,
    );
  }

  const paramError = checkParams(fn, ctx, label);
  if (paramError) return paramError;

  const ret = resolveReturn(role, fn.returnType, owner);
  if (!ret.ok) {
    return diagnostic('TYPE_ERROR', `#[${ctx.marker}] on \`${label}\`: ${ret.reason}`, label, fn.line);
  }
  return null;
}

function classifyFunction(fn: SourceFunction, ctx: ClassifyContext): Classified<FunctionDecl> {
  const error = checkCallable(fn, 'freeFunction', null, ctx, fn.name);
  if (error) return fail(error);

  return {
    ok: true,
    value: {
      kind: 'function',
      name: fn.name,
      visibility: fn.visibility,
      params: toParams(fn.params),
      returnType: fn.returnType,
      body: fn.body,
      attributes: fn.attributes,
      docs: fn.docs,
      line: fn.line,
    },
  };
}

function classifyStruct(s: SourceStruct, ctx: ClassifyContext): Classified<DataRecordDecl> {
  if (s.isGeneric) {
    return fail(
      diagnostic(
        'TYPE_ERROR',
        `#[${ctx.marker}] on \`${s.name}\`: generic structs have no single C layout`,
        s.name,
        s.line,
      ),
    );
  }

  // Field types are not checked here: unsupported fields just get no accessors.
  return {
    ok: true,
    value: {
      kind: 'dataRecord',
      name: s.name,
      shape: s.shape,
      fields: s.fields.map((f) => ({ name: f.name, visibility: f.visibility, type: f.type })),
      attributes: s.attributes,
      docs: s.docs,
      line: s.line,
    },
  };
}

function ownerName(impl: SourceImpl): string | null {
  const t = impl.selfType;
  if (t.kind !== 'path' || t.args.length || impl.isGeneric) return null;
  return t.segments[t.segments.length - 1] ?? null;
}

function classifyImpl(impl: SourceImpl, ctx: ClassifyContext): Classified<MethodCollectionDecl> {
  if (impl.traitName) {
    return fail(
      diagnostic(
        'STRUCTURAL_ERROR',
        `#[${ctx.marker}] cannot export trait implementation \`${impl.traitName} for ${impl.selfType.text}\`; ` +
          `annotate an inherent impl block instead`,
        impl.selfType.text,
        impl.line,
      ),
    );
  }

  const owner = ownerName(impl);
  if (!owner) {
    return fail(
      diagnostic(
        'OWNER_PATH_ERROR',
        `#[${ctx.marker}] on impl block requires a simple type path, found \`${impl.selfType.text}\``,
        impl.selfType.text,
        impl.line,
      ),
    );
  }

  const fns = impl.members.flatMap((m) => (m.kind === 'method' ? [m.fn] : []));
  const items = impl.members.flatMap((m) => (m.kind === 'item' ? [m.text] : []));
  // Without any marked method, the whole impl block is exported.
  const anyMarked = fns.some((f) => f.marked);

  const methods: Method[] = [];
  const retained: MethodText[] = [];
  const members: MethodText[] = [];

  for (const fn of fns) {
    const text: MethodText = {
      name: fn.name,
      text: fn.text,
      attributes: fn.attributes,
      docs: fn.docs,
    };
    members.push(text);
    if (anyMarked && !fn.marked) {
      retained.push(text);
      continue;
    }

    const label = `${owner}::${fn.name}`;
    // `owned` receivers are rejected by checkCallable before the role matters.
    const receiver = fn.receiver === 'owned' ? 'none' : fn.receiver;
    const role = classifyMethod({ name: fn.name, receiver, returnType: fn.returnType }, owner);
    const error = checkCallable(fn, role, owner, ctx, label);
    if (error) return fail(error);

    methods.push({
      ...text,
      receiver,
      params: toParams(fn.params),
      returnType: fn.returnType,
      line: fn.line,
    });
  }

  return {
    ok: true,
    value: {
      kind: 'methodCollection',
      owner,
      methods,
      retained,
      members,
      items,
      attributes: impl.attributes,
      docs: impl.docs,
      line: impl.line,
    },
  };
}

/**
 * Maps a marked source item onto one of the three exportable declaration
 * shapes, or explains why it cannot be exported.
 */
export function classifyDeclaration(item: SourceItem, ctx: ClassifyContext): Classified<Decl> {
  switch (item.kind) {
    case 'function':
      return classifyFunction(item, ctx);
    case 'struct':
      return classifyStruct(item, ctx);
    case 'impl':
      return classifyImpl(item, ctx);
    case 'other':
      return fail(
        diagnostic(
          'STRUCTURAL_ERROR',
          `#[${ctx.marker}] applies only to functions, data records, or method collections ` +
            `(found \`${item.nodeType}\`)`,
          item.name,
          item.line,
        ),
      );
  }
}
