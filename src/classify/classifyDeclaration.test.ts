import { describe, it, expect } from 'vitest';

import type { SourceImpl, SourceStruct } from '../parser/parserTypes.js';
import { fn, param, path, ptr, ref } from '../testing/fixtures.js';
import { classifyDeclaration } from './classifyDeclaration.js';

const ctx = { marker: 'abi_export' };

function impl(selfType = path('Counter'), extra: Partial<SourceImpl> = {}): SourceImpl {
  return {
    kind: 'impl',
    selfType,
    traitName: null,
    isGeneric: false,
    members: [],
    attributes: [],
    docs: [],
    line: 10,
    ...extra,
  };
}

describe('declaration classifier', () => {
  it('classifies functions', () => {
    const r = classifyDeclaration(
      fn('add', [param('a', path('i32')), param('b', path('i32'))], path('i32'), '{ a + b }'),
      ctx,
    );
    expect(r.ok && r.value.kind).toBe('function');
    if (r.ok && r.value.kind === 'function') {
      expect(r.value.params.map((p) => p.name)).toEqual(['a', 'b']);
    }
  });

  it('names non-identifier parameters by position', () => {
    const f = fn('ignore', [{ pattern: '_', name: null, type: path('i32') }], null, '{}');
    const r = classifyDeclaration(f, ctx);
    expect(r.ok && r.value.kind === 'function' && r.value.params[0]).toEqual({
      name: 'arg0',
      pattern: '_',
      type: path('i32'),
    });
  });

  it('classifies records without checking field types', () => {
    const s: SourceStruct = {
      kind: 'struct',
      name: 'Holder',
      visibility: null,
      isGeneric: false,
      shape: 'named',
      fields: [{ name: 'name', visibility: 'pub', type: ref(false, path('str')) }],
      attributes: [],
      docs: [],
      line: 1,
    };
    const r = classifyDeclaration(s, ctx);
    expect(r.ok && r.value.kind).toBe('dataRecord');
  });

  it('rejects other item kinds with a structural error', () => {
    const r = classifyDeclaration(
      { kind: 'other', nodeType: 'enum_item', name: 'Shape', text: 'enum Shape {}', attributes: [], docs: [], line: 4 },
      ctx,
    );
    expect(r).toEqual({
      ok: false,
      diagnostic: {
        code: 'STRUCTURAL_ERROR',
        message:
          '#[abi_export] applies only to functions, data records, or method collections (found `enum_item`)',
        item: 'Shape',
        line: 4,
      },
    });
  });

  it('rejects unsafe functions', () => {
    const r = classifyDeclaration(fn('poke', [param('p', ptr(true, path('u8')))], null, '{}', { isUnsafe: true }), ctx);
    expect(!r.ok && r.diagnostic.code).toBe('SAFETY_ERROR');
  });

  it('rejects async functions', () => {
    const r = classifyDeclaration(fn('fetch', [], path('i32'), '{ 1 }', { isAsync: true, line: 4 }), ctx);
    expect(r).toEqual({
      ok: false,
      diagnostic: {
        code: 'SAFETY_ERROR',
        message:
          '#[abi_export] cannot be applied to async function `fetch`: ' +
          'an extern "C" wrapper would return without awaiting its body',
        item: 'fetch',
        line: 4,
      },
    });
  });

  it('rejects functions declared with another ABI', () => {
    const r = classifyDeclaration(fn('callback', [], path('i32'), '{ 2 }', { abi: 'system' }), ctx);
    expect(!r.ok && r.diagnostic).toMatchObject({
      code: 'TYPE_ERROR',
      message: '#[abi_export] on `callback`: declared ABI `extern "system"` conflicts with the generated extern "C" wrapper',
    });
  });

  it('accepts functions already declared extern "C"', () => {
    const r = classifyDeclaration(fn('plain', [], path('i32'), '{ 3 }', { abi: 'C' }), ctx);
    expect(r.ok).toBe(true);
  });

  it('keeps positional names clear of named parameters', () => {
    const f = fn('pick', [{ pattern: '_', name: null, type: path('i32') }, param('arg0', path('i32'))], path('i32'), '{ arg0 }');
    const r = classifyDeclaration(f, ctx);
    expect(r.ok && r.value.kind === 'function' && r.value.params.map((p) => p.name)).toEqual(['arg0_', 'arg0']);
  });

  it('rejects async methods', () => {
    const r = classifyDeclaration(
      impl(path('Counter'), {
        members: [{ kind: 'method', fn: fn('load', [], null, '{}', { receiver: 'exclusive', isAsync: true }) }],
      }),
      ctx,
    );
    expect(!r.ok && r.diagnostic).toMatchObject({ code: 'SAFETY_ERROR', item: 'Counter::load' });
  });

  it('rejects non-primitive payloads in a Result return', () => {
    const r = classifyDeclaration(
      fn('bad_result', [param('a', path('i32'))], path('Result', path('String'), path('i32')), '{ Err(-1) }'),
      ctx,
    );
    expect(r).toMatchObject({
      ok: false,
      diagnostic: {
        code: 'TYPE_ERROR',
        message:
          '#[abi_export] on `bad_result`: Result payload `String` is not FFI-compatible; only primitive or unit payloads are allowed',
      },
    });
  });

  it('rejects unsupported parameters', () => {
    const r = classifyDeclaration(fn('greet', [param('name', ref(false, path('str')))], null, '{}'), ctx);
    expect(!r.ok && r.diagnostic.message).toBe(
      '#[abi_export] on `greet`: parameter `name`: reference `&str` cannot cross the C boundary; use a raw pointer',
    );
  });

  it('rejects generic functions', () => {
    const r = classifyDeclaration(fn('id', [], path('i32'), '{ 0 }', { isGeneric: true }), ctx);
    expect(!r.ok && r.diagnostic.code).toBe('TYPE_ERROR');
  });

  it('exports every method when none is marked', () => {
    const r = classifyDeclaration(
      impl(path('Counter'), {
        members: [
          { kind: 'method', fn: fn('new', [param('initial', path('i32'))], path('Self'), '{ Self { value: initial } }') },
          { kind: 'method', fn: fn('get', [], path('i32'), '{ self.value }', { receiver: 'shared' }) },
          { kind: 'item', text: 'const STEP: i32 = 1;' },
        ],
      }),
      ctx,
    );
    expect(r.ok && r.value.kind === 'methodCollection' && r.value.methods.map((m) => m.name)).toEqual([
      'new',
      'get',
    ]);
    expect(r.ok && r.value.kind === 'methodCollection' && r.value.items).toEqual(['const STEP: i32 = 1;']);
  });

  it('exports only marked methods when some are marked', () => {
    const r = classifyDeclaration(
      impl(path('Counter'), {
        members: [
          { kind: 'method', fn: fn('new', [], path('Self'), '{ Self { value: 0 } }', { marked: true }) },
          { kind: 'method', fn: fn('helper', [param('s', ref(false, path('str')))], null, '{}') },
        ],
      }),
      ctx,
    );
    expect(r.ok).toBe(true);
    if (r.ok && r.value.kind === 'methodCollection') {
      expect(r.value.methods.map((m) => m.name)).toEqual(['new']);
      expect(r.value.retained.map((m) => m.name)).toEqual(['helper']);
    }
  });

  it('rejects impl blocks whose owner is not a simple path', () => {
    const r = classifyDeclaration(impl(ref(false, path('Counter'))), ctx);
    expect(r).toMatchObject({
      ok: false,
      diagnostic: {
        code: 'OWNER_PATH_ERROR',
        message: '#[abi_export] on impl block requires a simple type path, found `&Counter`',
      },
    });
  });

  it('rejects trait implementations', () => {
    const r = classifyDeclaration(impl(path('Counter'), { traitName: 'Default' }), ctx);
    expect(!r.ok && r.diagnostic.code).toBe('STRUCTURAL_ERROR');
  });

  it('rejects consuming receivers', () => {
    const r = classifyDeclaration(
      impl(path('Counter'), {
        members: [{ kind: 'method', fn: fn('into_inner', [], path('i32'), '{ self.value }', { receiver: 'owned' }) }],
      }),
      ctx,
    );
    expect(!r.ok && r.diagnostic.item).toBe('Counter::into_inner');
  });

  it('rejects constructors returning something other than the owner', () => {
    const r = classifyDeclaration(
      impl(path('Counter'), { members: [{ kind: 'method', fn: fn('new', [], path('i32'), '{ 0 }') }] }),
      ctx,
    );
    expect(!r.ok && r.diagnostic.message).toBe(
      '#[abi_export] on `Counter::new`: constructors must return the owner type, found `i32`',
    );
  });

  it('rejects unsafe methods', () => {
    const r = classifyDeclaration(
      impl(path('Counter'), {
        members: [{ kind: 'method', fn: fn('raw', [], path('i32'), '{ 0 }', { receiver: 'shared', isUnsafe: true }) }],
      }),
      ctx,
    );
    expect(!r.ok && r.diagnostic.code).toBe('SAFETY_ERROR');
  });
});
