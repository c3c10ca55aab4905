import { describe, it, expect } from 'vitest';

import type { SourceFunction, SourceImpl, SourceImplMember, SourceParam, TypeExpr } from '../parser/parserTypes.js';
import { fn, mustEmit, param, path, ptr, sources } from '../testing/fixtures.js';

function method(
  name: string,
  receiver: SourceFunction['receiver'],
  params: SourceParam[],
  returnType: TypeExpr | null,
  text: string,
  extra: Partial<SourceFunction> = {},
): SourceImplMember {
  return { kind: 'method', fn: fn(name, params, returnType, '{}', { receiver, text, ...extra }) };
}

function impl(owner: string, members: SourceImplMember[], extra: Partial<SourceImpl> = {}): SourceImpl {
  return {
    kind: 'impl',
    selfType: path(owner),
    traitName: null,
    isGeneric: false,
    members,
    attributes: [],
    docs: [],
    line: 1,
    ...extra,
  };
}

const NEW_TEXT = 'pub fn new(start: i32) -> Self { Counter { value: start } }';
const INCREMENT_TEXT = 'pub fn increment(&mut self) { self.value += 1; }';
const GET_TEXT = 'pub fn get_value(&self) -> i32 { self.value }';

const counter = impl('Counter', [
  method('new', 'none', [param('start', path('i32'))], path('Self'), NEW_TEXT),
  method('increment', 'exclusive', [], null, INCREMENT_TEXT),
  method('get_value', 'shared', [], path('i32'), GET_TEXT),
]);

describe('method collections', () => {
  it('boxes constructor results and hands out owner pointers', () => {
    const e = mustEmit(counter);

    expect(e.symbols).toEqual(['Counter_new', 'Counter_increment', 'Counter_get_value']);
    expect(e.boxedOwner).toBe('Counter');
    expect(sources(e, 'c-abi')[1]).toBe(
      [
        '#[no_mangle]',
        'pub extern "C" fn Counter_new(start: i32) -> *mut Counter {',
        '    let obj = Counter::new(start);',
        '    Box::into_raw(Box::new(obj))',
        '}',
      ].join('\n'),
    );
  });

  it('borrows the receiver through the pointer with matching mutability', () => {
    const c = sources(mustEmit(counter), 'c-abi');

    expect(c[2]).toBe(
      [
        '#[no_mangle]',
        'pub extern "C" fn Counter_increment(ptr: *mut Counter) {',
        '    let self_ref = unsafe { &mut *ptr };',
        '    self_ref.increment();',
        '}',
      ].join('\n'),
    );
    expect(c[3]).toBe(
      [
        '#[no_mangle]',
        'pub extern "C" fn Counter_get_value(ptr: *const Counter) -> i32 {',
        '    let self_ref = unsafe { &*ptr };',
        '    self_ref.get_value()',
        '}',
      ].join('\n'),
    );
  });

  it('re-emits the impl block on the C path and a pymethods block on the host path', () => {
    const e = mustEmit(counter);

    expect(sources(e, 'c-abi')[0]).toBe(
      `impl Counter {\n    ${NEW_TEXT}\n\n    ${INCREMENT_TEXT}\n\n    ${GET_TEXT}\n}`,
    );
    expect(sources(e, 'host')).toEqual([
      `#[pyo3::pymethods]\nimpl Counter {\n    #[new]\n    ${NEW_TEXT}\n\n    ${INCREMENT_TEXT}\n\n    ${GET_TEXT}\n}`,
    ]);
  });

  it('does not box pass-through returns of builder-style methods', () => {
    const e = mustEmit(
      impl('Builder', [
        method('set_x', 'exclusive', [param('x', path('i32'))], path('i32'), 'fn set_x(&mut self, x: i32) -> i32 { x }'),
      ]),
    );

    expect(e.boxedOwner).toBeUndefined();
    expect(sources(e, 'c-abi')[1]).toBe(
      [
        '#[no_mangle]',
        'pub extern "C" fn Builder_set_x(ptr: *mut Builder, x: i32) -> i32 {',
        '    let self_ref = unsafe { &mut *ptr };',
        '    self_ref.set_x(x)',
        '}',
      ].join('\n'),
    );
    expect(e.items[2].signature).toEqual({
      params: [
        { name: 'ptr', type: { kind: 'pointer' } },
        { name: 'x', type: { kind: 'scalar', primitive: 'i32' } },
      ],
      returns: { kind: 'scalar', primitive: 'i32' },
    });
  });

  it('boxes instance methods that return the owner', () => {
    const e = mustEmit(
      impl('Builder', [
        method('with_x', 'shared', [param('x', path('i32'))], path('Self'), 'fn with_x(&self, x: i32) -> Self { Builder { x } }'),
      ]),
    );

    expect(e.boxedOwner).toBe('Builder');
    expect(sources(e, 'c-abi')[1]).toBe(
      [
        '#[no_mangle]',
        'pub extern "C" fn Builder_with_x(ptr: *const Builder, x: i32) -> *mut Builder {',
        '    let self_ref = unsafe { &*ptr };',
        '    let obj = self_ref.with_x(x);',
        '    Box::into_raw(Box::new(obj))',
        '}',
      ].join('\n'),
    );
  });

  it('calls static functions through the owner path', () => {
    const e = mustEmit(impl('Counter', [method('zero', 'none', [], path('i32'), 'fn zero() -> i32 { 0 }')]));
    expect(sources(e, 'c-abi')[1]).toBe('#[no_mangle]\npub extern "C" fn Counter_zero() -> i32 {\n    Counter::zero()\n}');
    // `#[new]` only goes on a receiver-less `new`.
    expect(sources(e, 'host')).toEqual(['#[pyo3::pymethods]\nimpl Counter {\n    fn zero() -> i32 { 0 }\n}']);
  });

  it('reshapes Result-returning methods into a per-method record', () => {
    const e = mustEmit(
      impl('Counter', [
        method(
          'checked_div',
          'shared',
          [param('d', path('i32'))],
          path('Result', path('i32'), path('u8')),
          'fn checked_div(&self, d: i32) -> Result<i32, u8> { Ok(0) }',
        ),
      ]),
    );

    expect(e.symbols).toEqual(['Counter_checked_div', 'CResult_Counter_checked_div']);
    const c = sources(e, 'c-abi');
    expect(c[1]).toBe(
      '#[repr(C)]\npub struct CResult_Counter_checked_div {\n    pub is_ok: u8,\n    pub ok_value: i32,\n    pub err_value: u8,\n}',
    );
    expect(c[2].split('\n').slice(0, 4)).toEqual([
      '#[no_mangle]',
      'pub extern "C" fn Counter_checked_div(ptr: *const Counter, d: i32) -> CResult_Counter_checked_div {',
      '    let self_ref = unsafe { &*ptr };',
      '    match self_ref.checked_div(d) {',
    ]);
  });

  it('exports only marked methods when any method is marked', () => {
    const e = mustEmit(
      impl('Counter', [
        method('new', 'none', [param('start', path('i32'))], path('Self'), NEW_TEXT, { marked: true }),
        method('reset', 'exclusive', [], null, 'fn reset(&mut self) { self.value = 0; }'),
      ]),
    );

    expect(e.symbols).toEqual(['Counter_new']);
    expect(sources(e, 'c-abi')[0]).toBe(
      `impl Counter {\n    ${NEW_TEXT}\n\n    fn reset(&mut self) { self.value = 0; }\n}`,
    );
    expect(sources(e, 'host')).toEqual([
      `#[pyo3::pymethods]\nimpl Counter {\n    #[new]\n    ${NEW_TEXT}\n}`,
      'impl Counter {\n    fn reset(&mut self) { self.value = 0; }\n}',
    ]);
  });

  it('keeps non-method members in an impl shared by both paths', () => {
    const e = mustEmit(
      impl(
        'Counter',
        [{ kind: 'item', text: 'const MAX: i32 = 10;' }, method('zero', 'none', [], path('i32'), 'fn zero() -> i32 { 0 }')],
        { docs: ['/// Counting.'], attributes: ['#[allow(dead_code)]'] },
      ),
    );

    expect(sources(e, 'always')).toEqual(['#[allow(dead_code)]\nimpl Counter {\n    const MAX: i32 = 10;\n}']);
    expect(sources(e, 'c-abi')[0]).toBe(
      '/// Counting.\n#[allow(dead_code)]\nimpl Counter {\n    fn zero() -> i32 { 0 }\n}',
    );
  });

  it('keeps method docs and attributes and indents multi-line bodies as written', () => {
    const e = mustEmit(
      impl('Counter', [
        method('get', 'shared', [], path('i32'), 'fn get(&self) -> i32 {\n        self.value\n    }', {
          docs: ['/// Current value.'],
          attributes: ['#[inline]'],
        }),
      ]),
    );
    expect(sources(e, 'c-abi')[0]).toBe(
      'impl Counter {\n    /// Current value.\n    #[inline]\n    fn get(&self) -> i32 {\n        self.value\n    }\n}',
    );
  });
  it('keeps the source order of exported and retained methods', () => {
    const e = mustEmit(
      impl('Counter', [
        method('reset', 'exclusive', [], null, 'fn reset(&mut self) { self.value = 0; }'),
        method('new', 'none', [param('start', path('i32'))], path('Self'), NEW_TEXT, { marked: true }),
      ]),
    );

    expect(sources(e, 'c-abi')[0]).toBe(
      `impl Counter {\n    fn reset(&mut self) { self.value = 0; }\n\n    ${NEW_TEXT}\n}`,
    );
  });

  it('renames the receiver pointer when a parameter already uses its name', () => {
    const e = mustEmit(
      impl('Buf', [
        method(
          'write',
          'exclusive',
          [param('ptr', ptr(false, path('u8'))), param('len', path('usize'))],
          path('usize'),
          'fn write(&mut self, ptr: *const u8, len: usize) -> usize { len }',
        ),
      ]),
    );

    expect(sources(e, 'c-abi')[1]).toBe(
      [
        '#[no_mangle]',
        'pub extern "C" fn Buf_write(ptr_: *mut Buf, ptr: *const u8, len: usize) -> usize {',
        '    let self_ref = unsafe { &mut *ptr_ };',
        '    self_ref.write(ptr, len)',
        '}',
      ].join('\n'),
    );
    expect(e.items[2].signature?.params.map((p) => p.name)).toEqual(['ptr_', 'ptr', 'len']);
  });

  it('renames the borrowed receiver when a parameter is called self_ref', () => {
    const e = mustEmit(
      impl('Buf', [
        method('put', 'shared', [param('self_ref', path('i32'))], path('i32'), 'fn put(&self, self_ref: i32) -> i32 { self_ref }'),
      ]),
    );

    expect(sources(e, 'c-abi')[1]).toBe(
      [
        '#[no_mangle]',
        'pub extern "C" fn Buf_put(ptr: *const Buf, self_ref: i32) -> i32 {',
        '    let self_ref_ = unsafe { &*ptr };',
        '    self_ref_.put(self_ref)',
        '}',
      ].join('\n'),
    );
  });
});
