export type PrimitiveKind =
  | 'i8'
  | 'i16'
  | 'i32'
  | 'i64'
  | 'i128'
  | 'isize'
  | 'u8'
  | 'u16'
  | 'u32'
  | 'u64'
  | 'u128'
  | 'usize'
  | 'f32'
  | 'f64'
  | 'bool'
  | 'char';

export type ContainerKind = 'String' | 'Vec';

/** Where a type occurs; containers are only accepted as record fields. */
export type TypePosition = 'param' | 'return' | 'field';

export type TypeDescriptor =
  | { kind: 'primitive'; primitive: PrimitiveKind }
  | { kind: 'opaquePointer'; mutable: boolean }
  | { kind: 'unit' }
  | { kind: 'errorShape'; ok: TypeDescriptor; err: TypeDescriptor }
  | { kind: 'optionalShape'; inner: TypeDescriptor }
  | { kind: 'duplicableContainer'; container: ContainerKind }
  | { kind: 'unsupported'; reason: string };
