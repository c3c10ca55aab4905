import type { TypeExpr } from '../parser/parserTypes.js';
import type { Diagnostic } from '../diagnostics/diagnostics.js';

export type Receiver = 'none' | 'shared' | 'exclusive';

export type MethodRole = 'constructor' | 'staticFunction' | 'instanceMethod';

export type Param = {
  /** Name used by generated wrappers (`arg<i>` for non-identifier patterns). */
  name: string;
  /** Pattern as written in the original signature. */
  pattern: string;
  type: TypeExpr;
};

type DeclCommon = {
  attributes: string[];
  docs: string[];
  line: number;
};

export type FunctionDecl = DeclCommon & {
  kind: 'function';
  name: string;
  visibility: string | null;
  params: Param[];
  returnType: TypeExpr | null;
  body: string;
};

export type Field = {
  name: string;
  visibility: string | null;
  type: TypeExpr;
};

export type DataRecordDecl = DeclCommon & {
  kind: 'dataRecord';
  name: string;
  shape: 'named' | 'tuple' | 'unit';
  fields: Field[];
};

/** A method kept verbatim inside the regenerated impl blocks. */
export type MethodText = {
  name: string;
  text: string;
  attributes: string[];
  docs: string[];
};

export type Method = MethodText & {
  receiver: Receiver;
  params: Param[];
  returnType: TypeExpr | null;
  line: number;
};

export type MethodCollectionDecl = DeclCommon & {
  kind: 'methodCollection';
  owner: string;
  /** Methods that get a C wrapper. */
  methods: Method[];
  /** Methods present in the impl block but not exported. */
  retained: MethodText[];
  /** Every method, exported or retained, in source order. */
  members: MethodText[];
  /** Non-method impl members (consts, type aliases, macros), verbatim. */
  items: string[];
};

export type Decl = FunctionDecl | DataRecordDecl | MethodCollectionDecl;

export type Classified<T> = { ok: true; value: T } | { ok: false; diagnostic: Diagnostic };
