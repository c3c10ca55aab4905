/**
 * Syntactic shape of a Rust type, lowered from the tree-sitter node.
 *
 * `text` always holds the type exactly as written in the source.
 */
export type TypeExpr =
  | { kind: 'path'; segments: string[]; args: TypeExpr[]; text: string }
  | { kind: 'pointer'; mutable: boolean; pointee: TypeExpr; text: string }
  | { kind: 'reference'; mutable: boolean; referent: TypeExpr; text: string }
  | { kind: 'tuple'; elements: TypeExpr[]; text: string }
  | { kind: 'opaque'; text: string };

export type SourceParam = {
  /** Pattern as written, e.g. `x`, `mut x`, `_`. */
  pattern: string;
  /** Plain binding name when the pattern is a (possibly `mut`) identifier. */
  name: string | null;
  type: TypeExpr;
};

export type SourceReceiver = 'none' | 'shared' | 'exclusive' | 'owned';

type ItemCommon = {
  /** Outer attributes as written (`#[derive(Debug)]`), marker excluded. */
  attributes: string[];
  /** Doc and plain comments found between the attributes and the item. */
  docs: string[];
  /** 1-based source line of the item keyword. */
  line: number;
};

export type SourceFunction = ItemCommon & {
  kind: 'function';
  name: string;
  visibility: string | null;
  isUnsafe: boolean;
  isAsync: boolean;
  /** ABI named by an `extern` modifier (`C` for a bare `extern`), null without one. */
  abi: string | null;
  isGeneric: boolean;
  receiver: SourceReceiver;
  params: SourceParam[];
  returnType: TypeExpr | null;
  /** Body block including its braces. */
  body: string;
  /** The whole `fn` item, without leading attributes. */
  text: string;
  /** True when the item itself carried the marker attribute. */
  marked: boolean;
};

export type SourceField = {
  /** Field name, or its position for tuple structs. */
  name: string;
  visibility: string | null;
  type: TypeExpr;
};

export type SourceStruct = ItemCommon & {
  kind: 'struct';
  name: string;
  visibility: string | null;
  isGeneric: boolean;
  shape: 'named' | 'tuple' | 'unit';
  fields: SourceField[];
};

export type SourceImplMember =
  | { kind: 'method'; fn: SourceFunction }
  | { kind: 'item'; text: string };

export type SourceImpl = ItemCommon & {
  kind: 'impl';
  selfType: TypeExpr;
  traitName: string | null;
  isGeneric: boolean;
  members: SourceImplMember[];
};

export type SourceOther = ItemCommon & {
  kind: 'other';
  nodeType: string;
  name: string | null;
  text: string;
};

export type SourceItem = SourceFunction | SourceStruct | SourceImpl | SourceOther;

/** A marked item together with the source span it replaces. */
export type MarkedItem = {
  item: SourceItem;
  start: number;
  end: number;
};

export type ParsedSource = {
  source: string;
  items: MarkedItem[];
};
