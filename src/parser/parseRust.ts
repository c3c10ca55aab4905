import type Parser from 'tree-sitter';

import type {
  MarkedItem,
  SourceField,
  SourceFunction,
  SourceImpl,
  SourceImplMember,
  SourceItem,
  SourceParam,
  SourceReceiver,
  SourceStruct,
  TypeExpr,
} from './parserTypes.js';

type SyntaxNode = Parser.SyntaxNode;

type Attributed = {
  node: SyntaxNode;
  attributes: string[];
  docs: string[];
  marked: boolean;
  /** Start of the leading attribute/comment run, or of the node itself. */
  start: number;
};

const COMMENT_TYPES = new Set(['line_comment', 'block_comment']);

/** `#[a::b(...)]` -> `a::b` */
export function attributePath(attributeText: string): string | null {
  const m = attributeText.match(/^#\[\s*([A-Za-z_]\w*(?:\s*::\s*[A-Za-z_]\w*)*)/);
  return m ? m[1].replace(/\s+/g, '') : null;
}

export function isMarkerAttribute(attributeText: string, marker: string): boolean {
  const path = attributePath(attributeText);
  if (!path) return false;
  return path === marker || path.endsWith(`::${marker}`);
}

function line(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

function visibilityOf(node: SyntaxNode): string | null {
  return node.namedChildren.find((c) => c.type === 'visibility_modifier')?.text ?? null;
}

function isComment(node: SyntaxNode): boolean {
  return COMMENT_TYPES.has(node.type);
}

/**
 * Groups the named children of an item container with the attribute and
 * comment run that precedes each of them.
 */
function attributedChildren(container: SyntaxNode, marker: string): Attributed[] {
  const out: Attributed[] = [];
  let attributes: string[] = [];
  let docs: string[] = [];
  let marked = false;
  let start: number | null = null;

  for (const child of container.namedChildren) {
    if (child.type === 'attribute_item') {
      if (isMarkerAttribute(child.text, marker)) marked = true;
      else attributes.push(child.text);
      start ??= child.startIndex;
      continue;
    }
    if (isComment(child)) {
      docs.push(child.text.trimEnd());
      start ??= child.startIndex;
      continue;
    }
    out.push({ node: child, attributes, docs, marked, start: start ?? child.startIndex });
    attributes = [];
    docs = [];
    marked = false;
    start = null;
  }
  return out;
}

export function lowerType(node: SyntaxNode | null): TypeExpr {
  if (!node) return { kind: 'opaque', text: '' };
  const text = node.text;

  switch (node.type) {
    case 'primitive_type':
    case 'type_identifier':
      return { kind: 'path', segments: [text], args: [], text };
    case 'scoped_type_identifier':
      return { kind: 'path', segments: splitPath(text), args: [], text };
    case 'generic_type': {
      const base = node.childForFieldName('type');
      const argsNode = node.childForFieldName('type_arguments');
      const args = (argsNode?.namedChildren ?? [])
        .filter((c) => c.type !== 'lifetime' && !isComment(c))
        .map((c) => lowerType(c));
      return { kind: 'path', segments: splitPath(base?.text ?? text), args, text };
    }
    case 'pointer_type':
      return {
        kind: 'pointer',
        mutable: node.children.some((c) => c.type === 'mutable_specifier'),
        pointee: lowerType(node.childForFieldName('type')),
        text,
      };
    case 'reference_type':
      return {
        kind: 'reference',
        mutable: node.children.some((c) => c.type === 'mutable_specifier'),
        referent: lowerType(node.childForFieldName('type')),
        text,
      };
    case 'unit_type':
      return { kind: 'tuple', elements: [], text };
    case 'tuple_type':
      return {
        kind: 'tuple',
        elements: node.namedChildren.filter((c) => !isComment(c)).map((c) => lowerType(c)),
        text,
      };
    default:
      // `Self` surfaces under a few node types depending on position.
      if (text === 'Self') return { kind: 'path', segments: ['Self'], args: [], text };
      return { kind: 'opaque', text };
  }
}

function splitPath(text: string): string[] {
  return text.split('::').map((s) => s.trim()).filter((s) => s.length > 0);
}

function receiverFromType(type: TypeExpr): SourceReceiver {
  if (type.kind === 'reference') return type.mutable ? 'exclusive' : 'shared';
  return 'owned';
}

function lowerParams(paramsNode: SyntaxNode | null): {
  receiver: SourceReceiver;
  params: SourceParam[];
} {
  let receiver: SourceReceiver = 'none';
  const params: SourceParam[] = [];

  for (const p of paramsNode?.namedChildren ?? []) {
    if (p.type === 'self_parameter') {
      if (p.text.startsWith('&')) {
        receiver = p.children.some((c) => c.type === 'mutable_specifier') ? 'exclusive' : 'shared';
      } else {
        receiver = 'owned';
      }
      continue;
    }
    if (p.type !== 'parameter') continue;

    const typeNode = p.childForFieldName('type');
    const type = lowerType(typeNode);
    // Everything before the `:` is the pattern, `mut` included.
    const patternEnd = typeNode ? typeNode.startIndex - p.startIndex : p.text.length;
    const pattern = p.text.slice(0, patternEnd).replace(/\s*:\s*$/, '').trim();

    if (pattern === 'self' || pattern === 'mut self') {
      receiver = receiverFromType(type);
      continue;
    }

    const m = pattern.match(/^(?:mut\s+)?([A-Za-z_]\w*)$/);
    params.push({ pattern, name: m && m[1] !== '_' ? m[1] : null, type });
  }

  return { receiver, params };
}

function declaredAbi(modifiers: SyntaxNode): string | null {
  const ext = modifiers.namedChildren.find((c) => c.type === 'extern_modifier');
  if (!ext) return null;
  const literal = ext.namedChildren.find((c) => c.type === 'string_literal');
  return literal ? literal.text.slice(1, -1) : 'C';
}

function lowerFunction(a: Attributed): SourceFunction {
  const { node } = a;
  const modifiers = node.namedChildren.find((c) => c.type === 'function_modifiers');
  const { receiver, params } = lowerParams(node.childForFieldName('parameters'));
  const returnNode = node.childForFieldName('return_type');

  return {
    kind: 'function',
    name: node.childForFieldName('name')?.text ?? '<anonymous>',
    visibility: visibilityOf(node),
    isUnsafe: modifiers ? /\bunsafe\b/.test(modifiers.text) : false,
    isAsync: modifiers ? /\basync\b/.test(modifiers.text) : false,
    abi: modifiers ? declaredAbi(modifiers) : null,
    isGeneric: node.childForFieldName('type_parameters') != null,
    receiver,
    params,
    returnType: returnNode ? lowerType(returnNode) : null,
    body: node.childForFieldName('body')?.text ?? '{}',
    text: node.text,
    marked: a.marked,
    attributes: a.attributes,
    docs: a.docs,
    line: line(node),
  };
}

function lowerStruct(a: Attributed): SourceStruct {
  const { node } = a;
  const body = node.childForFieldName('body');
  const fields: SourceField[] = [];
  let shape: SourceStruct['shape'] = 'unit';

  if (body?.type === 'field_declaration_list') {
    shape = 'named';
    for (const f of body.namedChildren) {
      if (f.type !== 'field_declaration') continue;
      fields.push({
        name: f.childForFieldName('name')?.text ?? '<field>',
        visibility: visibilityOf(f),
        type: lowerType(f.childForFieldName('type')),
      });
    }
  } else if (body?.type === 'ordered_field_declaration_list') {
    shape = 'tuple';
    let pendingVisibility: string | null = null;
    for (const c of body.namedChildren) {
      if (c.type === 'visibility_modifier') {
        pendingVisibility = c.text;
        continue;
      }
      if (c.type === 'attribute_item' || isComment(c)) continue;
      fields.push({ name: String(fields.length), visibility: pendingVisibility, type: lowerType(c) });
      pendingVisibility = null;
    }
  }

  return {
    kind: 'struct',
    name: node.childForFieldName('name')?.text ?? '<anonymous>',
    visibility: visibilityOf(node),
    isGeneric: node.childForFieldName('type_parameters') != null,
    shape,
    fields,
    attributes: a.attributes,
    docs: a.docs,
    line: line(node),
  };
}

function lowerImpl(a: Attributed, source: string, marker: string): SourceImpl {
  const { node } = a;
  const body = node.childForFieldName('body');
  const members: SourceImplMember[] = [];

  if (body) {
    for (const m of attributedChildren(body, marker)) {
      if (m.node.type === 'function_item') {
        members.push({ kind: 'method', fn: lowerFunction(m) });
      } else {
        members.push({ kind: 'item', text: source.slice(m.start, m.node.endIndex) });
      }
    }
  }

  return {
    kind: 'impl',
    selfType: lowerType(node.childForFieldName('type')),
    traitName: node.childForFieldName('trait')?.text ?? null,
    isGeneric: node.childForFieldName('type_parameters') != null,
    members,
    attributes: a.attributes,
    docs: a.docs,
    line: line(node),
  };
}

function lowerItem(a: Attributed, source: string, marker: string): SourceItem {
  switch (a.node.type) {
    case 'function_item':
      return lowerFunction(a);
    case 'struct_item':
      return lowerStruct(a);
    case 'impl_item':
      return lowerImpl(a, source, marker);
    default:
      return {
        kind: 'other',
        nodeType: a.node.type,
        name: a.node.childForFieldName('name')?.text ?? null,
        text: a.node.text,
        attributes: a.attributes,
        docs: a.docs,
        line: line(a.node),
      };
  }
}

function firstError(node: SyntaxNode): SyntaxNode | null {
  if (node.type === 'ERROR') return node;
  for (const child of node.children) {
    const found = firstError(child);
    if (found) return found;
  }
  return null;
}

/**
 * Collects every item carrying the marker attribute, at the top level and
 * inside inline `mod` blocks.
 */
export function collectMarkedItems(
  root: SyntaxNode,
  source: string,
  marker: string,
): MarkedItem[] {
  const err = firstError(root);
  if (err) {
    throw new Error(
      `Unable to parse Rust source: syntax error at line ${line(err)}.\n` +
        `abiforge only rewrites source that rustc would accept; fix the syntax error first.`,
    );
  }

  const items: MarkedItem[] = [];

  function visit(container: SyntaxNode) {
    for (const a of attributedChildren(container, marker)) {
      if (a.marked) {
        items.push({ item: lowerItem(a, source, marker), start: a.start, end: a.node.endIndex });
        continue;
      }
      if (a.node.type === 'mod_item') {
        const body = a.node.childForFieldName('body');
        if (body) visit(body);
      }
    }
  }

  visit(root);
  return items;
}
