import { readFileSync } from 'fs';

import { createParser } from './loadParser.js';
import { collectMarkedItems } from './parseRust.js';
import type { ParsedSource } from './parserTypes.js';

export const DEFAULT_MARKER = 'abi_export';

export type ParseOptions = {
  /** Attribute name that marks an item for export. */
  marker?: string;
};

export function parseRustSource(source: string, options: ParseOptions = {}): ParsedSource {
  const parser = createParser();
  // The binding reads string input through a fixed-size buffer (32 KiB by
  // default); size it to the whole source.
  const tree = parser.parse(source, undefined, { bufferSize: source.length * 2 + 1 });
  const items = collectMarkedItems(tree.rootNode, source, options.marker ?? DEFAULT_MARKER);
  return { source, items };
}

export function parseRustFile(filePath: string, options: ParseOptions = {}): ParsedSource {
  const source = readFileSync(filePath, 'utf8');
  return parseRustSource(source, options);
}

export { lowerType, attributePath, isMarkerAttribute } from './parseRust.js';
export type * from './parserTypes.js';
