import type { Classified, Decl } from '../classify/declTypes.js';
import { diagnostic } from '../diagnostics/diagnostics.js';
import { trace } from '../dx/trace.js';
import type { Emission } from './emitTypes.js';
import { emitFunction } from './emitFunction.js';
import { emitMethods } from './emitMethods.js';
import { emitRecord } from './emitRecord.js';
import { SymbolRegistry } from './symbolRegistry.js';

function emitItems(decl: Decl): Emission {
  switch (decl.kind) {
    case 'function':
      return emitFunction(decl);
    case 'dataRecord':
      return emitRecord(decl);
    case 'methodCollection':
      return emitMethods(decl);
  }
}

/**
 * Emits both consumer paths for a classified declaration and claims its
 * names in the build registry. A name clash fails the whole declaration.
 */
export function emitDeclaration(
  decl: Decl,
  registry: SymbolRegistry = new SymbolRegistry(),
): Classified<Emission> {
  const emission = emitItems(decl);
  const claim = registry.claim(emission.symbols, emission.declaration);
  if (!claim.ok) {
    return {
      ok: false,
      diagnostic: diagnostic(
        'SYMBOL_COLLISION',
        `symbol \`${claim.symbol}\` generated for \`${emission.declaration}\` is already defined by \`${claim.claimedBy}\``,
        emission.declaration,
        decl.line,
      ),
    };
  }

  trace('emit.declaration', {
    declaration: emission.declaration,
    kind: decl.kind,
    symbols: emission.symbols,
  });
  return { ok: true, value: emission };
}
