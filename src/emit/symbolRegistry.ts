export type ClaimResult =
  | { ok: true }
  | { ok: false; symbol: string; claimedBy: string };

/**
 * Build-scoped record of every emitted name.
 *
 * A declaration claims all of its names at once; if any is taken, nothing
 * is recorded for it.
 */
export class SymbolRegistry {
  private readonly owners = new Map<string, string>();

  claim(symbols: string[], declaration: string): ClaimResult {
    const seen = new Set<string>();
    for (const s of symbols) {
      const claimedBy = this.owners.get(s) ?? (seen.has(s) ? declaration : undefined);
      if (claimedBy !== undefined) return { ok: false, symbol: s, claimedBy };
      seen.add(s);
    }
    for (const s of symbols) this.owners.set(s, declaration);
    return { ok: true };
  }

  has(symbol: string): boolean {
    return this.owners.has(symbol);
  }

  get size(): number {
    return this.owners.size;
  }
}
