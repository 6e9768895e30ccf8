import type { SemanticErrorCode } from './error-codes';

const EMPTY: ReadonlySet<SemanticErrorCode> = new Set();

/**
 * Side table of error codes per node id. Nodes stay immutable; analyzers
 * append here and nothing in the analyzers reads it back.
 */
export class ErrorCodeLedger {
  private readonly entries = new Map<string, Set<SemanticErrorCode>>();

  record(nodeId: string, code: SemanticErrorCode): void {
    const codes = this.entries.get(nodeId);
    if (codes) {
      codes.add(code);
    } else {
      this.entries.set(nodeId, new Set([code]));
    }
  }

  codesFor(nodeId: string): ReadonlySet<SemanticErrorCode> {
    return this.entries.get(nodeId) ?? EMPTY;
  }

  has(nodeId: string, code: SemanticErrorCode): boolean {
    return this.codesFor(nodeId).has(code);
  }

  get size(): number {
    return this.entries.size;
  }

  nodeIds(): string[] {
    return [...this.entries.keys()];
  }

  /** Codes are sorted so that repeated runs serialize identically. */
  toJSON(): Record<string, SemanticErrorCode[]> {
    const result: Record<string, SemanticErrorCode[]> = {};
    for (const [nodeId, codes] of this.entries) {
      result[nodeId] = [...codes].sort();
    }
    return result;
  }
}
