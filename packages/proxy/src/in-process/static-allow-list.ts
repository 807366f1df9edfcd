import type { Address, Hex, OperationKind, Selector } from "@yield-proxy/types";
import type { AllowListChecker } from "../collaborators.js";

/**
 * Allow-list keyed on (target, selector, kind). Argument bytes are not
 * inspected.
 */
export class StaticAllowList implements AllowListChecker {
  private readonly _entries = new Set<string>();

  allow(target: Address, selector: Selector, kinds: readonly OperationKind[]): this {
    for (const kind of kinds) {
      this._entries.add(entryKey(target, selector, kind));
    }
    return this;
  }

  revoke(target: Address, selector: Selector, kind: OperationKind): void {
    this._entries.delete(entryKey(target, selector, kind));
  }

  check(target: Address, selector: Selector, _remainder: Hex, kind: OperationKind): boolean {
    return this._entries.has(entryKey(target, selector, kind));
  }
}

function entryKey(target: Address, selector: Selector, kind: OperationKind): string {
  return `${target.toLowerCase()}:${selector.toLowerCase()}:${kind}`;
}
