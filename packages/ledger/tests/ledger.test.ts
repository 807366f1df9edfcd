/**
 * Tests for ProxyLedger.
 *
 * Covers:
 * - Identity and lifecycle
 * - One-shot initialization and fee-rate bounds
 * - Append-only totals and profit
 * - Checkpoint / restore
 * - Snapshot / fromSnapshot
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Address } from "@yield-proxy/types";
import { ProxyLedger } from "../src/ledger.js";
import { LedgerError } from "../src/types.js";
import type { LedgerSnapshot, ProxyIdentity } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const IDENTITY: ProxyIdentity = {
  address: "0x1000000000000000000000000000000000000001",
  executor: "0x2000000000000000000000000000000000000002",
  factory: "0x3000000000000000000000000000000000000003",
  treasury: "0x4000000000000000000000000000000000000004",
};

const CLIENT: Address = "0x5000000000000000000000000000000000000005";
const USDC: Address = "0x6000000000000000000000000000000000000006";
const WETH: Address = "0x7000000000000000000000000000000000000007";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof LedgerError ? err.code : undefined;
  }
  return undefined;
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("ProxyLedger", () => {
  let ledger: ProxyLedger;

  beforeEach(() => {
    ledger = new ProxyLedger(IDENTITY);
  });

  describe("identity", () => {
    it("exposes the injected addresses", () => {
      expect(ledger.address).toBe(IDENTITY.address);
      expect(ledger.executor).toBe(IDENTITY.executor);
      expect(ledger.factory).toBe(IDENTITY.factory);
      expect(ledger.treasury).toBe(IDENTITY.treasury);
      expect(ledger.identity).toEqual(IDENTITY);
    });

    it("starts uninitialized", () => {
      expect(ledger.status).toBe("uninitialized");
      expect(ledger.client).toBeUndefined();
      expect(ledger.feeBps).toBe(0);
    });
  });

  describe("initialize", () => {
    it("sets client and fee rate", () => {
      ledger.initialize(CLIENT, 8_700);

      expect(ledger.status).toBe("active");
      expect(ledger.client).toBe(CLIENT);
      expect(ledger.feeBps).toBe(8_700);
    });

    it("accepts the rate bounds 1 and 10000", () => {
      ledger.initialize(CLIENT, 1);
      expect(ledger.feeBps).toBe(1);

      const other = new ProxyLedger(IDENTITY);
      other.initialize(CLIENT, 10_000);
      expect(other.feeBps).toBe(10_000);
    });

    it("rejects rates 0 and 10001 without writing state", () => {
      expect(codeOf(() => ledger.initialize(CLIENT, 0))).toBe("INVALID_FEE_BPS");
      expect(codeOf(() => ledger.initialize(CLIENT, 10_001))).toBe("INVALID_FEE_BPS");
      expect(ledger.status).toBe("uninitialized");
      expect(ledger.feeBps).toBe(0);
    });

    it("rejects the zero address as client", () => {
      expect(
        codeOf(() => ledger.initialize("0x0000000000000000000000000000000000000000", 8_700)),
      ).toBe("ZERO_ADDRESS_CLIENT");
    });

    it("cannot be called twice", () => {
      ledger.initialize(CLIENT, 8_700);

      expect(
        codeOf(() => ledger.initialize("0x8000000000000000000000000000000000000008", 5_000)),
      ).toBe("ALREADY_INITIALIZED");
      expect(ledger.client).toBe(CLIENT);
      expect(ledger.feeBps).toBe(8_700);
    });
  });

  describe("totals", () => {
    it("defaults to zero for unseen assets", () => {
      expect(ledger.getTotalDeposited(USDC)).toBe(0n);
      expect(ledger.getTotalWithdrawn(USDC)).toBe(0n);
      expect(ledger.getProfit(USDC)).toBe(0n);
    });

    it("accumulates deposits and returns the new total", () => {
      expect(ledger.recordDeposit(USDC, 100n)).toBe(100n);
      expect(ledger.recordDeposit(USDC, 50n)).toBe(150n);
      expect(ledger.getTotalDeposited(USDC)).toBe(150n);
    });

    it("accumulates withdrawals and returns the new total", () => {
      expect(ledger.recordWithdrawal(USDC, 30n)).toBe(30n);
      expect(ledger.recordWithdrawal(USDC, 0n)).toBe(30n);
      expect(ledger.getTotalWithdrawn(USDC)).toBe(30n);
    });

    it("keeps assets independent", () => {
      ledger.recordDeposit(USDC, 100n);
      ledger.recordDeposit(WETH, 7n);

      expect(ledger.getTotalDeposited(USDC)).toBe(100n);
      expect(ledger.getTotalDeposited(WETH)).toBe(7n);
    });

    it("rejects negative amounts", () => {
      expect(codeOf(() => ledger.recordDeposit(USDC, -1n))).toBe("INVALID_AMOUNT");
      expect(codeOf(() => ledger.recordWithdrawal(USDC, -1n))).toBe("INVALID_AMOUNT");
      expect(ledger.getTotalDeposited(USDC)).toBe(0n);
    });

    it("reports profit only above principal", () => {
      ledger.recordDeposit(USDC, 1_000n);
      ledger.recordWithdrawal(USDC, 600n);
      expect(ledger.getProfit(USDC)).toBe(0n);

      ledger.recordWithdrawal(USDC, 700n);
      expect(ledger.getTotalWithdrawn(USDC)).toBe(1_300n);
      expect(ledger.getProfit(USDC)).toBe(300n);
    });
  });

  describe("checkpoint / restore", () => {
    it("rolls back totals and initialization", () => {
      ledger.recordDeposit(USDC, 10n);
      const checkpoint = ledger.checkpoint();

      ledger.initialize(CLIENT, 8_700);
      ledger.recordDeposit(USDC, 90n);
      ledger.recordWithdrawal(WETH, 5n);
      ledger.restore(checkpoint);

      expect(ledger.status).toBe("uninitialized");
      expect(ledger.getTotalDeposited(USDC)).toBe(10n);
      expect(ledger.getTotalWithdrawn(WETH)).toBe(0n);
    });

    it("is unaffected by writes after it was taken", () => {
      const checkpoint = ledger.checkpoint();
      ledger.recordDeposit(USDC, 1n);

      expect(checkpoint.deposited.size).toBe(0);
    });
  });

  describe("snapshot", () => {
    it("round-trips state", () => {
      ledger.initialize(CLIENT, 8_700);
      ledger.recordDeposit(USDC, 10_000_000n);
      ledger.recordWithdrawal(USDC, 10_300_000n);

      const snap = ledger.snapshot();
      expect(snap.totalDeposited).toEqual({ [USDC]: "10000000" });
      expect(snap.totalWithdrawn).toEqual({ [USDC]: "10300000" });

      const restored = ProxyLedger.fromSnapshot(snap);
      expect(restored.client).toBe(CLIENT);
      expect(restored.feeBps).toBe(8_700);
      expect(restored.getProfit(USDC)).toBe(300_000n);
    });

    it("restores an uninitialized ledger", () => {
      const restored = ProxyLedger.fromSnapshot(ledger.snapshot());
      expect(restored.status).toBe("uninitialized");
    });

    it("rejects malformed totals", () => {
      const snap: LedgerSnapshot = {
        ...ledger.snapshot(),
        totalDeposited: { [USDC]: "-5" },
      };
      expect(codeOf(() => ProxyLedger.fromSnapshot(snap))).toBe("INVALID_SNAPSHOT");
    });

    it("rejects an identity field that is not an address", () => {
      const snap: LedgerSnapshot = {
        ...ledger.snapshot(),
        identity: { ...ledger.identity, treasury: "0x1234" },
      };
      expect(codeOf(() => ProxyLedger.fromSnapshot(snap))).toBe("INVALID_SNAPSHOT");
    });

    it("rejects a client that is not an address", () => {
      const snap: LedgerSnapshot = { ...ledger.snapshot(), client: "0xnot-an-address", feeBps: 8_700 };
      expect(codeOf(() => ProxyLedger.fromSnapshot(snap))).toBe("INVALID_SNAPSHOT");
    });

    it("rejects an asset key that is not an address", () => {
      const snap: LedgerSnapshot = {
        ...ledger.snapshot(),
        totalWithdrawn: { USDC: "1" },
      };
      expect(codeOf(() => ProxyLedger.fromSnapshot(snap))).toBe("INVALID_SNAPSHOT");
    });

    it("rejects a fee rate without a client", () => {
      const snap: LedgerSnapshot = { ...ledger.snapshot(), feeBps: 8_700 };
      expect(codeOf(() => ProxyLedger.fromSnapshot(snap))).toBe("INVALID_SNAPSHOT");
    });
  });
});
