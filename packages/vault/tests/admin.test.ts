/**
 * Tests for the vault admin role: fee rate, fee recipient, and handing
 * the role over.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MAX_FEES_BIPS } from "../src/types.js";
import { ADMIN, CREDITOR, DEBTOR, FEES, STRANGER, VAULT, ZERO, errorCode, setupVault } from "./fixtures.js";
import type { VaultFixture } from "./fixtures.js";

describe("RepaymentVault admin", () => {
  let fx: VaultFixture;

  beforeEach(() => {
    fx = setupVault();
  });

  describe("setFeesBips", () => {
    it("updates the fee rate and publishes it", () => {
      fx.vault.setFeesBips(ADMIN, 250);

      expect(fx.vault.feesBips()).toBe(250);
      const [event] = fx.store.read(`vault:${VAULT}`);
      expect(event?.event.type).toBe("vault.fees.set");
      expect(event?.event.payload).toEqual({ bips: 250 });
    });

    it("accepts the maximum rate", () => {
      fx.vault.setFeesBips(ADMIN, MAX_FEES_BIPS);
      expect(fx.vault.feesBips()).toBe(1_000);
    });

    it("rejects rates above the maximum", () => {
      expect(errorCode(() => fx.vault.setFeesBips(ADMIN, 1_001))).toBe("EXCESSIVE_VAULT_FEES");
      expect(errorCode(() => fx.vault.setFeesBips(ADMIN, -1))).toBe("EXCESSIVE_VAULT_FEES");
      expect(fx.vault.feesBips()).toBe(100);
    });

    it("is admin-only", () => {
      expect(errorCode(() => fx.vault.setFeesBips(DEBTOR, 0))).toBe("ONLY_ADMIN");
      expect(errorCode(() => fx.vault.setFeesBips(CREDITOR, 0))).toBe("ONLY_ADMIN");
    });

    it("applies to the next interest payment", () => {
      fx.vault.setFeesBips(ADMIN, 1_000);
      fx.vault.deposit(DEBTOR, 100n, 100n, false);

      expect(fx.vault.balanceOf(FEES)).toBe(10n);
      expect(fx.vault.balanceOf(CREDITOR)).toBe(90n);
    });
  });

  describe("setFeesRecipient", () => {
    it("redirects future fees", () => {
      fx.vault.setFeesRecipient(ADMIN, STRANGER);
      fx.vault.deposit(DEBTOR, 100n, 100n, false);

      expect(fx.vault.feesRecipient()).toBe(STRANGER);
      expect(fx.vault.balanceOf(STRANGER)).toBe(1n);
      expect(fx.vault.balanceOf(FEES)).toBe(0n);
    });

    it("publishes the new recipient", () => {
      fx.vault.setFeesRecipient(ADMIN, STRANGER);
      const [event] = fx.store.read(`vault:${VAULT}`);
      expect(event?.event.payload).toEqual({ recipient: STRANGER });
    });

    it("rejects the zero address", () => {
      expect(errorCode(() => fx.vault.setFeesRecipient(ADMIN, ZERO))).toBe("ZERO_ADDRESS");
      expect(fx.vault.feesRecipient()).toBe(FEES);
    });

    it("is admin-only", () => {
      expect(errorCode(() => fx.vault.setFeesRecipient(STRANGER, STRANGER))).toBe("ONLY_ADMIN");
    });
  });

  describe("transferAdmin", () => {
    it("hands the role to a new address", () => {
      fx.vault.transferAdmin(ADMIN, STRANGER);

      expect(fx.vault.admin()).toBe(STRANGER);
      expect(errorCode(() => fx.vault.setFeesBips(ADMIN, 0))).toBe("ONLY_ADMIN");
      fx.vault.setFeesBips(STRANGER, 0);
      expect(fx.vault.feesBips()).toBe(0);
    });

    it("publishes both admins", () => {
      fx.vault.transferAdmin(ADMIN, STRANGER);
      const [event] = fx.store.read(`vault:${VAULT}`);
      expect(event?.event.payload).toEqual({ previousAdmin: ADMIN, newAdmin: STRANGER });
    });

    it("rejects the zero address", () => {
      expect(errorCode(() => fx.vault.transferAdmin(ADMIN, ZERO))).toBe("ZERO_ADDRESS");
    });

    it("is admin-only", () => {
      expect(errorCode(() => fx.vault.transferAdmin(DEBTOR, DEBTOR))).toBe("ONLY_ADMIN");
    });
  });
});
