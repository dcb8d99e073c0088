import { beforeEach, describe, expect, it } from "vitest";
import { createAccount, type Account } from "@/lib/account";
import { createAlphabet, DEFAULT_ALPHABET } from "@/lib/alphabet";
import { SubstitutionCipher } from "@/lib/cipher";
import { isVaultError, type VaultErrorKind } from "@/lib/errors";
import { addRecord, decryptRecord, deleteRecord, getRecord, updateRecord } from "@/lib/records";

const cipher = new SubstitutionCipher(createAlphabet(DEFAULT_ALPHABET));

function failureKind(fn: () => unknown): VaultErrorKind | "none" | "unexpected" {
  try {
    fn();
  } catch (err) {
    return isVaultError(err) ? err.kind : "unexpected";
  }
  return "none";
}

describe("records", () => {
  let account: Account;

  beforeEach(() => {
    account = createAccount({ loginName: "alice", masterSecret: "secret1", customCategories: ["Games"] });
  });

  describe("addRecord", () => {
    it("stores the shifted password with its category", () => {
      addRecord(account, cipher, "site.com", "Sw0rd!", "Email");
      expect(getRecord(account, "site.com")).toEqual({ encryptedPassword: "YC6xj'", category: "Email" });
    });

    it("accepts a custom category", () => {
      addRecord(account, cipher, "steam", "hunter22", "Games");
      expect(getRecord(account, "steam").category).toBe("Games");
    });

    it("trims the resource name", () => {
      addRecord(account, cipher, "  site.com ", "Sw0rd!", "Other");
      expect([...account.records.keys()]).toEqual(["site.com"]);
    });

    it("round-trips mixed, special and non-alphabet characters", () => {
      const passwords = ["Pa55word", "Aa1!@#$%^&*()", "Пароль1", "with space~", "x"];
      passwords.forEach((pw, i) => addRecord(account, cipher, `r${i}`, pw, "Other"));
      passwords.forEach((pw, i) => expect(decryptRecord(cipher, getRecord(account, `r${i}`))).toBe(pw));
    });

    it("rejects bad input without touching the account", () => {
      addRecord(account, cipher, "site.com", "Sw0rd!", "Email");

      expect(failureKind(() => addRecord(account, cipher, "", "pw", "Email"))).toBe("InvalidInput");
      expect(failureKind(() => addRecord(account, cipher, "   ", "pw", "Email"))).toBe("InvalidInput");
      expect(failureKind(() => addRecord(account, cipher, "site.com", "other", "Email"))).toBe("AlreadyExists");
      expect(failureKind(() => addRecord(account, cipher, "new.com", "pw", "Nope"))).toBe("InvalidInput");
      expect(failureKind(() => addRecord(account, cipher, "new.com", "", "Email"))).toBe("InvalidInput");

      expect(account.records.size).toBe(1);
      expect(getRecord(account, "site.com").encryptedPassword).toBe("YC6xj'");
    });
  });

  describe("updateRecord", () => {
    it("replaces the password and keeps the category", () => {
      addRecord(account, cipher, "steam", "hunter22", "Games");
      updateRecord(account, cipher, "steam", "Sw0rd!");

      expect(getRecord(account, "steam")).toEqual({ encryptedPassword: "YC6xj'", category: "Games" });
    });

    it("fails for an absent or empty resource", () => {
      expect(failureKind(() => updateRecord(account, cipher, "ghost", "pw"))).toBe("NotFound");
      expect(failureKind(() => updateRecord(account, cipher, "", "pw"))).toBe("InvalidInput");
    });
  });

  describe("deleteRecord", () => {
    beforeEach(() => {
      addRecord(account, cipher, "site.com", "Sw0rd!", "Email");
    });

    it("does nothing when not confirmed", () => {
      expect(deleteRecord(account, "site.com", false)).toBe("cancelled");
      expect(account.records.has("site.com")).toBe(true);
    });

    it("removes the record when confirmed", () => {
      expect(deleteRecord(account, "site.com", true)).toBe("deleted");
      expect(account.records.size).toBe(0);
    });

    it("fails for an absent or empty resource", () => {
      expect(failureKind(() => deleteRecord(account, "ghost", true))).toBe("NotFound");
      expect(failureKind(() => deleteRecord(account, " ", true))).toBe("InvalidInput");
    });
  });
});
