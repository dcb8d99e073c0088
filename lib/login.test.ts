import { describe, expect, it } from "vitest";
import { createAccount } from "@/lib/account";
import { isVaultError } from "@/lib/errors";
import { attemptsLeftMessage, LoginAttempts } from "@/lib/login";

const account = createAccount({ loginName: "carol", masterSecret: "password1" });

describe("LoginAttempts", () => {
  it("succeeds on the first correct secret", () => {
    const login = new LoginAttempts(account);
    expect(login.attempt("password1")).toEqual({ status: "success", account });
  });

  it("counts down two retries, then succeeds on the third try", () => {
    const login = new LoginAttempts(account);

    expect(login.attempt("wrong")).toEqual({ status: "retry", attemptsLeft: 2 });
    expect(login.attempt("Password1")).toEqual({ status: "retry", attemptsLeft: 1 });
    expect(login.attempt("password1")).toEqual({ status: "success", account });
  });

  it("fails after the third wrong secret and stays locked", () => {
    const login = new LoginAttempts(account);
    login.attempt("a");
    login.attempt("b");

    let third: unknown;
    try { login.attempt("c"); } catch (err) { third = err; }
    expect(isVaultError(third, "AuthenticationFailed")).toBe(true);
    expect(login.attemptsLeft).toBe(0);

    expect(() => login.attempt("password1")).toThrowError("Too many attempts.");
  });

  it("compares secrets exactly", () => {
    const login = new LoginAttempts(account);
    expect(login.attempt("password1 ").status).toBe("retry");
  });

  it("honours a custom limit", () => {
    const login = new LoginAttempts(account, 1);
    expect(() => login.attempt("nope")).toThrowError("Too many attempts.");
  });
});

describe("attemptsLeftMessage", () => {
  it("distinguishes two attempts from one", () => {
    expect(attemptsLeftMessage(2)).toBe("Wrong master password. 2 attempts left.");
    expect(attemptsLeftMessage(1)).toBe("Wrong master password. 1 attempt left.");
  });
});
