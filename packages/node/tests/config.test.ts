/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.VAULT_ADDRESS).toBe("0x000000000000000000000000000000000000ba17");
    expect(config.SWAP_FEE).toBe(0n);
    expect(config.MIN_POOL_BALANCE).toBe(1n);
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      ADMIN_ADDRESS: "0x00000000000000000000000000000000000000AB",
      MIN_POOL_BALANCE: "1000",
    });
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.ADMIN_ADDRESS).toBe("0x00000000000000000000000000000000000000ab");
    expect(config.MIN_POOL_BALANCE).toBe(1000n);
  });

  it("reads fees as decimal fractions", () => {
    const config = loadConfig({ SWAP_FEE: "0.003", FLASH_LOAN_FEE: "0.0001", WITHDRAW_FEE: "0" });
    expect(config.SWAP_FEE).toBe(3_000_000_000_000_000n);
    expect(config.FLASH_LOAN_FEE).toBe(100_000_000_000_000n);
    expect(config.WITHDRAW_FEE).toBe(0n);
  });

  it("throws on invalid PORT", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ PORT: "99999" })).toThrow();
  });

  it("throws on malformed addresses and fees", () => {
    expect(() => loadConfig({ VAULT_ADDRESS: "0x1234" })).toThrow();
    expect(() => loadConfig({ SWAP_FEE: "-0.1" })).toThrow();
    expect(() => loadConfig({ SWAP_FEE: "1%" })).toThrow();
    expect(() => loadConfig({ MIN_POOL_BALANCE: "1.5" })).toThrow();
  });
});
