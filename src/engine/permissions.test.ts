import { describe, it, expect } from "vitest";
import {
  LIMIT_ORDER_HOOK_PERMISSIONS,
  hookAddressFlags,
  validateHookAddress,
  validateHookPermissions,
} from "./permissions.js";
import { PoolError } from "../utils/errors.js";

describe("LIMIT_ORDER_HOOK_PERMISSIONS", () => {
  it("enables only afterInitialize and afterSwap", () => {
    const enabled = Object.entries(LIMIT_ORDER_HOOK_PERMISSIONS)
      .filter(([, on]) => on)
      .map(([flag]) => flag);
    expect(enabled).toEqual(["afterInitialize", "afterSwap"]);
  });

  it("declares all fourteen flags", () => {
    expect(Object.keys(LIMIT_ORDER_HOOK_PERMISSIONS)).toHaveLength(14);
    expect(() => validateHookPermissions(LIMIT_ORDER_HOOK_PERMISSIONS)).not.toThrow();
  });

  it("is frozen", () => {
    expect(Object.isFrozen(LIMIT_ORDER_HOOK_PERMISSIONS)).toBe(true);
  });
});

describe("validateHookPermissions", () => {
  it("rejects a return-delta flag without its callback", () => {
    expect(() =>
      validateHookPermissions({
        ...LIMIT_ORDER_HOOK_PERMISSIONS,
        afterSwap: false,
        afterSwapReturnDelta: true,
      })
    ).toThrow(PoolError);
  });
});

describe("hookAddressFlags", () => {
  it("maps afterInitialize and afterSwap to bits 12 and 6", () => {
    expect(hookAddressFlags(LIMIT_ORDER_HOOK_PERMISSIONS)).toBe(0x1040n);
  });
});

describe("validateHookAddress", () => {
  it("accepts an address whose low bits match the permissions", () => {
    expect(() =>
      validateHookAddress(
        "0xabcdef0000000000000000000000000000001040",
        LIMIT_ORDER_HOOK_PERMISSIONS
      )
    ).not.toThrow();
  });

  it("rejects an address with missing or extra flags", () => {
    expect(() =>
      validateHookAddress(
        "0x0000000000000000000000000000000000001000",
        LIMIT_ORDER_HOOK_PERMISSIONS
      )
    ).toThrow("expected 0x1040");
    expect(() =>
      validateHookAddress(
        "0x00000000000000000000000000000000000010c0",
        LIMIT_ORDER_HOOK_PERMISSIONS
      )
    ).toThrow(PoolError);
  });
});
