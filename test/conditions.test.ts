import { describe, expect, it } from "vitest";
import { combineConditions, evaluateCondition, parseCondition } from "../src/deps/condition.js";
import { formatVars, normalizeUrl, splitPinnedUrl } from "../src/deps/url.js";

const REV_A = "a".repeat(40);

describe("condition evaluator", () => {
  it("evaluates boolean variables", () => {
    const vars = { checkout_linux: true, checkout_android: false };
    expect(evaluateCondition("checkout_linux and not checkout_android", vars)).toBe("true");
    expect(evaluateCondition("checkout_android or False", vars)).toBe("false");
  });

  it("compares strings", () => {
    expect(evaluateCondition('host_os == "linux"', { host_os: "linux" })).toBe("true");
    expect(evaluateCondition('host_os != "linux"', { host_os: "linux" })).toBe("false");
  });

  it("is unknown when an unset variable decides the outcome", () => {
    expect(evaluateCondition("checkout_ios", {})).toBe("unknown");
    expect(evaluateCondition('host_os == "mac" or checkout_mac', { host_os: "linux" })).toBe("unknown");
    expect(evaluateCondition("not checkout_ios", {})).toBe("unknown");
  });

  it("lets a known side decide over an unknown one", () => {
    expect(evaluateCondition("checkout_ios and checkout_linux", { checkout_linux: false })).toBe("false");
    expect(evaluateCondition("checkout_ios or checkout_linux", { checkout_linux: true })).toBe("true");
  });

  it("evaluates a string variable as a nested condition", () => {
    const vars = { checkout_openxr: "checkout_win", checkout_win: false, checkout_linux: true };
    expect(evaluateCondition("checkout_openxr", vars)).toBe("false");
    expect(evaluateCondition("not checkout_openxr", vars)).toBe("true");
    expect(
      evaluateCondition("checkout_instrumented_libraries", {
        checkout_instrumented_libraries: "checkout_linux and use_instrumented",
        checkout_linux: true,
        use_instrumented: false,
      }),
    ).toBe("false");
    expect(evaluateCondition("checkout_openxr", { checkout_openxr: "checkout_win" })).toBe("unknown");
  });

  it("compares a string variable that is not an expression as text", () => {
    expect(evaluateCondition('mirror == "https://example.com/git"', { mirror: "https://example.com/git" })).toBe("true");
    expect(evaluateCondition('host_os == "linux"', { host_os: "linux" })).toBe("true");
  });

  it("treats an undeclared name that is not a target variable as its own name", () => {
    expect(evaluateCondition('arch == "arm64"', { arch: "arm64" })).toBe("true");
    expect(evaluateCondition("undeclared_flag", {})).toBe("true");
  });

  it("rejects cyclic variable references", () => {
    expect(() => evaluateCondition("a", { a: "b", b: "a" })).toThrow("Cyclic reference to variable a in condition (at a -> b)");
  });

  it("binds and tighter than or", () => {
    expect(parseCondition("a or b and c")).toEqual({
      type: "or",
      left: { type: "var", name: "a" },
      right: { type: "and", left: { type: "var", name: "b" }, right: { type: "var", name: "c" } },
    });
  });

  it("rejects malformed expressions", () => {
    expect(() => parseCondition("a and")).toThrow("Expected a condition operand, found end of input (at 1:6)");
    expect(() => parseCondition("a b")).toThrow(/Unexpected trailing input/);
  });

  it("combines parent and child conditions", () => {
    expect(combineConditions("checkout_v8", "checkout_zlib or x")).toBe("(checkout_v8) and (checkout_zlib or x)");
    expect(combineConditions(undefined, "x")).toBe("x");
    expect(combineConditions("x", undefined)).toBe("x");
    expect(combineConditions(undefined, undefined)).toBeUndefined();
  });
});

describe("dependency urls", () => {
  it("formats vars and keeps escaped braces", () => {
    expect(formatVars("{host}/repo.git@{{x}}", { host: "https://h" }, "deps")).toBe("https://h/repo.git@{x}");
    expect(formatVars("{flag}", { flag: true }, "deps")).toBe("True");
  });

  it("rejects undefined vars", () => {
    expect(() => formatVars("{missing}/x", {}, 'deps["src/a"]')).toThrow('Undefined variable {missing} (at deps["src/a"])');
  });

  it("splits at the last @", () => {
    expect(splitPinnedUrl(`https://git@example.com/a.git@${REV_A}`, "x")).toEqual({
      url: "https://git@example.com/a.git",
      rev: REV_A,
    });
  });

  it("requires a full commit id", () => {
    expect(() => splitPinnedUrl("https://example.com/a.git", "x")).toThrow(/not pinned to a revision/);
    expect(() => splitPinnedUrl("https://example.com/a.git@refs/heads/main", "x")).toThrow(/not pinned to a commit id/);
    expect(() => splitPinnedUrl("https://example.com/a.git@ABCDEF", "x")).toThrow(/not pinned to a commit id/);
  });

  it("normalizes fetch decorations", () => {
    expect(normalizeUrl(" git+https://user@example.com/a.git/ ")).toBe("https://example.com/a.git");
    expect(normalizeUrl("https://example.com/a.git")).toBe("https://example.com/a.git");
  });
});
