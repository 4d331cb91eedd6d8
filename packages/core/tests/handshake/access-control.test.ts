import { describe, expect, it } from "vitest";
import { AllowList, allowAny } from "../../src/handshake/access-control.js";

describe("access control", () => {
  it("should allow any value", () => {
    expect(allowAny.isAllowed("")).toBe(true);
    expect(allowAny.isAllowed("https://example.com")).toBe(true);
  });

  it("should allow only listed values", () => {
    const policy = new AllowList(["localhost:8080", "https://example.com"]);
    expect(policy.isAllowed("localhost:8080")).toBe(true);
    expect(policy.isAllowed("https://example.com")).toBe(true);
    expect(policy.isAllowed("https://example.com/")).toBe(false);
    expect(policy.isAllowed("LOCALHOST:8080")).toBe(false);
  });
});
