import { describe, expect, it } from "vitest";

import {
  compareTiers,
  isSecurityTier,
  maxTier,
  minTier,
  parseSecurityTier,
  securityTierSchema,
} from "../tiers";

describe("security tiers", () => {
  it("should order tiers from T0 to T4", () => {
    expect(compareTiers("T0", "T4")).toBeLessThan(0);
    expect(compareTiers("T3", "T1")).toBeGreaterThan(0);
    expect(compareTiers("T2", "T2")).toBe(0);
  });

  it("should pick the riskier and safer tier", () => {
    expect(maxTier("T1", "T3")).toBe("T3");
    expect(minTier("T1", "T3")).toBe("T1");
  });

  it("should parse tiers case-insensitively", () => {
    expect(parseSecurityTier("t2")).toBe("T2");
    expect(parseSecurityTier(" T4 ")).toBe("T4");
    expect(parseSecurityTier("T5")).toBeUndefined();
  });

  it("should guard unknown values", () => {
    expect(isSecurityTier("T0")).toBe(true);
    expect(isSecurityTier("t0")).toBe(false);
    expect(isSecurityTier(0)).toBe(false);
  });

  it("should normalize tiers in the schema", () => {
    expect(securityTierSchema.parse("t3")).toBe("T3");
    expect(securityTierSchema.safeParse("high").success).toBe(false);
  });
});
