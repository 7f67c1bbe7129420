import { describe, it, expect } from "vitest";
import { DurationSchema, HostSchema, PingctlConfigSchema } from "../schema.js";

describe("DurationSchema", () => {
  it("converts duration strings to milliseconds", () => {
    expect(DurationSchema.parse("45s")).toBe(45_000);
    expect(DurationSchema.parse("2h")).toBe(7_200_000);
  });

  it("reports parse failures as issues", () => {
    const result = DurationSchema.safeParse("1.5m");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe(
        'Decimal values are not supported in duration "1.5m". Use integers only (e.g., "90s" instead of "1.5m")'
      );
    }
  });
});

describe("HostSchema", () => {
  it.each(["ops.example.test", "10.0.0.5", "ops-01.lab:8443"])("accepts %s", (host) => {
    expect(HostSchema.safeParse(host).success).toBe(true);
  });

  it.each(["https://ops.example.test", "ops.example.test/suite-api", ""])(
    "rejects %s",
    (host) => {
      expect(HostSchema.safeParse(host).success).toBe(false);
    }
  );
});

describe("PingctlConfigSchema", () => {
  const base = {
    operations: { host: "ops.example.test", auth: { username: "u", password: "test-secret" } },
  };

  it("accepts an optional auth source", () => {
    const config = PingctlConfigSchema.parse({
      ...base,
      operations: { ...base.operations, auth: { ...base.operations.auth, auth_source: "local" } },
    });

    expect(config.operations.auth.auth_source).toBe("local");
  });

  it("rejects an unsupported version", () => {
    expect(PingctlConfigSchema.safeParse({ ...base, version: 2 }).success).toBe(false);
  });

  it("rejects a negative retry count", () => {
    const result = PingctlConfigSchema.safeParse({
      ...base,
      operations: { ...base.operations, retry: { max_retries: -1 } },
    });

    expect(result.success).toBe(false);
  });
});
