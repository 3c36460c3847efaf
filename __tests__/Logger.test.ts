import { describe, expect, it } from "vitest";
import type { LogLevel } from "../server/lib/config";
import { createLogger, redactSecrets } from "../server/lib/logger";

function capture() {
  const lines: { level: LogLevel; line: string }[] = [];
  return { lines, sink: (level: LogLevel, line: string) => lines.push({ level, line }) };
}

describe("createLogger", () => {
  it("writes scoped text lines with key=value metadata", () => {
    const { lines, sink } = capture();
    const logger = createLogger("api", { sink });

    logger.info("events fetched", { subject: "cust-42", count: 3 });

    expect(lines).toEqual([{ level: "info", line: "[api] events fetched subject=cust-42 count=3" }]);
  });

  it("drops lines below the configured level", () => {
    const { lines, sink } = capture();
    const logger = createLogger("api", { level: "warn", sink });

    logger.debug("noise");
    logger.info("more noise");
    logger.warn("kept");

    expect(lines.map((l) => l.line)).toEqual(["[api] kept"]);
  });

  it("prefixes child scopes", () => {
    const { lines, sink } = capture();
    createLogger("api", { sink }).child("events").error("boom", { error: new Error("socket hang up") });
    expect(lines[0]?.line).toBe("[api:events] boom error=socket hang up");
  });

  it("emits JSON lines in json format", () => {
    const { lines, sink } = capture();
    createLogger("api", { format: "json", sink }).warn("slow request", { ms: 4200 });

    const parsed: unknown = JSON.parse(lines[0]?.line ?? "");
    expect(parsed).toMatchObject({ level: "warn", scope: "api", message: "slow request", ms: 4200 });
    expect(parsed).toHaveProperty("timestamp");
  });

  it("never prints configured secret values", () => {
    const { lines, sink } = capture();
    const logger = createLogger("api", { sink, secrets: ["test-secret-value"] });

    logger.error("upstream said test-secret-value was wrong");

    expect(lines[0]?.line).toBe("[api] upstream said *** was wrong");
  });
});

describe("redactSecrets", () => {
  it("masks bearer tokens", () => {
    expect(redactSecrets("Authorization header Bearer abc.def.ghi sent")).toBe("Authorization header Bearer *** sent");
  });

  it("masks key=value credentials", () => {
    expect(redactSecrets("password=hunter2&page=1")).toBe("password=***&page=1");
    expect(redactSecrets('{"api_key": "xyz"}')).toBe('{"api_key": "***"}');
  });

  it("masks request signatures", () => {
    expect(redactSecrets(`sig v0=${"a".repeat(64)}`)).toBe("sig v0=***");
  });
});
