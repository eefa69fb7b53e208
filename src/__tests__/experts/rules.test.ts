import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { loadFallbackRules, matchRule } from "../../experts/rules.js";
import {
  FileSystemError,
  SystemError,
  SystemErrorSubType,
} from "../../errors/index.js";

describe("loadFallbackRules", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "fallback-rules-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should load the bundled tables for every category", () => {
    const rules = loadFallbackRules();

    expect(rules.web_attack.rules[0]?.technique).toBe("SQL injection");
    expect(rules.web_attack.fallback.riskScore).toBe(5);
    expect(rules.vulnerability_attack.rules[0]?.riskScore).toBe(10);
    expect(rules.illegal_connection.fallback.technique).toBe("Suspicious connection");
  });

  it("should throw FileSystemError when the file is missing", () => {
    expect(() => loadFallbackRules(join(dir, "missing.json"))).toThrow(FileSystemError);
  });

  it("should throw a CONFIG SystemError for invalid JSON", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ not json", "utf-8");

    try {
      loadFallbackRules(path);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      if (error instanceof SystemError) {
        expect(error.subType).toBe(SystemErrorSubType.CONFIG);
      }
    }
  });

  it("should throw a CONFIG SystemError when a table is missing", async () => {
    const path = join(dir, "partial.json");
    const { web_attack, vulnerability_attack } = loadFallbackRules();
    await writeFile(path, JSON.stringify({ web_attack, vulnerability_attack }), "utf-8");

    expect(() => loadFallbackRules(path)).toThrow(/illegal_connection/);
  });
});

describe("matchRule", () => {
  const { web_attack: web, illegal_connection: illegal } = loadFallbackRules();

  it("should return the first matching rule and its indicator", () => {
    const match = matchRule(web, "' OR '1'='1");

    expect(match.rule.technique).toBe("SQL injection");
    expect(match.indicator).toBe("' or");
  });

  it("should check rules in table order", () => {
    const match = matchRule(web, "<script>alert(1)</script>");

    expect(match.rule.technique).toBe("Cross-site scripting (XSS)");
    expect(match.indicator).toBe("<script");
  });

  it("should match case-insensitively", () => {
    const match = matchRule(illegal, "Outbound BOTNET heartbeat");

    expect(match.rule.technique).toBe("Botnet activity");
    expect(match.indicator).toBe("botnet");
  });

  it("should use the table default when nothing matches", () => {
    const match = matchRule(illegal, "random traffic");

    expect(match.rule).toEqual(illegal.fallback);
    expect(match.indicator).toBeUndefined();
  });
});
