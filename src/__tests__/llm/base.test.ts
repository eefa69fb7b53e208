import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  EndpointConfigSchema,
  describeErrorBody,
  parseJsonBody,
} from "../../llm/base.js";
import { MalformedResponseError } from "../../errors/index.js";

describe("parseJsonBody", () => {
  const schema = z.object({ value: z.number() });

  it("should return validated data", () => {
    expect(parseJsonBody('{"value": 3}', schema, "test")).toEqual({ value: 3 });
  });

  it("should reject invalid JSON with a preview", () => {
    const text = `not json ${"x".repeat(300)}`;

    try {
      parseJsonBody(text, schema, "test");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedResponseError);
      if (error instanceof MalformedResponseError) {
        expect(error.message).toBe("test: response is not valid JSON");
        expect(error.rawPreview).toHaveLength(200);
      }
    }
  });

  it("should reject JSON of the wrong shape", () => {
    expect(() => parseJsonBody('{"value": "3"}', schema, "test")).toThrow(
      /^test: unexpected response shape \(value: /
    );
  });
});

describe("describeErrorBody", () => {
  it("should read OpenAI-style error objects", () => {
    expect(
      describeErrorBody('{"error": {"message": "Rate limit reached", "type": "requests"}}')
    ).toBe("Rate limit reached (requests)");
    expect(describeErrorBody('{"error": {"message": "Bad model"}}')).toBe("Bad model");
  });

  it("should read plain string errors", () => {
    expect(describeErrorBody('{"error": "invalid api key"}')).toBe("invalid api key");
  });

  it("should return undefined for anything else", () => {
    expect(describeErrorBody("<html>502</html>")).toBeUndefined();
    expect(describeErrorBody('{"detail": "nope"}')).toBeUndefined();
  });
});

describe("EndpointConfigSchema", () => {
  it("should strip trailing slashes and default the timeout", () => {
    expect(
      EndpointConfigSchema.parse({ apiKey: "test-secret", baseUrl: "https://llm.test/v1//" })
    ).toEqual({ apiKey: "test-secret", baseUrl: "https://llm.test/v1", timeout: 30000 });
  });

  it("should reject empty keys, bad URLs and out-of-range timeouts", () => {
    expect(
      EndpointConfigSchema.safeParse({ apiKey: "", baseUrl: "https://llm.test" }).success
    ).toBe(false);
    expect(
      EndpointConfigSchema.safeParse({ apiKey: "test-secret", baseUrl: "llm.test" }).success
    ).toBe(false);
    expect(
      EndpointConfigSchema.safeParse({
        apiKey: "test-secret",
        baseUrl: "https://llm.test",
        timeout: 500,
      }).success
    ).toBe(false);
  });
});
