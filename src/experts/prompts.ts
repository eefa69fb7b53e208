import type { Category } from "../router/types.js";
import type { Alert } from "../validation.js";

/** Payload characters included in a prompt */
export const MAX_PROMPT_PAYLOAD_LENGTH = 500;

export const EXPERT_SYSTEM_PROMPT =
  "You are a security analysis assistant. Reply with a single JSON object and nothing else.";

interface ExpertPromptTemplate {
  readonly role: string;
  readonly payloadLabel: string;
  readonly steps: readonly string[];
  readonly scale: { readonly high: string; readonly medium: string; readonly low: string };
  readonly example: string;
}

const TEMPLATES: Readonly<Record<Category, ExpertPromptTemplate>> = {
  web_attack: {
    role: "You are a senior web security analyst familiar with the OWASP Top 10 and common web attack techniques.",
    payloadLabel: "Payload",
    steps: [
      "Identify the technique (SQL injection, XSS, CSRF, SSRF, file inclusion, path traversal, ...) and the related MITRE ATT&CK technique id.",
      "Rate the risk from 0 to 10.",
      "Give at least three defensive recommendations, most important first.",
    ],
    scale: {
      high: "direct system access, bulk data theft, remote code execution",
      medium: "partial data theft, authentication bypass, availability impact",
      low: "information disclosure, low-impact misconfiguration, needs special conditions",
    },
    example: "UNION-based SQL injection",
  },
  vulnerability_attack: {
    role: "You are a senior vulnerability exploitation analyst familiar with the CVE catalogue and exploitation frameworks.",
    payloadLabel: "Payload",
    steps: [
      "Identify the vulnerability class (buffer overflow, command injection, deserialization, file upload, ...) and any matching CVE id.",
      "Describe the exploitation chain and the attacker's goal (privilege escalation, persistence, lateral movement).",
      "Rate the risk from 0 to 10.",
      "Give at least three remediation and hardening recommendations, most important first.",
    ],
    scale: {
      high: "unauthenticated remote code execution or escalation to root/SYSTEM",
      medium: "needs authentication, local privilege escalation, information disclosure",
      low: "denial of service, complex preconditions, limited value to an attacker",
    },
    example: "Log4j JNDI remote code execution",
  },
  illegal_connection: {
    role: "You are a senior network threat intelligence analyst who recognises C2 traffic, data exfiltration and lateral movement.",
    payloadLabel: "Connection payload / traffic features",
    steps: [
      "Classify the connection (C2, reverse shell, exfiltration, tunnelling, DGA domain, lateral movement, ...).",
      "Attribute the traffic to known tooling or groups where the features allow it.",
      "Rate the risk from 0 to 10.",
      "Give at least three incident response recommendations, most urgent first.",
    ],
    scale: {
      high: "established C2 channel, ongoing exfiltration, internal lateral movement",
      medium: "DNS tunnelling, suspicious heartbeat traffic, anomalous encrypted flows",
      low: "scanning, low-frequency suspicious connections, likely false positive",
    },
    example: "Cobalt Strike beacon C2 traffic",
  },
};

/**
 * Build the analysis prompt for one category
 * @remarks The payload is cut to MAX_PROMPT_PAYLOAD_LENGTH characters
 */
export function buildExpertPrompt(category: Category, alert: Alert): string {
  const template = TEMPLATES[category];
  const steps = template.steps.map((step, i) => `${i + 1}. ${step}`).join("\n");

  return `${template.role}

Alert:
- Declared attack type: ${alert.attackType ?? "unknown"}
- ${template.payloadLabel}: ${alert.payload.slice(0, MAX_PROMPT_PAYLOAD_LENGTH)}
- Source IP: ${alert.sourceIp}
- Target IP: ${alert.targetIp ?? "unknown"}${alert.protocol ? `\n- Protocol: ${alert.protocol}` : ""}

Analyse it step by step:
${steps}

Risk scale:
- 9-10: ${template.scale.high}
- 6-8: ${template.scale.medium}
- 1-5: ${template.scale.low}

Return only JSON in this shape:
{
  "attack_technique": "specific technique, e.g. ${template.example}",
  "risk_score": 8,
  "recommendations": ["first", "second", "third"],
  "analysis": "how the attack works, its likely impact and the attacker's intent"
}`;
}
