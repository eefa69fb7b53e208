import { z } from "zod";
import { ValidationError } from "./errors/index.js";

const MAX_PAYLOAD_LENGTH = 10000;
const MAX_MESSAGE_LENGTH = 4000;
const MAX_SOURCE_NAME_LENGTH = 100;

/** Default source address when an alert does not carry one */
export const UNKNOWN_SOURCE_IP = "0.0.0.0";

const IpSchema = z.string().trim().ip();

export const AlertSchema = z.object({
  payload: z
    .string()
    .trim()
    .min(1, "Payload cannot be empty")
    .max(MAX_PAYLOAD_LENGTH, `Payload too long (maximum ${MAX_PAYLOAD_LENGTH} characters)`),
  sourceIp: IpSchema.default(UNKNOWN_SOURCE_IP),
  targetIp: IpSchema.optional(),
  attackType: z.string().trim().min(1).max(100).optional(),
  protocol: z.string().trim().min(1).max(20).optional(),
});
export type Alert = z.infer<typeof AlertSchema>;
export type AlertInput = z.input<typeof AlertSchema>;

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  error?: string;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message
    )
    .join("; ");
}

/**
 * Validate an alert at the boundary
 * @throws ValidationError naming the first invalid field
 */
export function parseAlert(input: unknown): Alert {
  const result = AlertSchema.safeParse(input);
  if (!result.success) {
    const field = result.error.issues[0]?.path.join(".") ?? "alert";
    const details = describeIssues(result.error);
    throw new ValidationError(
      `Invalid alert: ${details}`,
      field || "alert",
      `❌ Invalid alert: ${details}`
    );
  }
  return result.data;
}

const COMMAND_OPTIONS = {
  ip: "sourceIp",
  target: "targetIp",
  type: "attackType",
  proto: "protocol",
} as const;

type CommandOption = keyof typeof COMMAND_OPTIONS;

function isCommandOption(key: string): key is CommandOption {
  return Object.prototype.hasOwnProperty.call(COMMAND_OPTIONS, key);
}

/**
 * Parse "/analyze [ip=..] [target=..] [type=..] [proto=..] <payload>" arguments
 * @remarks Options are only recognised before the payload starts
 * @example
 * parseAnalyzeCommand("ip=10.0.0.5 ' OR '1'='1")
 * // { success: true, data: { payload: "' OR '1'='1", sourceIp: "10.0.0.5" } }
 */
export function parseAnalyzeCommand(args: string): ValidationResult<Alert> {
  const fields: Record<string, string> = {};
  let rest = args.trim();

  for (;;) {
    const match = /^([a-z]+)=(\S+)(?:\s+|$)/i.exec(rest);
    const key = match?.[1]?.toLowerCase();
    const value = match?.[2];
    if (!match || key === undefined || value === undefined || !isCommandOption(key)) {
      break;
    }
    fields[COMMAND_OPTIONS[key]] = value;
    rest = rest.slice(match[0].length);
  }

  const result = AlertSchema.safeParse({ ...fields, payload: rest });
  if (!result.success) {
    return { success: false, error: describeIssues(result.error) };
  }
  return { success: true, data: result.data };
}

/**
 * Parse "/upload [source=<name>] <text>" arguments
 */
export function parseUploadCommand(
  args: string
): ValidationResult<{ sourceName: string; text: string }> {
  const match = /^source=(\S+)(?:\s+|$)/i.exec(args.trim());
  const sourceName = match?.[1] ?? "chat-upload";
  const text = match ? args.trim().slice(match[0].length) : args.trim();

  if (sourceName.length > MAX_SOURCE_NAME_LENGTH) {
    return { success: false, error: "Source name too long" };
  }
  if (!/^[\w.-]+$/.test(sourceName)) {
    return { success: false, error: "Source name contains invalid characters" };
  }
  if (text.trim().length === 0) {
    return { success: false, error: "Document text cannot be empty" };
  }

  return { success: true, data: { sourceName, text } };
}

/**
 * Validate a free-text question
 */
export function validateQuestion(message: unknown): ValidationResult<string> {
  if (typeof message !== "string") {
    return { success: false, error: "Message must be a string" };
  }

  const trimmed = message.trim();
  if (trimmed.length === 0) {
    return { success: false, error: "Question cannot be empty" };
  }

  if (trimmed.length > MAX_MESSAGE_LENGTH) {
    return {
      success: false,
      error: `Message too long (maximum ${MAX_MESSAGE_LENGTH} characters)`,
    };
  }

  return { success: true, data: trimmed };
}

/**
 * Collapse whitespace and strip angle brackets before echoing text back
 */
export function sanitizeMessage(
  message: string,
  maxLength: number = MAX_MESSAGE_LENGTH
): string {
  return message
    .trim()
    // Remove <> first, then collapse the spaces that may leave behind
    .replace(/[<>]/g, "")
    .replace(/\s+/g, " ")
    .substring(0, maxLength);
}
