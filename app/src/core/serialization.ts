import {
  DecisionSchema,
  DecisionWithBacktestSchema,
  MeetingResultSchema,
  type Decision,
  type DecisionWithBacktest,
  type MeetingResult,
} from "@investment-desk/shared";
import type { z } from "zod";
import { InvalidInputError, toError } from "./errors";

// ============================================
// Decision Serialization
// ============================================

/**
 * JSON form of a decision or meeting result. Every number in these records
 * is finite, so JSON round-trips them exactly.
 */
export function serializeDecision(value: Decision | DecisionWithBacktest | MeetingResult, indent = 2): string {
  return JSON.stringify(value, null, indent);
}

export function parseDecision(json: string): Decision {
  return parseWith(DecisionSchema, json, "decision");
}

export function parseDecisionWithBacktest(json: string): DecisionWithBacktest {
  return parseWith(DecisionWithBacktestSchema, json, "decision");
}

export function parseMeetingResult(json: string): MeetingResult {
  return parseWith(MeetingResultSchema, json, "meeting result");
}

function parseWith<T extends z.ZodTypeAny>(schema: T, json: string, label: string): z.output<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new InvalidInputError(`Serialized ${label} is not valid JSON: ${toError(error).message}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new InvalidInputError(`Invalid ${label}: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}
