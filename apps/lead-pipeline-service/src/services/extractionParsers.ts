import { z } from "zod";
import { ExtractionOutcome, extracted, malformed } from "./extraction";

// ============================================================================
// SCHEMAS (one per extraction call site)
// ============================================================================

export const NameListSchema = z.array(z.string());

export const ContactInfoSchema = z.object({
  linkedin: z.string().nullish(),
  email: z.string().nullish(),
  location: z.string().nullish(),
});

export type ContactInfo = z.infer<typeof ContactInfoSchema>;

// ============================================================================
// PARSERS
// ============================================================================

/**
 * Parse model text as JSON and validate it against a schema.
 * Bad JSON and shape mismatches both come back as "malformed".
 */
export function parseJsonOutcome<T>(
  outcome: ExtractionOutcome<string>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): ExtractionOutcome<T> {
  if (outcome.status !== "ok") return outcome;

  let json: unknown;
  try {
    json = JSON.parse(outcome.value);
  } catch (error) {
    const reason = error instanceof SyntaxError ? error.message : String(error);
    return malformed(`Invalid JSON: ${reason}`);
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return malformed(`Validation failed: ${issues}`);
  }
  return extracted(result.data);
}

export function parseNameList(outcome: ExtractionOutcome<string>, limit: number): ExtractionOutcome<string[]> {
  const parsed = parseJsonOutcome(outcome, NameListSchema);
  if (parsed.status !== "ok") return parsed;

  const names = parsed.value.map(n => n.trim()).filter(n => n.length > 0);
  return extracted(names.slice(0, limit));
}

export function parseContactInfo(outcome: ExtractionOutcome<string>): ExtractionOutcome<ContactInfo> {
  return parseJsonOutcome(outcome, ContactInfoSchema);
}

/**
 * First integer in the text
 */
export function parseScore(outcome: ExtractionOutcome<string>): ExtractionOutcome<number> {
  if (outcome.status !== "ok") return outcome;

  const match = outcome.value.match(/\d+/);
  if (!match) return malformed("No integer in response");
  return extracted(parseInt(match[0], 10));
}
