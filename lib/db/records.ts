import { ObjectId } from "mongodb";
import type { InteractionRecord } from "@/lib/recs/types";

// Field aliases, first match wins. Enrollment/view documents use course_id
// and enrolledAt/viewedAt instead of the generic names.
const USER_FIELDS = ["user_id", "userId"] as const;
const ITEM_FIELDS = ["item_id", "itemId", "course_id"] as const;
const TIME_FIELDS = ["timestamp", "enrolledAt", "viewedAt"] as const;

// Epoch values below this are seconds, above are milliseconds
const SECONDS_CUTOFF = 1e11;

/**
 * Normalize an identifier: strings are trimmed, ObjectIds and numbers stringified
 */
export function idToString(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (value instanceof ObjectId) return value.toHexString();
  return null;
}

export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    const date = new Date(value < SECONDS_CUTOFF ? value * 1000 : value);
    // Finite but outside the Date range
    return Number.isNaN(date.getTime()) ? null : date;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const trimmed = value.trim();
    if (/^\d+(\.\d+)?$/.test(trimmed)) return parseTimestamp(Number(trimmed));
    const ms = Date.parse(trimmed);
    return Number.isNaN(ms) ? null : new Date(ms);
  }
  return null;
}

function firstPresent(doc: Record<string, unknown>, fields: readonly string[]): unknown {
  for (const field of fields) {
    const value = doc[field];
    if (value !== undefined && value !== null && value !== "") return value;
  }
  return undefined;
}

/**
 * Map a stored document or CSV row to a raw interaction record.
 * Missing ids stay null; validation happens at training time.
 */
export function toInteractionRecord(doc: Record<string, unknown>): InteractionRecord {
  return {
    userId: idToString(firstPresent(doc, USER_FIELDS)),
    itemId: idToString(firstPresent(doc, ITEM_FIELDS)),
    timestamp: parseTimestamp(firstPresent(doc, TIME_FIELDS)),
  };
}
