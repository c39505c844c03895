import { describe, it, expect } from "vitest";
import { ObjectId } from "mongodb";
import { idToString, parseTimestamp, toInteractionRecord } from "./records";

describe("idToString", () => {
  it("normalizes strings, numbers and ObjectIds", () => {
    expect(idToString("  user123 ")).toBe("user123");
    expect(idToString(42)).toBe("42");
    expect(idToString(new ObjectId("507f1f77bcf86cd799439011"))).toBe("507f1f77bcf86cd799439011");
  });

  it("returns null for blank or unsupported values", () => {
    expect(idToString("   ")).toBeNull();
    expect(idToString(undefined)).toBeNull();
    expect(idToString(Number.NaN)).toBeNull();
    expect(idToString({ id: 1 })).toBeNull();
  });
});

describe("parseTimestamp", () => {
  it("reads epoch seconds and milliseconds", () => {
    expect(parseTimestamp(1700000000)?.toISOString()).toBe("2023-11-14T22:13:20.000Z");
    expect(parseTimestamp(1700000000000)?.toISOString()).toBe("2023-11-14T22:13:20.000Z");
    expect(parseTimestamp("1700000000")?.toISOString()).toBe("2023-11-14T22:13:20.000Z");
  });

  it("reads ISO strings and dates", () => {
    expect(parseTimestamp("2024-01-02T03:04:05Z")?.toISOString()).toBe("2024-01-02T03:04:05.000Z");
    const date = new Date("2024-01-02T00:00:00Z");
    expect(parseTimestamp(date)).toBe(date);
  });

  it("returns null for unparseable values", () => {
    expect(parseTimestamp("yesterday")).toBeNull();
    expect(parseTimestamp(new Date("nope"))).toBeNull();
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp(1e20)).toBeNull();
    expect(parseTimestamp("100000000000000000000")).toBeNull();
  });
});

describe("toInteractionRecord", () => {
  it("maps the generic field names", () => {
    expect(
      toInteractionRecord({ user_id: "u1", item_id: "i1", timestamp: "2024-01-01T00:00:00Z" })
    ).toEqual({ userId: "u1", itemId: "i1", timestamp: new Date("2024-01-01T00:00:00Z") });
  });

  it("falls back to enrollment field aliases", () => {
    const course = new ObjectId("507f1f77bcf86cd799439011");
    const record = toInteractionRecord({ userId: 7, course_id: course, enrolledAt: 1700000000 });

    expect(record).toEqual({
      userId: "7",
      itemId: "507f1f77bcf86cd799439011",
      timestamp: new Date(1700000000000),
    });
  });

  it("treats an out-of-range epoch as undated", () => {
    expect(toInteractionRecord({ user_id: "u1", item_id: "i1", timestamp: 1e20 }).timestamp).toBeNull();
  });

  it("keeps missing fields as null", () => {
    expect(toInteractionRecord({ user_id: "", item_id: "i1" })).toEqual({
      userId: null,
      itemId: "i1",
      timestamp: null,
    });
  });
});
