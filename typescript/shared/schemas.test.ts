import { describe, it, expect } from "vitest";
import { AuditRequestSchema, CliOptionsSchema, validateRequest } from "./schemas.js";

describe("AuditRequestSchema", () => {
  describe("valid requests", () => {
    it("accepts valid request with all fields", () => {
      const result = AuditRequestSchema.safeParse({
        url: "https://example.com",
        mode: "full",
        max_pages: 20,
      });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.url).toBe("https://example.com");
        expect(result.data.mode).toBe("full");
        expect(result.data.max_pages).toBe(20);
      }
    });

    it("defaults to a single-page audit", () => {
      const result = AuditRequestSchema.safeParse({
        url: "https://example.com",
      });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.mode).toBe("single");
        expect(result.data.max_pages).toBeUndefined();
      }
    });

    it("accepts boundary max_pages values", () => {
      expect(AuditRequestSchema.safeParse({ url: "a", max_pages: 1 }).success).toBe(true);
      expect(AuditRequestSchema.safeParse({ url: "a", max_pages: 100 }).success).toBe(true);
    });
  });

  describe("invalid requests", () => {
    it("rejects missing url", () => {
      const result = AuditRequestSchema.safeParse({ mode: "full" });
      expect(result.success).toBe(false);
    });

    it("rejects empty url", () => {
      const result = AuditRequestSchema.safeParse({ url: "" });
      expect(result.success).toBe(false);
    });

    it("rejects unknown modes", () => {
      const result = AuditRequestSchema.safeParse({
        url: "https://example.com",
        mode: "deep",
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].message).toBe("mode must be 'single' or 'full'");
      }
    });

    it("rejects max_pages out of range", () => {
      expect(AuditRequestSchema.safeParse({ url: "a", max_pages: 0 }).success).toBe(false);
      expect(AuditRequestSchema.safeParse({ url: "a", max_pages: 101 }).success).toBe(false);
    });

    it("rejects non-integer max_pages", () => {
      const result = AuditRequestSchema.safeParse({
        url: "https://example.com",
        max_pages: 2.5,
      });
      expect(result.success).toBe(false);
    });

    it("rejects URL that is too long", () => {
      const result = AuditRequestSchema.safeParse({
        url: "a".repeat(2049),
      });
      expect(result.success).toBe(false);
    });
  });
});

describe("CliOptionsSchema", () => {
  it("coerces numeric strings", () => {
    const result = CliOptionsSchema.safeParse({ mode: "full", maxPages: "12", concurrency: "3" });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ mode: "full", maxPages: 12, concurrency: 3 });
    }
  });

  it("rejects a concurrency of zero", () => {
    expect(CliOptionsSchema.safeParse({ concurrency: "0" }).success).toBe(false);
  });
});

describe("validateRequest", () => {
  it("returns success with data for valid input", () => {
    const result = validateRequest(AuditRequestSchema, {
      url: "https://example.com",
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.url).toBe("https://example.com");
    }
  });

  it("returns formatted error for invalid input", () => {
    const result = validateRequest(AuditRequestSchema, {
      url: "https://example.com",
      max_pages: 0,
    });
    expect(result).toEqual({
      success: false,
      error: "max_pages: max_pages must be at least 1",
    });
  });
});
