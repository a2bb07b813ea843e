import { describe, it, expect } from "vitest";
import { parseRfc2822, toUnixSeconds } from "../time-parser";

describe("time-parser", () => {
  describe("parseRfc2822", () => {
    it("converts a numeric offset to UTC", () => {
      const result = parseRfc2822("Mon, 02 Jan 2006 15:04:05 -0700");
      // 15:04:05 at -07:00 = 22:04:05 UTC
      expect(result?.toISOString()).toBe("2006-01-02T22:04:05.000Z");
    });

    it("accepts the format without a weekday and with a GMT zone", () => {
      const result = parseRfc2822("16 Oct 2021 17:46:42 GMT");
      expect(result?.toISOString()).toBe("2021-10-16T17:46:42.000Z");
    });

    it("keeps positive offsets on the same instant", () => {
      const result = parseRfc2822("Sat, 01 Jan 2022 09:30:00 +0930");
      expect(result?.toISOString()).toBe("2022-01-01T00:00:00.000Z");
    });

    it("returns null for garbage", () => {
      expect(parseRfc2822("not-a-date")).toBeNull();
    });

    it("returns null for ISO 8601 strings", () => {
      expect(parseRfc2822("2021-10-16T17:46:42Z")).toBeNull();
    });

    it("returns null for an empty string", () => {
      expect(parseRfc2822("")).toBeNull();
    });
  });

  describe("toUnixSeconds", () => {
    it("truncates milliseconds", () => {
      expect(toUnixSeconds(1_700_000_000_999)).toBe(1_700_000_000);
    });

    it("keeps whole seconds unchanged", () => {
      expect(toUnixSeconds(1_136_239_445_000)).toBe(1_136_239_445);
    });
  });
});
