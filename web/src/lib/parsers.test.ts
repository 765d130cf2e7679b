import { describe, it, expect } from "vitest";
import { localCalendarDate, parseCalendarDate, parseDecimal, parseText } from "./parsers";

describe("parseCalendarDate", () => {
  it("accepts ISO dates and keeps only the date part of timestamps", () => {
    expect(parseCalendarDate("2024-02-29")).toBe("2024-02-29");
    expect(parseCalendarDate("2024-03-05T10:20:30Z")).toBe("2024-03-05");
    expect(parseCalendarDate("2024-03-05T10:20:30.123-03:00")).toBe("2024-03-05");
    expect(parseCalendarDate(" 2024-03-05 ")).toBe("2024-03-05");
  });

  it("accepts DD/MM/YYYY", () => {
    expect(parseCalendarDate("05/03/2024")).toBe("2024-03-05");
  });

  it("returns null for impossible or unreadable dates", () => {
    expect(parseCalendarDate("2023-02-29")).toBeNull();
    expect(parseCalendarDate("2024-13-01")).toBeNull();
    expect(parseCalendarDate("31/04/2024")).toBeNull();
    expect(parseCalendarDate("ontem")).toBeNull();
    expect(parseCalendarDate("")).toBeNull();
    expect(parseCalendarDate(20240305)).toBeNull();
    expect(parseCalendarDate(null)).toBeNull();
  });
});

describe("parseDecimal", () => {
  it("passes finite numbers through", () => {
    expect(parseDecimal(10)).toBe(10);
    expect(parseDecimal(-2.5)).toBe(-2.5);
    expect(parseDecimal(Number.NaN)).toBeNull();
    expect(parseDecimal(Number.POSITIVE_INFINITY)).toBeNull();
  });

  it("reads plain and Brazilian notation", () => {
    expect(parseDecimal("1234.56")).toBe(1234.56);
    expect(parseDecimal("1.234,56")).toBe(1234.56);
    expect(parseDecimal("R$ 1.234.567,89")).toBe(1234567.89);
    expect(parseDecimal("-12,5")).toBe(-12.5);
  });

  it("reads dot-grouped thousands as pt-BR", () => {
    expect(parseDecimal("R$ 1.500")).toBe(1500);
    expect(parseDecimal("1.000")).toBe(1000);
    expect(parseDecimal("1.000.000")).toBe(1000000);
    expect(parseDecimal("1.000,50")).toBe(1000.5);
    expect(parseDecimal("R$ 250")).toBe(250);
    expect(parseDecimal("12.5")).toBe(12.5);
  });

  it("does not read a decimal point after an R$ prefix", () => {
    expect(parseDecimal("R$ 1234.56")).toBeNull();
  });

  it("returns null for anything else", () => {
    expect(parseDecimal("12a")).toBeNull();
    expect(parseDecimal("1,234.56")).toBeNull();
    expect(parseDecimal("")).toBeNull();
    expect(parseDecimal(null)).toBeNull();
    expect(parseDecimal({ valor: 1 })).toBeNull();
  });
});

describe("parseText", () => {
  it("trims strings and stringifies numeric codes", () => {
    expect(parseText("  abc ")).toBe("abc");
    expect(parseText(150002)).toBe("150002");
  });

  it("treats blank strings and non-scalars as missing", () => {
    expect(parseText("   ")).toBeNull();
    expect(parseText({})).toBeNull();
    expect(parseText(true)).toBeNull();
  });
});

describe("localCalendarDate", () => {
  it("formats the local calendar day", () => {
    expect(localCalendarDate(new Date(2024, 0, 5, 23, 59))).toBe("2024-01-05");
  });
});
