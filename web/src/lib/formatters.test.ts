import { describe, it, expect } from "vitest";
import { cnpjToParam, formatCNPJ, formatCurrency, formatDate } from "./formatters";

describe("formatters", () => {
  it("formats CNPJ digits and leaves other lengths alone", () => {
    expect(formatCNPJ("12345678000195")).toBe("12.345.678/0001-95");
    expect(formatCNPJ("12.345.678/0001-95")).toBe("12.345.678/0001-95");
    expect(formatCNPJ("123.456.789-09")).toBe("123.456.789-09");
    expect(cnpjToParam("12.345.678/0001-95")).toBe("12345678000195");
  });

  it("renders missing values as a dash", () => {
    expect(formatCurrency(null)).toBe("—");
    expect(formatDate(null)).toBe("—");
  });

  it("formats ISO dates as DD/MM/YYYY", () => {
    expect(formatDate("2024-03-05")).toBe("05/03/2024");
  });

  it("formats currency in BRL", () => {
    expect(formatCurrency(1234.5)).toMatch(/^R\$\s1\.234,50$/);
  });
});
