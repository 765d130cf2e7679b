import { describe, it, expect, vi } from "vitest";
import { cacheKey, createQueryCache } from "./queryCache";
import type { ContractRecord } from "@/types/contrato";

describe("cacheKey", () => {
  it("ignores blank filters, formatting of the tax id and key order", () => {
    expect(
      cacheKey({
        agencyCode: " 26000 ",
        filters: { supplierTaxId: "12.345.678/0001-95", validityEndTo: "", minValue: 5 },
        pageLimit: 10,
      }),
    ).toBe(
      cacheKey({
        agencyCode: "26000",
        filters: { minValue: 5, supplierTaxId: "12345678000195" },
        pageLimit: 10,
      }),
    );
  });

  it("distinguishes different page caps", () => {
    const filters = {};
    expect(cacheKey({ agencyCode: "1", filters, pageLimit: 1 })).not.toBe(
      cacheKey({ agencyCode: "1", filters, pageLimit: 2 }),
    );
  });
});

describe("createQueryCache", () => {
  const key = { agencyCode: "26000", filters: {}, pageLimit: 5 };

  it("shares one load between concurrent identical calls", async () => {
    const cache = createQueryCache();
    const result: ContractRecord[] = [];
    const load = vi.fn(() => Promise.resolve(result));

    const [a, b] = await Promise.all([cache.get(key, load), cache.get(key, load)]);

    expect(load).toHaveBeenCalledTimes(1);
    expect(a).toBe(b);
    expect(cache.size).toBe(1);
  });

  it("evicts rejected loads and can be cleared", async () => {
    const cache = createQueryCache();

    await expect(cache.get(key, () => Promise.reject(new Error("falha")))).rejects.toThrow(
      "falha",
    );
    expect(cache.size).toBe(0);

    await cache.get(key, () => Promise.resolve([]));
    expect(cache.size).toBe(1);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
