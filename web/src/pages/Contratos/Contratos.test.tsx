// Tests for the Contratos page.
//
// Strategy:
// - A fake pipeline stands in for the portal so each state can be driven
//   directly: idle, loading with progress, success, empty and error.
// - One test wires the real pipeline to an in-process transport to check
//   that validation errors surface before any request is made.

import { describe, it, expect, vi, beforeEach } from "vitest";
import { render, screen, fireEvent } from "@testing-library/react";
import { MemoryRouter } from "react-router-dom";
import { emptyContractRecord } from "@/lib/contractFields";
import { createContratosPipeline, type ContratosPipeline } from "@/services/pipeline";
import { UpstreamError } from "@/types/api";
import type { ContractRecord } from "@/types/contrato";
import { TEST_CONFIG, pagedTransport } from "@/test/fixtures";
import { Contratos } from "./Contratos";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const CONTRATO_FIXTURE: ContractRecord = {
  ...emptyContractRecord(),
  id: "1234567",
  contractNumber: "00012/2024",
  objectDescription: "Prestação de serviços de limpeza",
  status: "Vigente",
  finalValue: 175000.75,
  validityStart: "2024-01-15",
  validityEnd: "2026-01-15",
  supplierName: "EMPRESA TESTE LTDA",
  supplierTaxId: "12345678000195",
  executingUnitCode: "150002",
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const fetchAndNormalize = vi.fn<ContratosPipeline["fetchAndNormalize"]>();
const fakePipeline: ContratosPipeline = { fetchAndNormalize };

function renderContratos(pipeline: ContratosPipeline = fakePipeline) {
  return render(
    <MemoryRouter>
      <Contratos pipeline={pipeline} defaultPageLimit={50} />
    </MemoryRouter>,
  );
}

function consultar(orgao: string) {
  fireEvent.change(screen.getByLabelText("Código do órgão (SIAFI)"), {
    target: { value: orgao },
  });
  fireEvent.click(screen.getByRole("button", { name: "Consultar" }));
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Contratos", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("starts idle without querying", () => {
    renderContratos();

    expect(screen.getByText("Informe o código do órgão e clique em Consultar.")).toBeTruthy();
    expect(fetchAndNormalize).not.toHaveBeenCalled();
  });

  it("passes the form values to the pipeline", async () => {
    fetchAndNormalize.mockResolvedValue([CONTRATO_FIXTURE]);

    renderContratos();
    fireEvent.change(screen.getByLabelText("Valor mínimo (R$)"), {
      target: { value: "1.000,50" },
    });
    fireEvent.change(screen.getByLabelText("Unidade executora"), {
      target: { value: "150002" },
    });
    fireEvent.click(screen.getByLabelText("Somente contratos vigentes"));
    consultar("26000");

    await screen.findByText("00012/2024");
    expect(fetchAndNormalize).toHaveBeenCalledWith(
      "26000",
      {
        supplierTaxId: undefined,
        validityStartFrom: undefined,
        validityEndTo: undefined,
        minValue: 1000.5,
      },
      50,
      expect.objectContaining({ executingUnitCode: "150002", onlyCurrentlyValid: true }),
    );
  });

  it("renders the summary and the table", async () => {
    fetchAndNormalize.mockResolvedValue([CONTRATO_FIXTURE]);

    renderContratos();
    consultar("26000");

    expect(await screen.findByText("EMPRESA TESTE LTDA")).toBeTruthy();
    expect(screen.getByText("12.345.678/0001-95")).toBeTruthy();
    expect(screen.getByText("15/01/2024 a 15/01/2026")).toBeTruthy();
    expect(screen.getByTestId("resumo-quantidade").textContent).toBe("1");
    expect(screen.getByTestId("resumo-total").textContent).toMatch(/175\.000,75/);
    expect(screen.getByRole("button", { name: "Exportar CSV" })).toBeTruthy();
  });

  it("shows page progress while loading", async () => {
    fetchAndNormalize.mockImplementation((_orgao, _filtros, _paginas, options) => {
      options?.onProgress?.({ page: 2, pageLimit: 50, records: 30 });
      return new Promise(() => {});
    });

    renderContratos();
    consultar("26000");

    expect(await screen.findByText("Página 2 de até 50 · 30 contratos")).toBeTruthy();
    expect(screen.getByRole("progressbar").getAttribute("aria-valuenow")).toBe("2");
  });

  it("shows an empty state when nothing matches", async () => {
    fetchAndNormalize.mockResolvedValue([]);

    renderContratos();
    consultar("26000");

    expect(
      await screen.findByText("Nenhum contrato encontrado para os filtros informados."),
    ).toBeTruthy();
  });

  it("shows upstream errors and retries the whole query", async () => {
    fetchAndNormalize.mockRejectedValueOnce(new UpstreamError(500, "falha interna"));
    fetchAndNormalize.mockResolvedValueOnce([CONTRATO_FIXTURE]);

    renderContratos();
    consultar("26000");

    expect(await screen.findByText("Erro na API: 500 - falha interna")).toBeTruthy();

    fireEvent.click(screen.getByRole("button", { name: "Tentar novamente" }));

    expect(await screen.findByText("00012/2024")).toBeTruthy();
    expect(fetchAndNormalize).toHaveBeenCalledTimes(2);
  });

  it("reports a missing agency code without calling the portal", async () => {
    const { transport, requests } = pagedTransport([]);
    renderContratos(createContratosPipeline(TEST_CONFIG, transport));

    consultar("  ");

    expect(await screen.findByText("O código do órgão é obrigatório.")).toBeTruthy();
    expect(requests).toHaveLength(0);
  });
});
