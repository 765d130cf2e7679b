// Shared test doubles: an in-process transport standing in for the portal,
// and raw contract payloads shaped like the /contratos response.

import type { PortalConfig } from "@/lib/config";
import type { HttpResponse, HttpTransport } from "@/services/api";
import type { RawContractRecord } from "@/types/contrato";

export const TEST_CONFIG: PortalConfig = {
  baseUrl: "/api-de-dados",
  apiKey: "test-key",
  pageLimit: 50,
  pageDelayMs: 0,
  logLevel: "silent",
};

export function fakeResponse(status: number, body: string): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? "OK" : "Error",
    text: () => Promise.resolve(body),
  };
}

export interface RecordedRequest {
  url: string;
  page: number;
  headers: Record<string, string>;
}

/**
 * Serves `pages[n - 1]` for `pagina=n` and an empty array past the end.
 * `overrides` replaces the response for a given page number.
 */
export function pagedTransport(
  pages: unknown[][],
  overrides: Record<number, HttpResponse> = {},
) {
  const requests: RecordedRequest[] = [];

  const transport: HttpTransport = (url, init) => {
    const page = Number(new URL(url, "http://localhost").searchParams.get("pagina"));
    requests.push({ url, page, headers: init.headers });
    const override = overrides[page];
    if (override) return Promise.resolve(override);
    return Promise.resolve(fakeResponse(200, JSON.stringify(pages[page - 1] ?? [])));
  };

  return { transport, requests, overrides };
}

export function rawContrato(overrides: RawContractRecord = {}): RawContractRecord {
  return {
    id: 1234567,
    numero: "00012/2024",
    objeto: "Prestação de serviços de limpeza",
    numeroProcesso: "23000.000001/2024-11",
    situacaoContrato: "Vigente",
    modalidadeCompra: "Pregão",
    valorInicialCompra: 150000.5,
    valorFinalCompra: "175000.75",
    dataAssinatura: "2024-01-10",
    dataPublicacaoDOU: "2024-01-12T00:00:00",
    dataInicioVigencia: "2024-01-15",
    dataFimVigencia: "15/01/2026",
    fornecedor: {
      nome: "EMPRESA TESTE LTDA",
      cnpjFormatado: "12.345.678/0001-95",
    },
    unidadeGestoraCompras: {
      codigo: 150002,
      nome: "UNIDADE EXECUTORA TESTE",
    },
    unidadeGestora: {
      codigo: "150001",
      nome: "UNIDADE GESTORA TESTE",
      orgaoVinculado: { codigoSIAFI: "26000", nome: "Ministério Teste" },
      orgaoMaximo: { codigo: "26000", nome: "Ministério Superior Teste" },
    },
    ...overrides,
  };
}
