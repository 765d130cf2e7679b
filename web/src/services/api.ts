import type { PortalConfig } from "@/lib/config";
import { createLogger } from "@/lib/logger";
import { AuthError, UpstreamError } from "@/types/api";

const log = createLogger("api");

/** The subset of a fetch Response the portal client reads. */
export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text: () => Promise<string>;
}

export type HttpTransport = (
  url: string,
  init: { method: "GET"; headers: Record<string, string> },
) => Promise<HttpResponse>;

export const fetchTransport: HttpTransport = (url, init) => fetch(url, init);

/**
 * One GET against the portal. 401/403 raise AuthError, any other
 * non-success status raises UpstreamError with the response body.
 */
export async function portalGet(
  config: Pick<PortalConfig, "baseUrl" | "apiKey">,
  path: string,
  params: URLSearchParams,
  transport: HttpTransport = fetchTransport,
): Promise<{ status: number; body: unknown }> {
  const qs = params.toString();
  const url = `${config.baseUrl}${path}${qs ? `?${qs}` : ""}`;

  log.debug(`GET ${url}`);
  const response = await transport(url, {
    method: "GET",
    headers: {
      Accept: "application/json",
      "chave-api-dados": config.apiKey,
    },
  });

  const text = await response.text().catch(() => "");

  if (response.status === 401 || response.status === 403) {
    throw new AuthError(response.status);
  }
  if (!response.ok) {
    throw new UpstreamError(response.status, text || response.statusText);
  }

  try {
    return { status: response.status, body: JSON.parse(text) };
  } catch {
    throw new UpstreamError(response.status, text);
  }
}
