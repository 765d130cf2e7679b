export class ApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly detail: string,
  ) {
    super(detail);
    this.name = "ApiError";
  }
}

/** The portal rejected the access key (missing, invalid or expired). */
export class AuthError extends ApiError {
  constructor(status: number, detail = "Chave de acesso inválida ou expirada.") {
    super(status, detail);
    this.name = "AuthError";
  }
}

/** Any other non-success response. `body` is the raw response text. */
export class UpstreamError extends ApiError {
  constructor(
    status: number,
    public readonly body: string,
  ) {
    super(status, `Erro na API: ${status}${body ? ` - ${body.slice(0, 300)}` : ""}`);
    this.name = "UpstreamError";
  }
}

/** Caller input rejected before any request is made. */
export class ValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

export class ConfigError extends Error {
  constructor(
    public readonly key: string,
    message: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}
