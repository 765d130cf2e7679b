/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_PORTAL_TRANSPARENCIA_TOKEN?: string;
  readonly VITE_PORTAL_BASE_URL?: string;
  readonly VITE_MAX_PAGINAS?: string;
  readonly VITE_PAGE_DELAY_MS?: string;
  readonly VITE_LOG_LEVEL?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
