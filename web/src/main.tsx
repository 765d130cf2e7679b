import React from "react";
import ReactDOM from "react-dom/client";
import { RouterProvider } from "react-router-dom";
import { ErrorState } from "./components/ui/ErrorState";
import { loadConfig } from "./lib/config";
import { createLogger, setLogLevel } from "./lib/logger";
import { createQueryCache } from "./services/queryCache";
import { createContratosPipeline } from "./services/pipeline";
import { fetchTransport } from "./services/api";
import { createRouter } from "./router";
import "./index.css";

const log = createLogger("main");

function bootstrap(): React.ReactNode {
  try {
    const config = loadConfig(import.meta.env);
    setLogLevel(config.logLevel);
    const pipeline = createContratosPipeline(config, fetchTransport, {
      cache: createQueryCache(),
    });
    return <RouterProvider router={createRouter(pipeline, config)} />;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    log.error(`configuração inválida: ${message}`);
    return <ErrorState title="Configuração inválida" message={message} />;
  }
}

const container = document.getElementById("root");
if (!container) throw new Error("Elemento #root não encontrado");

ReactDOM.createRoot(container).render(
  <React.StrictMode>{bootstrap()}</React.StrictMode>,
);
