import { createBrowserRouter } from "react-router-dom";
import { App } from "./App";
import { Contratos } from "./pages/Contratos/Contratos";
import type { PortalConfig } from "./lib/config";
import type { ContratosPipeline } from "./services/pipeline";

export function createRouter(pipeline: ContratosPipeline, config: PortalConfig) {
  return createBrowserRouter([
    {
      path: "/",
      element: <App />,
      children: [
        {
          index: true,
          element: <Contratos pipeline={pipeline} defaultPageLimit={config.pageLimit} />,
        },
      ],
    },
  ]);
}
