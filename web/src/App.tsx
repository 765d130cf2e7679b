import { Outlet, ScrollRestoration } from "react-router-dom";
import { Header } from "./components/layout/Header";
import { Footer } from "./components/layout/Footer";

export function App() {
  return (
    <div className="flex min-h-screen flex-col bg-gray-50">
      <a
        href="#conteudo"
        className="sr-only focus:not-sr-only focus:absolute focus:left-2 focus:top-2 focus:rounded focus:bg-white focus:px-3 focus:py-1 focus:text-sm"
      >
        Pular para o conteúdo
      </a>
      <Header />
      <div id="conteudo" className="flex-1">
        <Outlet />
      </div>
      <Footer />
      <ScrollRestoration />
    </div>
  );
}
