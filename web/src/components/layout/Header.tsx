import { Link } from "react-router-dom";

export function Header() {
  return (
    <header className="border-b border-gray-200 bg-white">
      <div className="mx-auto flex max-w-7xl items-center justify-between px-4 py-3 sm:px-6">
        <Link to="/" className="text-lg font-bold text-gray-900">
          Consulta de Contratos
        </Link>
        <a
          href="https://portaldatransparencia.gov.br/api-de-dados"
          target="_blank"
          rel="noopener noreferrer"
          className="text-sm text-gray-600 hover:text-gray-900"
        >
          API de dados
        </a>
      </div>
    </header>
  );
}
