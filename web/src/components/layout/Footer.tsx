export function Footer() {
  return (
    <footer className="border-t border-gray-200 bg-gray-50">
      <div className="mx-auto max-w-7xl px-4 py-6 sm:px-6">
        <p className="text-xs text-gray-500">
          Fonte: Portal da Transpar&ecirc;ncia do Governo Federal. Os dados s&atilde;o
          consultados sob demanda e n&atilde;o s&atilde;o armazenados.
        </p>
      </div>
    </footer>
  );
}
