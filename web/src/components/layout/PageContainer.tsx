interface PageContainerProps {
  title?: string;
  children: React.ReactNode;
  className?: string;
}

export function PageContainer({ title, children, className = "" }: PageContainerProps) {
  return (
    <main className={`mx-auto max-w-7xl space-y-6 px-4 py-6 sm:px-6 ${className}`}>
      {title && <h1 className="text-xl font-bold text-gray-900">{title}</h1>}
      {children}
    </main>
  );
}
