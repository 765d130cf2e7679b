import { useState, useMemo, useEffect } from "react";

interface PaginationState<T> {
  page: number;
  totalPages: number;
  pageItems: T[];
  setPage: (page: number) => void;
  nextPage: () => void;
  prevPage: () => void;
}

/** Client-side pagination over an already loaded list. Resets to page 1 when the list changes. */
export function usePagination<T>(items: readonly T[], pageSize = 20): PaginationState<T> {
  const [page, setPage] = useState(1);
  const totalPages = Math.max(1, Math.ceil(items.length / pageSize));

  useEffect(() => {
    setPage(1);
  }, [items]);

  return useMemo(() => {
    const safePage = Math.min(page, totalPages);
    const start = (safePage - 1) * pageSize;
    return {
      page: safePage,
      totalPages,
      pageItems: items.slice(start, start + pageSize),
      setPage,
      nextPage: () => setPage((p) => Math.min(totalPages, p + 1)),
      prevPage: () => setPage((p) => Math.max(1, p - 1)),
    };
  }, [items, page, pageSize, totalPages]);
}
