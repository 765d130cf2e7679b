import { useState, useEffect, useCallback, useRef } from "react";
import { ApiError, ValidationError } from "@/types/api";

interface IdleState {
  status: "idle";
  data: undefined;
  error: undefined;
}

interface LoadingState<P> {
  status: "loading";
  data: undefined;
  error: undefined;
  progress: P | undefined;
}

interface SuccessState<T> {
  status: "success";
  data: T;
  error: undefined;
}

interface ErrorState {
  status: "error";
  data: undefined;
  error: ApiError;
}

export type ApiState<T, P = never> =
  | IdleState
  | LoadingState<P>
  | SuccessState<T>
  | ErrorState;

/** Anything thrown becomes an ApiError; status 0 means no HTTP response was involved. */
export function toApiError(err: unknown): ApiError {
  if (err instanceof ApiError) return err;
  if (err instanceof ValidationError) return new ApiError(0, err.message);
  return new ApiError(0, err instanceof Error ? err.message : "Erro desconhecido");
}

/**
 * Runs `fetcher` whenever it changes (null = idle). The fetcher receives a
 * `report` callback for progress updates. A superseded or unmounted run is
 * discarded: its result and progress are ignored.
 */
export function useApi<T, P = never>(
  fetcher: ((report: (progress: P) => void) => Promise<T>) | null,
): ApiState<T, P> & { refetch: () => void } {
  const [state, setState] = useState<ApiState<T, P>>(
    fetcher
      ? { status: "loading", data: undefined, error: undefined, progress: undefined }
      : { status: "idle", data: undefined, error: undefined },
  );
  const runId = useRef(0);

  const run = useCallback(() => {
    if (!fetcher) {
      setState({ status: "idle", data: undefined, error: undefined });
      return;
    }

    const id = ++runId.current;
    const current = () => id === runId.current;

    setState({ status: "loading", data: undefined, error: undefined, progress: undefined });

    fetcher((progress) => {
      if (current()) {
        setState({ status: "loading", data: undefined, error: undefined, progress });
      }
    }).then(
      (data) => {
        if (current()) setState({ status: "success", data, error: undefined });
      },
      (err: unknown) => {
        if (current()) {
          setState({ status: "error", data: undefined, error: toApiError(err) });
        }
      },
    );
  }, [fetcher]);

  useEffect(() => {
    run();
    return () => {
      runId.current += 1;
    };
  }, [run]);

  return { ...state, refetch: run };
}
