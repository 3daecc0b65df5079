export type StorageFailureReason = "timeout" | "failure";

export type StorageError = Readonly<{
  code: "STORAGE_UNAVAILABLE";
  message: string;
  context: Readonly<{ operation: string; reason: StorageFailureReason }>;
}>;

export type StorageOutcome<T> = Readonly<{ ok: true; value: T }> | Readonly<{ ok: false; error: StorageError }>;

/**
 * Runs one repository call under a deadline. Rejections and timeouts both
 * resolve to `STORAGE_UNAVAILABLE`; callers never see a thrown storage error.
 */
export type StorageGuard = <T>(operation: string, call: () => Promise<T>) => Promise<StorageOutcome<T>>;

export type StorageGuardOptions = Readonly<{
  timeoutMs?: number;
  onFailure?: (operation: string, reason: StorageFailureReason, cause: unknown) => void;
}>;

export const DEFAULT_STORAGE_TIMEOUT_MS = 5_000;

const TIMED_OUT = Symbol("timed-out");

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

function unavailable(operation: string, reason: StorageFailureReason): Readonly<{ ok: false; error: StorageError }> {
  return {
    ok: false,
    error: {
      code: "STORAGE_UNAVAILABLE",
      message: "Storage is temporarily unavailable.",
      context: { operation, reason }
    }
  };
}

export function createStorageGuard(options: StorageGuardOptions = {}): StorageGuard {
  const timeoutMs = options.timeoutMs ?? DEFAULT_STORAGE_TIMEOUT_MS;
  const onFailure =
    options.onFailure ??
    ((operation: string, reason: StorageFailureReason, cause: unknown) => {
      console.error(`[Pairwise] Storage call "${operation}" failed (${reason}): ${causeMessage(cause)}`);
    });

  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new Error("StorageGuard requires a positive timeoutMs.");
  }

  return async function guard<T>(operation: string, call: () => Promise<T>): Promise<StorageOutcome<T>> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
    });
    const pending = Promise.resolve().then(call);

    try {
      const settled = await Promise.race([pending.then((value) => ({ value })), deadline]);
      if (settled === TIMED_OUT) {
        onFailure(operation, "timeout", new Error(`No response within ${timeoutMs}ms.`));
        // The call keeps running; a late rejection is still reported.
        void pending.catch((cause: unknown) => onFailure(operation, "failure", cause));
        return unavailable(operation, "timeout");
      }
      return { ok: true, value: settled.value };
    } catch (cause: unknown) {
      onFailure(operation, "failure", cause);
      return unavailable(operation, "failure");
    } finally {
      clearTimeout(timer);
    }
  };
}
