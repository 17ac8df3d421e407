export type Result<T, E = unknown> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Runs an async step and captures its outcome instead of letting it throw
 */
export const attempt = async <T>(step: () => Promise<T> | T): Promise<Result<T>> => {
  try {
    return ok(await step());
  } catch (error) {
    return err(error);
  }
};
