/**
 * 可失敗操作的回傳型別。
 * 預期中的失敗路徑（快取損毀、單檔處理失敗）以 Err 回傳，不拋出例外。
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
