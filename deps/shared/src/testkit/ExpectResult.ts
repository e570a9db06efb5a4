import { assert } from "vitest";

import type { Err, Ok, Result } from "../utils/Result";

export function expectOk<T, E>(result: Result<T, E>): asserts result is Ok<T> {
  if (!result.ok) {
    assert.fail(`預期為 ok，實際為 err: ${JSON.stringify(result.error)}`);
  }
}

export function expectErr<T, E>(
  result: Result<T, E>
): asserts result is Err<E> {
  if (result.ok) {
    assert.fail(`預期為 err，實際為 ok: ${JSON.stringify(result.value)}`);
  }
}
