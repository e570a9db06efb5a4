/** 釋放實作 `Symbol.asyncDispose` 的資源 */
export async function dispose(target: AsyncDisposable) {
  await target[Symbol.asyncDispose]();
}
