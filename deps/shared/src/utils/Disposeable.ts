export interface AsyncDisposableLike {
  [Symbol.asyncDispose](): Promise<void>;
}

export async function dispose(target: AsyncDisposableLike) {
  await target[Symbol.asyncDispose]();
}
