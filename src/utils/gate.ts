// A promise held shut until the test opens it. Lets a test choose the order
// in which fake provider calls complete.

export interface Gate<T> {
  readonly promise: Promise<T>;
  open(value: T): void;
}

export function createGate<T>(): Gate<T> {
  let release: ((value: T) => void) | undefined;
  const promise = new Promise<T>((resolve) => {
    release = resolve;
  });
  return {
    promise,
    open(value: T) {
      release?.(value);
    },
  };
}
