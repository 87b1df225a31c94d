// backend/services/pizza/test/helpers/fakeQuery.ts

/** Chainable stand-in for a mongoose Query/Aggregate resolving to `result`. */
export class FakeQuery<T> {
  readonly sorts: unknown[] = [];

  constructor(private readonly result: T) {}

  sort(spec: unknown): this {
    this.sorts.push(spec);
    return this;
  }

  session(_session: unknown): this {
    return this;
  }

  exec(): Promise<T> {
    return Promise.resolve(this.result);
  }

  then<R>(
    onFulfilled: (value: T) => R | PromiseLike<R>,
    onRejected?: (reason: unknown) => R | PromiseLike<R>
  ): Promise<R> {
    return this.exec().then(onFulfilled, onRejected);
  }
}
