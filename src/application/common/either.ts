/**
 * Either type for explicit error handling in use cases.
 *
 * - Left carries the failure
 * - Right carries the success value
 *
 * Both variants share the same method signatures, so `result.isLeft()`
 * narrows an `Either<L, R>` without casts.
 *
 * @example
 * ```typescript
 * const result = await createOrder.execute(input);
 * if (result.isLeft()) {
 *   throw toHttpException(result.value);
 * }
 * return result.value;
 * ```
 */
export class Left<L, R> {
  readonly tag = 'left' as const;

  constructor(public readonly value: L) {}

  isLeft(): this is Left<L, R> {
    return true;
  }

  isRight(): this is Right<L, R> {
    return false;
  }

  map<R2>(_fn: (value: R) => R2): Either<L, R2> {
    return new Left<L, R2>(this.value);
  }

  fold<T>(onLeft: (value: L) => T, _onRight: (value: R) => T): T {
    return onLeft(this.value);
  }
}

export class Right<L, R> {
  readonly tag = 'right' as const;

  constructor(public readonly value: R) {}

  isLeft(): this is Left<L, R> {
    return false;
  }

  isRight(): this is Right<L, R> {
    return true;
  }

  map<R2>(fn: (value: R) => R2): Either<L, R2> {
    return new Right<L, R2>(fn(this.value));
  }

  fold<T>(_onLeft: (value: L) => T, onRight: (value: R) => T): T {
    return onRight(this.value);
  }
}

export type Either<L, R> = Left<L, R> | Right<L, R>;

export const left = <L, R = never>(value: L): Either<L, R> => new Left<L, R>(value);
export const right = <L = never, R = unknown>(value: R): Either<L, R> => new Right<L, R>(value);

// Runs an async operation, mapping a thrown error to Left
export const tryCatchAsync = async <L, R>(
  fn: () => Promise<R>,
  onError: (error: unknown) => L,
): Promise<Either<L, R>> => {
  try {
    return right(await fn());
  } catch (error) {
    return left(onError(error));
  }
};
