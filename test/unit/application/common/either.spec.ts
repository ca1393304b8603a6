import { Either, left, right, tryCatchAsync } from '@application/common';

describe('Either', () => {
  it('should narrow on isLeft', () => {
    const result: Either<string, number> = left('boom');

    expect(result.isLeft()).toBe(true);
    expect(result.isRight()).toBe(false);
    if (result.isLeft()) {
      expect(result.value).toBe('boom');
    }
  });

  it('should map only the right side', () => {
    const ok: Either<string, number> = right(2);
    const failed: Either<string, number> = left('boom');

    expect(ok.map((n) => n * 10).value).toBe(20);
    expect(failed.map((n) => n * 10).value).toBe('boom');
  });

  it('should fold both sides to one value', () => {
    const render = (result: Either<string, number>): string =>
      result.fold(
        (error) => `error: ${error}`,
        (value) => `value: ${value}`,
      );

    expect(render(right(3))).toBe('value: 3');
    expect(render(left('bad'))).toBe('error: bad');
  });

  describe('tryCatchAsync', () => {
    it('should wrap a resolved value in Right', async () => {
      const result = await tryCatchAsync(
        () => Promise.resolve('stored'),
        () => 'failed',
      );

      expect(result.isRight()).toBe(true);
      expect(result.value).toBe('stored');
    });

    it('should map a rejection to Left', async () => {
      const result = await tryCatchAsync(
        () => Promise.reject(new Error('insert failed')),
        (error) => (error instanceof Error ? error.message : 'unknown'),
      );

      expect(result.isLeft()).toBe(true);
      expect(result.value).toBe('insert failed');
    });
  });
});
