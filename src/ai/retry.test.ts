import { describe, it, expect, vi } from 'vitest';
import { RequestTimeoutError, withRetry, withTimeout } from './retry';

describe('withRetry', () => {
  it('429는 재시도하고 onRetry를 호출한다', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('429 Too Many Requests'))
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    await expect(withRetry(fn, { baseDelayMs: 1, maxDelayMs: 5, onRetry })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[0]).toBe(1);
  });

  it('재시도 대상이 아닌 에러는 바로 던진다', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('401 Unauthorized'));

    await expect(withRetry(fn, { baseDelayMs: 1, onRetry: () => {} })).rejects.toThrow('401 Unauthorized');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('AbortError는 재시도하지 않는다', async () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(abort);

    await expect(withRetry(fn, { baseDelayMs: 1, onRetry: () => {} })).rejects.toBe(abort);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('maxRetries를 넘기면 마지막 에러를 던진다', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('503 Service Unavailable'));

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 2, onRetry: () => {} })).rejects.toThrow(
      '503 Service Unavailable'
    );
    expect(fn).toHaveBeenCalledTimes(3);
  });
});

describe('withRetry + signal', () => {
  it('signal이 취소된 뒤에는 재시도하지 않는다', async () => {
    const controller = new AbortController();
    const fn = vi.fn<() => Promise<string>>().mockImplementation(async () => {
      controller.abort(new RequestTimeoutError(20));
      throw new RequestTimeoutError(20);
    });
    const onRetry = vi.fn();

    await expect(withRetry(fn, { baseDelayMs: 1, onRetry, signal: controller.signal })).rejects.toBeInstanceOf(
      RequestTimeoutError
    );
    expect(fn).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it('backoff 대기 중에 취소되면 바로 끝난다', async () => {
    const controller = new AbortController();
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('503 Service Unavailable'));
    const reason = new Error('stop');
    const startedAt = Date.now();

    const result = withRetry(fn, {
      baseDelayMs: 10_000,
      maxDelayMs: 10_000,
      onRetry: () => controller.abort(reason),
      signal: controller.signal,
    });

    await expect(result).rejects.toBe(reason);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(Date.now() - startedAt).toBeLessThan(5_000);
  });

  it('withTimeout 안의 재시도는 타임아웃 이후 더 호출하지 않는다', async () => {
    let calls = 0;
    const onRetry = vi.fn();
    // signal을 따르지만 스스로는 끝나지 않는 호출
    const hangingCall = (signal: AbortSignal) =>
      new Promise<string>((_, reject) => {
        calls++;
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      });

    const result = withTimeout(
      (signal) => withRetry(() => hangingCall(signal), { baseDelayMs: 1, maxDelayMs: 2, onRetry, signal }),
      20
    );

    await expect(result).rejects.toBeInstanceOf(RequestTimeoutError);
    await new Promise((resolve) => setTimeout(resolve, 60));
    expect(calls).toBe(1);
    expect(onRetry).not.toHaveBeenCalled();
  });
});

describe('withTimeout', () => {
  it('제한 시간 안에 끝나면 결과를 돌려준다', async () => {
    await expect(withTimeout(async () => 'done', 100)).resolves.toBe('done');
  });

  it('제한 시간을 넘기면 RequestTimeoutError이고 signal이 취소된다', async () => {
    const seen: { signal?: AbortSignal } = {};

    const result = withTimeout((signal) => {
      seen.signal = signal;
      return new Promise<string>(() => {});
    }, 10);

    await expect(result).rejects.toBeInstanceOf(RequestTimeoutError);
    expect(seen.signal?.aborted).toBe(true);
  });

  it('상위 signal 취소가 전달된다', async () => {
    const parent = new AbortController();
    const result = withTimeout(
      (signal) =>
        new Promise<string>((_, reject) => {
          signal.addEventListener('abort', () => reject(new Error('cancelled')));
        }),
      1000,
      parent.signal
    );

    parent.abort();

    await expect(result).rejects.toThrow('cancelled');
  });
});
