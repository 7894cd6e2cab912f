import { describe, it, expect } from 'vitest';
import { withTimeout } from '../timeout';
import { PublishTimeoutError } from '../errors';

describe('withTimeout', () => {
  it('resolves with the value when the promise is fast enough', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 50)).resolves.toBe('ok');
  });

  it('passes through the underlying rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 50)).rejects.toThrow('boom');
  });

  it('rejects with PublishTimeoutError when the promise hangs', async () => {
    const error = await withTimeout(new Promise<never>(() => undefined), 10).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PublishTimeoutError);
    expect(error).toMatchObject({ timeoutMs: 10, message: 'Publish timed out after 10 ms' });
  });

  it('names the action in the timeout message', async () => {
    await expect(withTimeout(new Promise<never>(() => undefined), 10, 'Media download')).rejects.toThrow(
      'Media download timed out after 10 ms'
    );
  });
});
