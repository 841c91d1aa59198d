import { withTimeout } from '../with-timeout';
import { TimeoutError } from '../../errors/cache-errors';

describe('withTimeout', () => {
  it('resolves with the operation result when it settles in time', async () => {
    await expect(withTimeout('fast-op', Promise.resolve(42), 50)).resolves.toBe(
      42,
    );
  });

  it('rejects with TimeoutError when the operation hangs', async () => {
    const hanging = new Promise<number>(() => undefined);

    const result = withTimeout('slow-op', hanging, 10);

    await expect(result).rejects.toThrow(TimeoutError);
    await expect(result).rejects.toThrow('slow-op timed out after 10ms');
  });

  it('propagates the operation error', async () => {
    await expect(
      withTimeout('failing-op', Promise.reject(new Error('boom')), 50),
    ).rejects.toThrow('boom');
  });
});
