import { InterruptedError, sleep } from './sleep';

describe('sleep', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should resolve once the delay has elapsed', async () => {
    // Arrange
    let resolved = false;
    const pending = sleep(100).then(() => {
      resolved = true;
    });

    // Act & Assert
    await jest.advanceTimersByTimeAsync(99);
    expect(resolved).toBe(false);

    await jest.advanceTimersByTimeAsync(1);
    await pending;
    expect(resolved).toBe(true);
  });

  it('should reject with InterruptedError when the signal aborts', async () => {
    // Arrange
    const controller = new AbortController();
    const pending = sleep(1000, controller.signal);

    // Act
    controller.abort();

    // Assert
    await expect(pending).rejects.toBeInstanceOf(InterruptedError);
    expect(jest.getTimerCount()).toBe(0);
  });

  it('should reject immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(1000, controller.signal)).rejects.toThrow('Sleep interrupted');
    expect(jest.getTimerCount()).toBe(0);
  });
});
