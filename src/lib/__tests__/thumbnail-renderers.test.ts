import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createVideoFrameExtractor } from '../thumbnail-renderers';

describe('createVideoFrameExtractor', () => {
  const revokeObjectURL = vi.fn();

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    // jsdom has no object URLs or media loading
    Object.defineProperty(URL, 'createObjectURL', {
      configurable: true,
      writable: true,
      value: () => 'blob:test-video',
    });
    Object.defineProperty(URL, 'revokeObjectURL', {
      configurable: true,
      writable: true,
      value: revokeObjectURL,
    });
    vi.spyOn(HTMLMediaElement.prototype, 'load').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    revokeObjectURL.mockReset();
  });

  it('gives up with null when the video never loads', async () => {
    let result: string | null | undefined;
    void createVideoFrameExtractor(5000)
      .extractFrame(new File(['x'], 'demo.mov'), 200, 0.75)
      .then((url) => {
        result = url;
      });

    await vi.advanceTimersByTimeAsync(4999);
    expect(result).toBeUndefined();

    await vi.advanceTimersByTimeAsync(1);
    expect(result).toBeNull();
    expect(revokeObjectURL).toHaveBeenCalledWith('blob:test-video');
  });

  it('rejects when the video cannot be decoded', async () => {
    const seen: { video?: HTMLMediaElement } = {};
    vi.spyOn(HTMLMediaElement.prototype, 'src', 'set').mockImplementation(function (this: HTMLMediaElement) {
      seen.video = this;
    });

    const pending = createVideoFrameExtractor(5000).extractFrame(new File(['x'], 'demo.mov'), 200, 0.75);
    seen.video?.dispatchEvent(new Event('error'));

    await expect(pending).rejects.toThrow('Could not decode demo.mov');
    await vi.advanceTimersByTimeAsync(5000);
    expect(revokeObjectURL).toHaveBeenCalledTimes(1);
  });
});
