import { compareSchemes, computeSnr } from '../src/analysis/snr';
import { fromSamples } from '../src/audio/sample-buffer';
import { encodeEcho } from '../src/engines/echo-engine';
import { encodeLsb } from '../src/engines/lsb-engine';
import { noiseBuffer } from './helpers';

function buffer(values: number[]) {
  return fromSamples(Int16Array.from(values));
}

describe('SNR', () => {
  it('should be infinite for identical buffers', () => {
    expect(computeSnr(buffer([1, 2, 3]), buffer([1, 2, 3]))).toBe(Infinity);
  });

  it('should compute 10 log10 of signal over noise power', () => {
    // signal 4 * 100^2 = 40000, noise 4 * 1 = 4
    expect(computeSnr(buffer([100, 100, 100, 100]), buffer([101, 99, 101, 99]))).toBeCloseTo(40, 10);
  });

  it('should compare over the shorter buffer', () => {
    expect(computeSnr(buffer([3, 4]), buffer([3, 4, 100]))).toBe(Infinity);
  });

  it('should rate LSB embedding as quieter than echo hiding', () => {
    const original = noiseBuffer(330000, 42);
    const lsb = encodeLsb(original, 'OK');
    const echo = encodeEcho(original, 'OK', 200, 400, 0.5);

    expect(lsb.ok && echo.ok).toBe(true);
    if (lsb.ok && echo.ok) {
      const scores = compareSchemes(original, { lsb: lsb.buffer, echo: echo.buffer });
      expect(Object.keys(scores)).toEqual(['lsb', 'echo']);
      expect(scores.lsb).toBeGreaterThan(scores.echo);
    }
  });
});
