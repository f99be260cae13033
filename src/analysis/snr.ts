import { SampleBuffer } from '../interfaces';

/**
 * Signal-to-noise ratio of a stego buffer against its original, in dB.
 *
 * Both buffers are compared over the shorter length. Identical buffers give
 * Infinity.
 */
export function computeSnr(original: SampleBuffer, stego: SampleBuffer): number {
  const n = Math.min(original.samples.length, stego.samples.length);
  let signalPower = 0;
  let noisePower = 0;

  for (let i = 0; i < n; i++) {
    const o = original.samples[i];
    const diff = o - stego.samples[i];
    signalPower += o * o;
    noisePower += diff * diff;
  }

  if (noisePower === 0) {
    return Infinity;
  }
  return 10 * Math.log10(signalPower / noisePower);
}

/**
 * SNR of each named candidate against the same original
 */
export function compareSchemes(
  original: SampleBuffer,
  candidates: Record<string, SampleBuffer>
): Record<string, number> {
  const results: Record<string, number> = {};
  for (const [name, stego] of Object.entries(candidates)) {
    results[name] = computeSnr(original, stego);
  }
  return results;
}
