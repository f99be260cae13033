import { fromSamples } from '../src/audio/sample-buffer';
import { SampleBuffer } from '../src/interfaces';

/**
 * Small seeded PRNG so test signals are identical on every run
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Mono buffer of uniform noise in [-amplitude, amplitude]
 */
export function noiseBuffer(length: number, seed = 42, amplitude = 8000): SampleBuffer {
  const random = seededRandom(seed);
  const samples = new Int16Array(length);
  for (let i = 0; i < length; i++) {
    samples[i] = Math.round((random() * 2 - 1) * amplitude);
  }
  return fromSamples(samples, { sampleRate: 16000 });
}

/**
 * Mono buffer holding one value everywhere (0 gives silence)
 */
export function constantBuffer(length: number, value = 0): SampleBuffer {
  return fromSamples(new Int16Array(length).fill(value), { sampleRate: 16000 });
}

/**
 * Run fn and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}
