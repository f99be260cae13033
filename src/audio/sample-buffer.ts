import { AudioFormat, SampleBuffer } from '../interfaces';
import { INT16_MAX, INT16_MIN, PCM_BITS_PER_SAMPLE } from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';

/**
 * Options for building a sample buffer from raw samples
 */
export interface SampleBufferOptions {
  channels?: number;
  sampleRate?: number;
}

/**
 * Wrap samples and format into a SampleBuffer, checking that the sample
 * count matches frames * channels
 */
export function createSampleBuffer(
  samples: Int16Array,
  format: AudioFormat
): SampleBuffer {
  if (!Number.isInteger(format.channels) || format.channels < 1) {
    throw ErrorFactory.INVALID_BUFFER(`Invalid channel count: ${format.channels}`);
  }
  if (samples.length !== format.frames * format.channels) {
    throw ErrorFactory.INVALID_BUFFER(
      `Sample count ${samples.length} does not match ${format.frames} frames x ${format.channels} channels`
    );
  }
  return { samples, format: { ...format } };
}

/**
 * Build a SampleBuffer from raw samples, deriving the frame count
 */
export function fromSamples(
  samples: Int16Array,
  options: SampleBufferOptions = {}
): SampleBuffer {
  const channels = options.channels ?? 1;
  return createSampleBuffer(samples, {
    channels,
    sampleRate: options.sampleRate ?? 44100,
    bitsPerSample: PCM_BITS_PER_SAMPLE,
    frames: Math.floor(samples.length / channels),
  });
}

/**
 * New buffer with the same format and the given samples
 */
export function withSamples(buffer: SampleBuffer, samples: Int16Array): SampleBuffer {
  return createSampleBuffer(samples, buffer.format);
}

/**
 * Clip to the signed 16-bit range and truncate toward zero
 */
export function quantizeToInt16(values: ArrayLike<number>): Int16Array {
  const out = new Int16Array(values.length);
  for (let i = 0; i < values.length; i++) {
    const clipped = Math.min(INT16_MAX, Math.max(INT16_MIN, values[i]));
    out[i] = Math.trunc(clipped);
  }
  return out;
}
