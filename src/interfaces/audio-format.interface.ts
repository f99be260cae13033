/**
 * Format metadata for a PCM sample buffer.
 * The engines never inspect it; it is carried through so the result can be
 * written back into a container.
 */
export interface AudioFormat {
  channels: number;
  sampleRate: number;
  bitsPerSample: 16;
  frames: number; // samples per channel
}

/**
 * Interleaved signed 16-bit samples plus their format.
 * samples.length is always frames * channels.
 */
export interface SampleBuffer {
  samples: Int16Array;
  format: AudioFormat;
}
