import createDebug from 'debug';
import {
  assertEncodableMessage,
  decodeBits,
  encodeBits,
} from '../codec/bit-codec';
import { quantizeToInt16, withSamples } from '../audio/sample-buffer';
import { assertEchoParams, resolveEchoParams } from '../config/echo-config';
import {
  BitStream,
  EchoDecodeOutcome,
  EchoDecodeReport,
  EchoDiagnostic,
  EchoParams,
  EncodeResult,
  SampleBuffer,
} from '../interfaces';
import {
  BITS_PER_CHAR,
  ECHO_CHUNK_SIZE,
  MAX_ECHO_CHAR_CODE,
  NOT_FOUND_MESSAGE,
  TERMINATOR,
} from '../utils/constants';
import { StegoEngine } from './stego-engine.interface';

const debug = createDebug('pcm-stego:echo');

/**
 * Echo hiding: each message bit is one chunk of the cover, added back onto
 * the signal `d0` (bit 0) or `d1` (bit 1) samples later at strength `alpha`.
 *
 * Decoding compares the stego signal with the original, so the original
 * audio has to be kept.
 *
 * Example usage:
 * ```typescript
 * const engine = new EchoEngine({ d0: 150, d1: 350, alpha: 0.6 });
 * const encoded = engine.encode(cover, 'hello');
 * if (encoded.ok) {
 *   const { result } = engine.decode(cover, encoded.buffer);
 * }
 * ```
 */
export class EchoEngine implements StegoEngine {
  readonly technique = 'echo';
  readonly chunkSize = ECHO_CHUNK_SIZE;
  private params: EchoParams;

  constructor(params: Partial<EchoParams> = {}) {
    this.params = resolveEchoParams(params);
    assertEchoParams(this.params);
  }

  /**
   * Get the current echo parameters
   */
  public getParams(): EchoParams {
    return { ...this.params };
  }

  /**
   * Update the echo parameters; the result is validated as a whole
   */
  public updateParams(params: Partial<EchoParams>): void {
    const next = { ...this.params, ...params };
    assertEchoParams(next);
    this.params = next;
  }

  public encode(buffer: SampleBuffer, message: string): EncodeResult {
    assertEncodableMessage(message);
    const { d0, d1, alpha } = this.params;
    const bits = encodeBits(message);
    const input = buffer.samples;
    const n = input.length;
    const maxDelay = Math.max(d0, d1);
    const required = bits.length * this.chunkSize + maxDelay;

    if (required > n) {
      debug('message needs %d samples, buffer has %d', required, n);
      return {
        ok: false,
        reason: 'CAPACITY_EXCEEDED',
        requiredSamples: required,
        availableSamples: n,
      };
    }

    // Echoes overlap into neighbouring chunks, so accumulate before quantizing
    const out = Float64Array.from(input);

    for (let i = 0; i < bits.length; i++) {
      const start = i * this.chunkSize;
      const end = Math.min(start + this.chunkSize, n - maxDelay);
      if (end <= start) {
        break;
      }

      const delay = bits[i] === 1 ? d1 : d0;
      const echoStart = start + delay;
      if (echoStart + (end - start) > n) {
        continue;
      }

      for (let j = start; j < end; j++) {
        out[j + delay] += alpha * input[j];
      }
    }

    debug('embedded %d bits as echoes', bits.length);
    return { ok: true, buffer: withSamples(buffer, quantizeToInt16(out)) };
  }

  /**
   * Recover bits by correlating each original chunk with the difference
   * signal at both candidate delays
   */
  public decode(original: SampleBuffer, stego: SampleBuffer): EchoDecodeOutcome {
    const { d0, d1 } = this.params;
    const maxDelay = Math.max(d0, d1);
    const orig = original.samples;
    const steg = stego.samples;
    const n = Math.min(orig.length, steg.length);

    if (orig.length !== steg.length) {
      // Buffers of different length are compared over the shorter one
      debug('length mismatch: original %d, stego %d; using %d', orig.length, steg.length, n);
    }

    const numChunks = Math.max(0, Math.floor((n - maxDelay) / this.chunkSize));
    const bits: BitStream = new Uint8Array(numChunks);
    const diagnostics: EchoDiagnostic[] = [];

    for (let i = 0; i < numChunks; i++) {
      const start = i * this.chunkSize;
      let sumD0 = 0;
      let sumD1 = 0;

      for (let k = 0; k < this.chunkSize; k++) {
        const x = orig[start + k];
        sumD0 += x * (steg[start + d0 + k] - orig[start + d0 + k]);
        sumD1 += x * (steg[start + d1 + k] - orig[start + d1 + k]);
      }

      const corrD0 = Math.abs(sumD0);
      const corrD1 = Math.abs(sumD1);
      const bit = corrD1 > corrD0 ? 1 : 0;
      bits[i] = bit;
      diagnostics.push({ chunk: i, corrD0, corrD1, bit });
    }

    return {
      result: decodeBits(bits, { maxByte: MAX_ECHO_CHAR_CODE }),
      diagnostics,
      bits,
    };
  }

  public capacity(buffer: SampleBuffer): number {
    const maxDelay = Math.max(this.params.d0, this.params.d1);
    const chunks = Math.floor((buffer.samples.length - maxDelay) / this.chunkSize);
    return Math.max(0, Math.floor(chunks / BITS_PER_CHAR) - TERMINATOR.length);
  }
}

/**
 * Render a diagnostic entry as a single line
 */
export function formatDiagnostic(entry: EchoDiagnostic): string {
  return `Chunk ${entry.chunk}: corr_d0=${entry.corrD0.toFixed(2)}, corr_d1=${entry.corrD1.toFixed(2)}, bit=${entry.bit}`;
}

/**
 * Hide a message as echoes at delay d0 (bit 0) or d1 (bit 1)
 */
export function encodeEcho(
  buffer: SampleBuffer,
  message: string,
  d0: number,
  d1: number,
  alpha: number
): EncodeResult {
  return new EchoEngine({ d0, d1, alpha }).encode(buffer, message);
}

/**
 * Recover an echo-hidden message using the original audio.
 * `message` is the not-found sentinel text when no terminator was located.
 */
export function decodeEcho(
  original: SampleBuffer,
  stego: SampleBuffer,
  d0: number,
  d1: number
): EchoDecodeReport {
  const { result, diagnostics, bits } = new EchoEngine({ d0, d1 }).decode(
    original,
    stego
  );
  return {
    message: result.found ? result.message : NOT_FOUND_MESSAGE,
    diagnostics,
    bits,
  };
}
