import createDebug from 'debug';
import {
  assertEncodableMessage,
  decodeBits,
  encodeBits,
} from '../codec/bit-codec';
import { withSamples } from '../audio/sample-buffer';
import { DecodeResult, EncodeResult, SampleBuffer } from '../interfaces';
import {
  BITS_PER_CHAR,
  LSB_CLEAR_MASK,
  NOT_FOUND_MESSAGE,
  TERMINATOR,
} from '../utils/constants';
import { StegoEngine } from './stego-engine.interface';

const debug = createDebug('pcm-stego:lsb');

/**
 * Least-significant-bit substitution: one message bit per sample.
 *
 * Only bit 0 of each carrying sample changes, so the upper 15 bits of every
 * sample match the cover. Samples after the payload are copied unchanged.
 */
export class LsbEngine implements StegoEngine {
  readonly technique = 'lsb';

  public encode(buffer: SampleBuffer, message: string): EncodeResult {
    assertEncodableMessage(message);
    const bits = encodeBits(message);
    const available = buffer.samples.length;

    if (bits.length > available) {
      debug('message needs %d samples, buffer has %d', bits.length, available);
      return {
        ok: false,
        reason: 'CAPACITY_EXCEEDED',
        requiredSamples: bits.length,
        availableSamples: available,
      };
    }

    const out = new Int16Array(buffer.samples);
    // Work on the unsigned pattern so negative samples keep their sign bits
    const pattern = new Uint16Array(out.buffer, out.byteOffset, out.length);
    for (let i = 0; i < bits.length; i++) {
      pattern[i] = (pattern[i] & LSB_CLEAR_MASK) | bits[i];
    }

    debug('embedded %d bits', bits.length);
    return { ok: true, buffer: withSamples(buffer, out) };
  }

  public decode(buffer: SampleBuffer): DecodeResult {
    const { samples } = buffer;
    const bits = new Uint8Array(samples.length);
    for (let i = 0; i < samples.length; i++) {
      bits[i] = samples[i] & 1;
    }
    return decodeBits(bits);
  }

  public capacity(buffer: SampleBuffer): number {
    return Math.max(
      0,
      Math.floor(buffer.samples.length / BITS_PER_CHAR) - TERMINATOR.length
    );
  }
}

const defaultEngine = new LsbEngine();

/**
 * Hide a message in the least-significant bits of the buffer
 */
export function encodeLsb(buffer: SampleBuffer, message: string): EncodeResult {
  return defaultEngine.encode(buffer, message);
}

/**
 * Recover an LSB message, or the not-found sentinel text
 */
export function decodeLsb(buffer: SampleBuffer): string {
  const result = defaultEngine.decode(buffer);
  return result.found ? result.message : NOT_FOUND_MESSAGE;
}
