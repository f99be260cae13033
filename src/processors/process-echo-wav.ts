import createDebug from 'debug';
import { readContainer, writeContainer } from '../audio/wav-container';
import { resolveEchoParams } from '../config/echo-config';
import { decodeEcho, encodeEcho } from '../engines/echo-engine';
import { EchoDecodeParams, EchoDecodeReport, EchoParams } from '../interfaces';

const debug = createDebug('pcm-stego:processor');

/**
 * Hide a message as echoes in a WAV file. Keep the cover file: decoding
 * needs it.
 *
 * @param wavBytes Cover WAV file (16-bit PCM)
 * @param message Message to hide
 * @param params Echo delays and strength (default: d0=200, d1=400, alpha=0.5)
 * @returns The stego WAV file, or null when the message does not fit
 */
export function encodeEchoWav(
  wavBytes: Buffer | Uint8Array,
  message: string,
  params: Partial<EchoParams> = {}
): Buffer | null {
  const { d0, d1, alpha } = resolveEchoParams(params);
  const encoded = encodeEcho(readContainer(wavBytes), message, d0, d1, alpha);
  if (!encoded.ok) {
    debug(
      'echo: message too large (%d samples needed, %d available)',
      encoded.requiredSamples,
      encoded.availableSamples
    );
    return null;
  }
  return writeContainer(encoded.buffer);
}

/**
 * Read an echo-hidden message by comparing a stego WAV with its original
 */
export function decodeEchoWav(
  originalBytes: Buffer | Uint8Array,
  stegoBytes: Buffer | Uint8Array,
  params: Partial<EchoDecodeParams> = {}
): EchoDecodeReport {
  const { d0, d1 } = resolveEchoParams(params);
  return decodeEcho(readContainer(originalBytes), readContainer(stegoBytes), d0, d1);
}
