import createDebug from 'debug';
import { readContainer, writeContainer } from '../audio/wav-container';
import { decodeLsb, encodeLsb } from '../engines/lsb-engine';

const debug = createDebug('pcm-stego:processor');

/**
 * Hide a message in the LSBs of a WAV file
 *
 * @param wavBytes Cover WAV file (16-bit PCM)
 * @param message Message to hide
 * @returns The stego WAV file, or null when the message does not fit
 */
export function encodeLsbWav(wavBytes: Buffer | Uint8Array, message: string): Buffer | null {
  const encoded = encodeLsb(readContainer(wavBytes), message);
  if (!encoded.ok) {
    debug(
      'LSB: message too large (%d samples needed, %d available)',
      encoded.requiredSamples,
      encoded.availableSamples
    );
    return null;
  }
  return writeContainer(encoded.buffer);
}

/**
 * Read an LSB message from a WAV file
 */
export function decodeLsbWav(wavBytes: Buffer | Uint8Array): string {
  return decodeLsb(readContainer(wavBytes));
}
