import { BitStream, DecodeResult } from '../interfaces';
import {
  BITS_PER_CHAR,
  MAX_CHAR_CODE,
  TERMINATOR,
  TERMINATOR_CHAR,
} from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';

/**
 * Options for turning a bit stream back into text
 */
export interface DecodeBitsOptions {
  /**
   * Largest byte value accepted as a character. A larger value ends decoding
   * the same way a zero byte does. Default: 255
   */
  maxByte?: number;
}

/**
 * Number of bits encodeBits emits for a message, terminator included
 */
export function frameLength(message: string): number {
  return (message.length + TERMINATOR.length) * BITS_PER_CHAR;
}

/**
 * Throw unless every character of the message fits in one byte
 */
export function assertEncodableMessage(message: string): void {
  for (let i = 0; i < message.length; i++) {
    const code = message.charCodeAt(i);
    if (code > MAX_CHAR_CODE) {
      throw ErrorFactory.INVALID_MESSAGE(
        `Character at index ${i} (code ${code}) does not fit in a single byte`
      );
    }
  }
}

/**
 * Append the terminator and expand every character to 8 bits, MSB first
 */
export function encodeBits(message: string): BitStream {
  const framed = message + TERMINATOR;
  const bits = new Uint8Array(framed.length * BITS_PER_CHAR);

  for (let i = 0; i < framed.length; i++) {
    const code = framed.charCodeAt(i);
    for (let b = 0; b < BITS_PER_CHAR; b++) {
      bits[i * BITS_PER_CHAR + b] = (code >> (BITS_PER_CHAR - 1 - b)) & 1;
    }
  }

  return bits;
}

/**
 * Read 8-bit groups and return the text before the last terminator seen.
 *
 * Reading stops at a zero byte, a byte above `maxByte`, a partial trailing
 * group or the end of the stream. Terminators earlier in the text belong to
 * the message body, so a body containing "###" comes back unchanged.
 *
 * A later terminator only replaces an earlier one when a character other
 * than '#' lies between them. Stray '#' bytes right after the payload are
 * dropped, and a body ending in '#' loses those trailing '#' characters.
 */
export function decodeBits(
  bits: ArrayLike<number>,
  options: DecodeBitsOptions = {}
): DecodeResult {
  const maxByte = options.maxByte ?? MAX_CHAR_CODE;
  let text = '';
  let messageEnd = -1;
  let bodySinceMatch = true;

  for (let i = 0; i + BITS_PER_CHAR <= bits.length; i += BITS_PER_CHAR) {
    let value = 0;
    for (let b = 0; b < BITS_PER_CHAR; b++) {
      value = (value << 1) | (bits[i + b] & 1);
    }

    // Unused capacity is usually all zeros, so a zero byte ends the payload
    if (value === 0 || value > maxByte) {
      break;
    }

    const char = String.fromCharCode(value);
    text += char;
    if (char !== TERMINATOR_CHAR) {
      bodySinceMatch = true;
    }

    if (bodySinceMatch && text.endsWith(TERMINATOR)) {
      messageEnd = text.length - TERMINATOR.length;
      bodySinceMatch = false;
    }
  }

  if (messageEnd < 0) {
    return { found: false };
  }
  return { found: true, message: text.slice(0, messageEnd) };
}
