import { EncodeResult, SampleBuffer } from '../interfaces';

export type StegoTechnique = 'lsb' | 'echo';

/**
 * Common surface of the embedding engines
 */
export interface StegoEngine {
  readonly technique: StegoTechnique;

  /**
   * Embed a message, returning a new buffer or a capacity failure
   * @param buffer Cover audio; never modified
   * @param message Text whose characters each fit in one byte
   */
  encode(buffer: SampleBuffer, message: string): EncodeResult;

  /**
   * Longest message, in characters, that fits in the buffer
   */
  capacity(buffer: SampleBuffer): number;
}
