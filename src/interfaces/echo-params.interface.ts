/**
 * Parameters shared by an echo encode call and the decode call that reads it back
 */
export interface EchoParams {
  d0: number; // echo delay in samples for a 0 bit
  d1: number; // echo delay in samples for a 1 bit
  alpha: number; // echo attenuation, in (0, 1]
}

/**
 * Subset of EchoParams needed to decode
 */
export type EchoDecodeParams = Pick<EchoParams, 'd0' | 'd1'>;
