import { SampleBuffer } from './audio-format.interface';

/**
 * Ordered 0/1 values
 */
export type BitStream = Uint8Array;

/**
 * Outcome of an embedding call.
 * Capacity exhaustion is reported here rather than thrown.
 */
export type EncodeResult =
  | { ok: true; buffer: SampleBuffer }
  | {
      ok: false;
      reason: 'CAPACITY_EXCEEDED';
      requiredSamples: number;
      availableSamples: number;
    };

/**
 * Outcome of bit-stream decoding. A missing terminator is not an error.
 */
export type DecodeResult =
  | { found: true; message: string }
  | { found: false };

/**
 * Per-chunk correlation record produced by echo decoding
 */
export interface EchoDiagnostic {
  chunk: number;
  corrD0: number;
  corrD1: number;
  bit: 0 | 1;
}

export interface EchoDecodeOutcome {
  result: DecodeResult;
  diagnostics: EchoDiagnostic[];
  bits: BitStream;
}

/**
 * Echo decoding as shown to callers: `message` holds the not-found text
 * when no terminator was located
 */
export interface EchoDecodeReport {
  message: string;
  diagnostics: EchoDiagnostic[];
  bits: BitStream;
}
