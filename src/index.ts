// Export everything needed from the library structure
export * from './interfaces';
export * from './utils';
export * from './processors';
export * from './transport';

import { compareSchemes, computeSnr } from './analysis/snr';
import {
  createSampleBuffer,
  fromSamples,
  quantizeToInt16,
  withSamples,
} from './audio/sample-buffer';
import { readContainer, writeContainer } from './audio/wav-container';
import {
  assertEncodableMessage,
  decodeBits,
  DecodeBitsOptions,
  encodeBits,
  frameLength,
} from './codec/bit-codec';
import {
  DEFAULT_ECHO_PARAMS,
  echoConfigSchema,
  resolveEchoParams,
  validateEchoConfig,
} from './config/echo-config';
import {
  decodeEcho,
  EchoEngine,
  encodeEcho,
  formatDiagnostic,
} from './engines/echo-engine';
import { decodeLsb, encodeLsb, LsbEngine } from './engines/lsb-engine';
import { StegoEngine, StegoTechnique } from './engines/stego-engine.interface';

export {
  // Core operations
  encodeLsb,
  decodeLsb,
  encodeEcho,
  decodeEcho,

  // Engines
  LsbEngine,
  EchoEngine,
  StegoEngine,
  StegoTechnique,
  formatDiagnostic,

  // Bit framing
  encodeBits,
  decodeBits,
  DecodeBitsOptions,
  frameLength,
  assertEncodableMessage,

  // Sample buffers and WAV container
  createSampleBuffer,
  fromSamples,
  withSamples,
  quantizeToInt16,
  readContainer,
  writeContainer,

  // Echo configuration
  DEFAULT_ECHO_PARAMS,
  echoConfigSchema,
  resolveEchoParams,
  validateEchoConfig,

  // Quality analysis
  computeSnr,
  compareSchemes,
};
