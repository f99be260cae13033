import createDebug from 'debug';
import { SampleBuffer } from '../interfaces';
import {
  CHUNK_HEADER_SIZE,
  FMT_CHUNK_MIN_SIZE,
  PCM_BITS_PER_SAMPLE,
  PCM_BYTES_PER_SAMPLE,
  RIFF_HEADER_SIZE,
  WAVE_FORMAT_EXTENSIBLE,
  WAVE_FORMAT_PCM,
  WAV_HEADER_SIZE,
} from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';
import { createSampleBuffer } from './sample-buffer';

const debug = createDebug('pcm-stego:wav');

interface FmtChunk {
  formatCode: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

/**
 * Parse the fmt chunk body. WAVE_FORMAT_EXTENSIBLE is resolved to the
 * format code stored in its sub-format GUID.
 */
function parseFmtChunk(bytes: Buffer, offset: number, size: number): FmtChunk {
  if (size < FMT_CHUNK_MIN_SIZE) {
    throw ErrorFactory.FORMAT(`fmt chunk too short: ${size} bytes`);
  }

  let formatCode = bytes.readUInt16LE(offset);
  const channels = bytes.readUInt16LE(offset + 2);
  const sampleRate = bytes.readUInt32LE(offset + 4);
  const bitsPerSample = bytes.readUInt16LE(offset + 14);

  if (formatCode === WAVE_FORMAT_EXTENSIBLE) {
    // cbSize(2) validBits(2) channelMask(4) then the GUID, whose first two
    // bytes are the real format code
    if (size < 40) {
      throw ErrorFactory.FORMAT('Extensible fmt chunk is missing its sub-format');
    }
    formatCode = bytes.readUInt16LE(offset + 24);
  }

  return { formatCode, channels, sampleRate, bitsPerSample };
}

/**
 * Parse a RIFF/WAVE byte stream holding 16-bit PCM into a SampleBuffer.
 * Chunks other than `fmt ` and `data` are skipped.
 */
export function readContainer(bytes: Buffer | Uint8Array): SampleBuffer {
  const data = Buffer.isBuffer(bytes)
    ? bytes
    : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  if (
    data.length < RIFF_HEADER_SIZE ||
    data.toString('ascii', 0, 4) !== 'RIFF' ||
    data.toString('ascii', 8, 12) !== 'WAVE'
  ) {
    throw ErrorFactory.FORMAT('Not a RIFF/WAVE file');
  }

  let fmt: FmtChunk | undefined;
  let dataOffset = -1;
  let dataSize = 0;
  let offset = RIFF_HEADER_SIZE;

  while (offset + CHUNK_HEADER_SIZE <= data.length) {
    const id = data.toString('ascii', offset, offset + 4);
    const size = data.readUInt32LE(offset + 4);
    const body = offset + CHUNK_HEADER_SIZE;

    if (id === 'fmt ' && !fmt) {
      if (body + size > data.length) {
        throw ErrorFactory.FORMAT('fmt chunk runs past the end of the file');
      }
      fmt = parseFmtChunk(data, body, size);
    } else if (id === 'data') {
      dataOffset = body;
      // A truncated file keeps whatever sample data is present
      dataSize = Math.min(size, data.length - body);
      break;
    }

    // Chunks are word aligned
    offset = body + size + (size % 2);
  }

  if (!fmt) {
    throw ErrorFactory.FORMAT('Missing fmt chunk');
  }
  if (dataOffset < 0) {
    throw ErrorFactory.FORMAT('Missing data chunk');
  }
  if (fmt.formatCode !== WAVE_FORMAT_PCM) {
    throw ErrorFactory.FORMAT(`Unsupported WAV format code ${fmt.formatCode}; only PCM is supported`);
  }
  if (fmt.bitsPerSample !== PCM_BITS_PER_SAMPLE) {
    throw ErrorFactory.FORMAT(`Unsupported sample width: ${fmt.bitsPerSample} bits`);
  }
  if (fmt.channels < 1) {
    throw ErrorFactory.FORMAT('WAV file declares no channels');
  }

  const frameBytes = fmt.channels * PCM_BYTES_PER_SAMPLE;
  const frames = Math.floor(dataSize / frameBytes);
  const samples = new Int16Array(frames * fmt.channels);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = data.readInt16LE(dataOffset + i * PCM_BYTES_PER_SAMPLE);
  }

  debug('read %d frames, %d channel(s) at %d Hz', frames, fmt.channels, fmt.sampleRate);

  return createSampleBuffer(samples, {
    channels: fmt.channels,
    sampleRate: fmt.sampleRate,
    bitsPerSample: PCM_BITS_PER_SAMPLE,
    frames,
  });
}

/**
 * Serialize a SampleBuffer as a canonical 44-byte-header PCM WAV file
 */
export function writeContainer(buffer: SampleBuffer): Buffer {
  const { samples, format } = buffer;
  const dataSize = samples.length * PCM_BYTES_PER_SAMPLE;
  const blockAlign = format.channels * PCM_BYTES_PER_SAMPLE;
  const out = Buffer.alloc(WAV_HEADER_SIZE + dataSize);

  out.write('RIFF', 0, 'ascii');
  out.writeUInt32LE(WAV_HEADER_SIZE - CHUNK_HEADER_SIZE + dataSize, 4);
  out.write('WAVE', 8, 'ascii');
  out.write('fmt ', 12, 'ascii');
  out.writeUInt32LE(FMT_CHUNK_MIN_SIZE, 16);
  out.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  out.writeUInt16LE(format.channels, 22);
  out.writeUInt32LE(format.sampleRate, 24);
  out.writeUInt32LE(format.sampleRate * blockAlign, 28);
  out.writeUInt16LE(blockAlign, 32);
  out.writeUInt16LE(PCM_BITS_PER_SAMPLE, 34);
  out.write('data', 36, 'ascii');
  out.writeUInt32LE(dataSize, 40);

  for (let i = 0; i < samples.length; i++) {
    out.writeInt16LE(samples[i], WAV_HEADER_SIZE + i * PCM_BYTES_PER_SAMPLE);
  }

  return out;
}
