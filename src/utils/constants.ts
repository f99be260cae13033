// Message framing
export const TERMINATOR = '###';
export const TERMINATOR_CHAR = '#';
export const BITS_PER_CHAR = 8;
export const MAX_CHAR_CODE = 255;
export const MAX_ECHO_CHAR_CODE = 127;
export const NOT_FOUND_MESSAGE = 'No hidden message found';

// PCM sample range
export const PCM_BITS_PER_SAMPLE = 16;
export const PCM_BYTES_PER_SAMPLE = 2;
export const INT16_MIN = -32768;
export const INT16_MAX = 32767;
export const LSB_CLEAR_MASK = 0xfffe;

// Echo hiding defaults
export const ECHO_CHUNK_SIZE = 8192; // samples per embedded bit
export const DEFAULT_D0 = 200;
export const DEFAULT_D1 = 400;
export const DEFAULT_ALPHA = 0.5;

// Host-facing echo parameter ranges
export const MIN_DELAY = 100;
export const MAX_DELAY = 500;
export const DELAY_STEP = 50;
export const MIN_ALPHA = 0.3;
export const MAX_ALPHA = 0.8;

// WAV container layout
export const RIFF_HEADER_SIZE = 12;
export const CHUNK_HEADER_SIZE = 8;
export const FMT_CHUNK_MIN_SIZE = 16;
export const WAV_HEADER_SIZE = 44;
export const WAVE_FORMAT_PCM = 1;
export const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

// Stego WebSocket service
export const STEGO_SERVER_PORT = 8765;
export const MAX_REQUEST_BYTES = 64 * 1024 * 1024;
