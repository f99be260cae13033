import {
  assertEncodableMessage,
  decodeBits,
  encodeBits,
  frameLength,
} from '../src/codec/bit-codec';
import { StegoError, StegoErrorType } from '../src/interfaces';
import { captureError } from './helpers';

function byteBits(value: number): number[] {
  return [7, 6, 5, 4, 3, 2, 1, 0].map((shift) => (value >> shift) & 1);
}

describe('BitCodec', () => {
  describe('encodeBits', () => {
    it('should append the terminator and emit 8 bits per character, MSB first', () => {
      const bits = encodeBits('A');

      expect(bits.length).toBe(32);
      expect(Array.from(bits.slice(0, 8))).toEqual([0, 1, 0, 0, 0, 0, 0, 1]);
      // '#' is 0x23
      expect(Array.from(bits.slice(8, 16))).toEqual([0, 0, 1, 0, 0, 0, 1, 1]);
      expect(Array.from(bits.slice(24, 32))).toEqual([0, 0, 1, 0, 0, 0, 1, 1]);
    });

    it('should frame an empty message as the terminator alone', () => {
      expect(encodeBits('').length).toBe(24);
      expect(decodeBits(encodeBits(''))).toEqual({ found: true, message: '' });
    });

    it('should report the framed length', () => {
      expect(frameLength('HI')).toBe(40);
      expect(frameLength('')).toBe(24);
      expect(frameLength('HI')).toBe(encodeBits('HI').length);
    });
  });

  describe('decodeBits', () => {
    it('should decode a framed message', () => {
      expect(decodeBits(encodeBits('hello world'))).toEqual({
        found: true,
        message: 'hello world',
      });
    });

    it('should keep a terminator that is part of the message body', () => {
      expect(decodeBits(encodeBits('a###b'))).toEqual({ found: true, message: 'a###b' });
      expect(decodeBits(encodeBits('###b'))).toEqual({ found: true, message: '###b' });
    });

    it('should drop stray # bytes that follow the terminator', () => {
      const bits = [...Array.from(encodeBits('HI')), ...byteBits(0x23), ...byteBits(0x23)];
      expect(decodeBits(bits)).toEqual({ found: true, message: 'HI' });
    });

    it('should lose the trailing # characters of a body that ends in #', () => {
      expect(decodeBits(encodeBits('#'))).toEqual({ found: true, message: '' });
      expect(decodeBits(encodeBits('ab##'))).toEqual({ found: true, message: 'ab' });
    });

    it('should stop at a zero byte before looking for the terminator', () => {
      const bits = [...byteBits(0), ...Array.from(encodeBits('HI'))];
      expect(decodeBits(bits)).toEqual({ found: false });
    });

    it('should ignore a partial trailing group', () => {
      const bits = encodeBits('HI').slice(0, 37);
      expect(decodeBits(bits)).toEqual({ found: false });
    });

    it('should ignore trailing zero padding after the message', () => {
      const bits = [...Array.from(encodeBits('HI')), ...new Array(80).fill(0)];
      expect(decodeBits(bits)).toEqual({ found: true, message: 'HI' });
    });

    it('should report not found when the stream ends without a terminator', () => {
      const bits = [...byteBits(0x48), ...byteBits(0x49)];
      expect(decodeBits(bits)).toEqual({ found: false });
      expect(decodeBits([])).toEqual({ found: false });
    });

    it('should accept high byte values by default', () => {
      expect(decodeBits(encodeBits('café'))).toEqual({ found: true, message: 'café' });
    });

    it('should stop at a byte above maxByte', () => {
      expect(decodeBits(encodeBits('café'), { maxByte: 127 })).toEqual({ found: false });
      expect(decodeBits(encodeBits('cafe'), { maxByte: 127 })).toEqual({
        found: true,
        message: 'cafe',
      });
    });
  });

  describe('assertEncodableMessage', () => {
    it('should accept single-byte characters', () => {
      expect(() => assertEncodableMessage('plain ÿ text')).not.toThrow();
    });

    it('should reject characters wider than one byte', () => {
      const err = captureError(() => assertEncodableMessage('abĀ'));

      expect(err).toBeInstanceOf(StegoError);
      expect(err).toMatchObject({
        type: StegoErrorType.INVALID_MESSAGE,
        message: 'Character at index 2 (code 256) does not fit in a single byte',
      });
    });
  });
});
