import createDebug from 'debug';
import { z } from 'zod';
import { resolveEchoParams, validateEchoConfig } from '../config/echo-config';
import { formatDiagnostic } from '../engines/echo-engine';
import { StegoTechnique } from '../engines/stego-engine.interface';
import { StegoError, StegoErrorType } from '../interfaces';
import { decodeEchoWav, encodeEchoWav } from '../processors/process-echo-wav';
import { decodeLsbWav, encodeLsbWav } from '../processors/process-lsb-wav';
import { ErrorFactory } from '../utils/error-factory';

const debug = createDebug('pcm-stego:server');

const base64Schema = z.string().min(1);
const techniqueSchema = z.enum(['lsb', 'echo']);

export const stegoRequestSchema = z.discriminatedUnion('action', [
  z
    .object({
      id: z.string().max(128).optional(),
      action: z.literal('encode'),
      technique: techniqueSchema,
      audio: base64Schema, // cover WAV
      message: z.string().min(1),
      d0: z.number().optional(),
      d1: z.number().optional(),
      alpha: z.number().optional(),
    })
    .strict(),
  z
    .object({
      id: z.string().max(128).optional(),
      action: z.literal('decode'),
      technique: techniqueSchema,
      audio: base64Schema, // stego WAV
      original: base64Schema.optional(), // required for echo
      d0: z.number().optional(),
      d1: z.number().optional(),
    })
    .strict(),
]).superRefine((val, ctx) => {
  if (val.action === 'decode' && val.technique === 'echo' && val.original === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'original audio is required to decode echo hiding',
      path: ['original'],
    });
  }
});

export type StegoRequest = z.infer<typeof stegoRequestSchema>;

export type StegoResponse =
  | {
      id?: string;
      ok: true;
      action: 'encode';
      technique: StegoTechnique;
      audio: string; // stego WAV, base64
      requiresOriginal: boolean;
    }
  | {
      id?: string;
      ok: true;
      action: 'decode';
      technique: StegoTechnique;
      message: string;
      diagnostics?: string[];
      bits?: string;
    }
  | {
      id?: string;
      ok: false;
      error: { type: StegoErrorType; message: string };
    };

function toBytes(base64: string): Buffer {
  return Buffer.from(base64, 'base64');
}

function handleEncode(request: Extract<StegoRequest, { action: 'encode' }>): StegoResponse {
  const { id, technique, message } = request;
  let stego: Buffer | null;

  if (technique === 'lsb') {
    stego = encodeLsbWav(toBytes(request.audio), message);
  } else {
    const params = validateEchoConfig(resolveEchoParams(request));
    stego = encodeEchoWav(toBytes(request.audio), message, params);
  }

  if (!stego) {
    throw ErrorFactory.CAPACITY('Message is too large for this audio file');
  }

  return {
    id,
    ok: true,
    action: 'encode',
    technique,
    audio: stego.toString('base64'),
    requiresOriginal: technique === 'echo',
  };
}

function handleDecode(request: Extract<StegoRequest, { action: 'decode' }>): StegoResponse {
  const { id, technique } = request;

  if (technique === 'lsb') {
    return { id, ok: true, action: 'decode', technique, message: decodeLsbWav(toBytes(request.audio)) };
  }

  if (request.original === undefined) {
    throw ErrorFactory.INVALID_REQUEST('original audio is required to decode echo hiding');
  }
  const { d0, d1 } = validateEchoConfig(resolveEchoParams({ d0: request.d0, d1: request.d1 }));
  const decoded = decodeEchoWav(toBytes(request.original), toBytes(request.audio), { d0, d1 });

  return {
    id,
    ok: true,
    action: 'decode',
    technique,
    message: decoded.message,
    diagnostics: decoded.diagnostics.map(formatDiagnostic),
    bits: decoded.bits.join(''),
  };
}

/**
 * Parse a JSON request, run it, and describe the outcome as a response.
 * Failures become `ok: false` responses.
 */
export function handleStegoRequest(raw: string): StegoResponse {
  let id: string | undefined;

  try {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw ErrorFactory.INVALID_REQUEST(
        'Request is not valid JSON',
        err instanceof Error ? err : undefined
      );
    }

    const parsed = stegoRequestSchema.safeParse(json);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`)
        .join('; ');
      throw ErrorFactory.INVALID_REQUEST(`Invalid request: ${detail}`);
    }

    const request = parsed.data;
    id = request.id;
    debug('%s/%s request %s', request.action, request.technique, id ?? '-');

    return request.action === 'encode' ? handleEncode(request) : handleDecode(request);
  } catch (err) {
    const stegoError =
      err instanceof StegoError
        ? err
        : ErrorFactory.INTERNAL(
            err instanceof Error ? err.message : String(err),
            err instanceof Error ? err : undefined
          );
    debug('request %s failed (%s): %s', id ?? '-', stegoError.type, stegoError.message);
    return { id, ok: false, error: { type: stegoError.type, message: stegoError.message } };
  }
}
