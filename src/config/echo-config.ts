import { z } from 'zod';
import { EchoParams } from '../interfaces';
import {
  DEFAULT_ALPHA,
  DEFAULT_D0,
  DEFAULT_D1,
  DELAY_STEP,
  MAX_ALPHA,
  MAX_DELAY,
  MIN_ALPHA,
  MIN_DELAY,
} from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';

export const DEFAULT_ECHO_PARAMS: Readonly<EchoParams> = Object.freeze({
  d0: DEFAULT_D0,
  d1: DEFAULT_D1,
  alpha: DEFAULT_ALPHA,
});

const delaySchema = z
  .number()
  .int()
  .min(MIN_DELAY)
  .max(MAX_DELAY)
  .refine((value) => value % DELAY_STEP === 0, {
    message: `Delay must be a multiple of ${DELAY_STEP}`,
  });

// Ranges offered to users of a host service; the engine itself accepts any
// positive integer delays
export const echoConfigSchema = z
  .object({
    d0: delaySchema,
    d1: delaySchema,
    alpha: z.number().min(MIN_ALPHA).max(MAX_ALPHA),
  })
  .strict()
  .superRefine((val, ctx) => {
    if (val.d0 === val.d1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'd0 and d1 must differ',
        path: ['d1'],
      });
    }
  });

/**
 * Fill unset echo parameters with the defaults
 */
export function resolveEchoParams(params: Partial<EchoParams> = {}): EchoParams {
  return {
    d0: params.d0 ?? DEFAULT_ECHO_PARAMS.d0,
    d1: params.d1 ?? DEFAULT_ECHO_PARAMS.d1,
    alpha: params.alpha ?? DEFAULT_ECHO_PARAMS.alpha,
  };
}

/**
 * Check the preconditions the echo engine depends on
 */
export function assertEchoDelays(d0: number, d1: number): void {
  for (const [name, delay] of [['d0', d0], ['d1', d1]] as const) {
    if (!Number.isInteger(delay) || delay <= 0) {
      throw ErrorFactory.INVALID_CONFIG(`${name} must be a positive integer, got ${delay}`);
    }
  }
  if (d0 === d1) {
    throw ErrorFactory.INVALID_CONFIG('d0 and d1 must differ');
  }
}

/**
 * Check delays and attenuation before encoding
 */
export function assertEchoParams(params: EchoParams): void {
  assertEchoDelays(params.d0, params.d1);
  if (!(params.alpha > 0 && params.alpha <= 1)) {
    throw ErrorFactory.INVALID_CONFIG(`alpha must be in (0, 1], got ${params.alpha}`);
  }
}

/**
 * Validate echo parameters against the host-facing ranges
 */
export function validateEchoConfig(params: EchoParams): EchoParams {
  const parsed = echoConfigSchema.safeParse(params);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw ErrorFactory.INVALID_CONFIG(`Invalid echo parameters: ${detail}`);
  }
  return parsed.data;
}
