/**
 * @fileoverview Schemas de validación usando Zod para la sesión DFU y la configuración
 * @module schemas
 */

import { z } from 'zod';
import { VALIDATIONS } from '../constants/validations';
import { errorMessageOf } from './errors';
import type { DfuEventHandler } from '../engines/types';

export interface ZodValidationResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

const sizeSchema = z
  .number()
  .int(VALIDATIONS.SIZE.MUST_BE_INTEGER)
  .positive(VALIDATIONS.SIZE.MUST_BE_POSITIVE);

const logLevelSchema = z.union([
  z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']),
  z.literal(false),
]);

export const sessionOptionsSchema = z.object({
  host: z.string().trim().min(1, VALIDATIONS.SESSION.HOST_REQUIRED),
  resource: z.string().min(1, VALIDATIONS.SESSION.RESOURCE_REQUIRED),
  callback: z.custom<DfuEventHandler>(
    value => typeof value === 'function',
    VALIDATIONS.SESSION.CALLBACK_REQUIRED
  ),
});

export const downloadOffsetSchema = z
  .number()
  .int(VALIDATIONS.SIZE.MUST_BE_INTEGER)
  .min(0, VALIDATIONS.SIZE.OFFSET_NOT_NEGATIVE);

export const clientConfigSchema = z.object({
  dfu: z
    .object({
      maxRequestSize: sizeSchema,
      maxResponseSize: sizeSchema,
      maxFragmentSize: sizeSchema,
    })
    .refine(dfu => dfu.maxResponseSize > dfu.maxFragmentSize, {
      message: VALIDATIONS.SIZE.RESPONSE_TOO_SMALL,
      path: ['maxResponseSize'],
    }),
  network: z.object({
    port: z
      .number()
      .int()
      .min(1, VALIDATIONS.NETWORK.PORT_RANGE)
      .max(65535, VALIDATIONS.NETWORK.PORT_RANGE),
    family: z.union([z.literal(4), z.literal(6)], {
      errorMap: () => ({ message: VALIDATIONS.NETWORK.FAMILY_INVALID }),
    }),
    connectTimeout: sizeSchema,
  }),
  runner: z.object({
    maxRetries: z.number().int().min(0),
    retryDelay: z.number().int().min(0),
    maxRetryDelay: z.number().int().min(0),
    pollInterval: sizeSchema,
  }),
  logging: z.object({
    consoleLevel: logLevelSchema,
    fileLevel: logLevelSchema,
  }),
});

export function validate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): ZodValidationResult<z.infer<S>> {
  try {
    const result = schema.safeParse(data);

    if (result.success) {
      return {
        success: true,
        data: result.data,
      };
    }
    const issues = result.error.issues ?? [];
    const errorMessages = issues.map((err: z.ZodIssue) => {
      const path = err.path;
      const pathStr = path.length > 0 ? `${path.join('.')}: ` : '';
      return `${pathStr}${err.message}`;
    });

    return {
      success: false,
      error: errorMessages.join('; '),
    };
  } catch (error) {
    return {
      success: false,
      error: `${VALIDATIONS.GENERIC.VALIDATION_ERROR}: ${errorMessageOf(error)}`,
    };
  }
}

export function validateSessionOptions(
  options: unknown
): ZodValidationResult<z.infer<typeof sessionOptionsSchema>> {
  return validate(sessionOptionsSchema, options);
}

export function validateDownloadOffset(offset: unknown): ZodValidationResult<number> {
  return validate(downloadOffsetSchema, offset);
}
