import type { ZodIssue } from 'zod';
import { createError } from './base.js';

type ValidationIssue = Pick<ZodIssue, 'path' | 'message'>;

export const ValidationErrors = {
  DECODE_ERROR: (target: string, errors: ValidationIssue[]) =>
    createError('DECODE_ERROR', `Cannot decode ${target}`, 400, {
      target,
      errors: errors.map((error) => ({
        path: error.path.join('.'),
        message: error.message,
      })),
    }),
  INVALID_JSON: (reason: string) =>
    createError('DECODE_ERROR', `Invalid JSON: ${reason}`, 400, { reason }),
} as const;

export type ValidationError =
  | ReturnType<typeof ValidationErrors.DECODE_ERROR>
  | ReturnType<typeof ValidationErrors.INVALID_JSON>;
