import { type AppError, ValidationErrors } from '../errors/index.js';
import { err, ok, type Result } from './result.js';

/** `JSON.parse` without exceptions. */
export const decodeJSON = (text: string): Result<unknown, AppError> => {
  try {
    const value: unknown = JSON.parse(text);
    return ok(value);
  } catch (error) {
    return err(ValidationErrors.INVALID_JSON(error instanceof Error ? error.message : String(error)));
  }
};
