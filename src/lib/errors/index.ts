export { type AppError, AppErrorClass, createError } from './base.js';
export { type DateError, DateErrors, type TemporalKind } from './date-errors.js';
export { type ValidationError, ValidationErrors } from './validation-errors.js';
