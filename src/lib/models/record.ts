import { z } from 'zod';
import { type AppError, ValidationErrors } from '../errors/index.js';
import { err, ok, type Result } from '../utils/result.js';

export const modelNameSchema = z.string().min(1).brand<'ModelName'>();
export const fieldNameSchema = z.string().min(1).brand<'FieldName'>();

export type ModelName = z.infer<typeof modelNameSchema>;
export type FieldName = z.infer<typeof fieldNameSchema>;

export const asModelName = (name: string): ModelName => modelNameSchema.parse(name);
export const asFieldName = (name: string): FieldName => fieldNameSchema.parse(name);

/** Key to label choices of a selection field. */
export type Selection = Record<string, string>;

/** Identifies one record by model and id. */
export interface RecordRef {
  readonly modelName: ModelName;
  readonly id: number;
}

/** A set of records of one model. */
export interface RecordSet {
  modelName(): ModelName;
  ids(): number[];
}

const recordIdWithNameSchema = z.tuple([z.number().int().safe(), z.string()]);

/** A record id with its display name, JSON-encoded as `[id, name]`. */
export class RecordIDWithName {
  constructor(
    readonly id: number,
    readonly name: string
  ) {}

  toJSON(): [number, string] {
    return [this.id, this.name];
  }

  static fromJSON(raw: unknown): Result<RecordIDWithName, AppError> {
    const parsed = recordIdWithNameSchema.safeParse(raw);
    if (!parsed.success) {
      return err(ValidationErrors.DECODE_ERROR('RecordIDWithName', parsed.error.issues));
    }
    const [id, name] = parsed.data;
    return ok(new RecordIDWithName(id, name));
  }
}
