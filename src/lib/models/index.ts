export { FieldMap, type KeySubstitution } from './field-map.js';
export {
  asFieldName,
  asModelName,
  type FieldName,
  fieldNameSchema,
  type ModelName,
  modelNameSchema,
  RecordIDWithName,
  type RecordRef,
  type RecordSet,
  type Selection,
} from './record.js';
