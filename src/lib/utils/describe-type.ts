/**
 * Runtime type name of a value for error messages: `string`, `number`,
 * `null`, `Array`, or the constructor name of an object (`Buffer`, `Map`).
 */
export const describeType = (value: unknown): string => {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'Array';
  }
  if (typeof value !== 'object') {
    return typeof value;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (
    typeof proto === 'object' &&
    proto !== null &&
    'constructor' in proto &&
    typeof proto.constructor === 'function' &&
    proto.constructor.name
  ) {
    return proto.constructor.name;
  }
  return 'Object';
};
