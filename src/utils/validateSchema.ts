import Ajv, { type ValidateFunction } from "ajv";

const ajv = new Ajv({ allErrors: true, strict: false });
const compiled = new WeakMap<object, ValidateFunction>();

export function validateSchema<T>(
  schema: object,
  data: unknown,
  name: string,
): T {
  let validate = compiled.get(schema);
  if (!validate) {
    validate = ajv.compile(schema);
    compiled.set(schema, validate);
  }
  if (!validate(data)) {
    throw new Error(
      `[${name} schema invalid] ${ajv.errorsText(validate.errors)}`,
    );
  }
  return data as T;
}
