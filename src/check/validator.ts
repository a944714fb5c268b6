import type { FieldValidator } from '../schema/types';

export type FieldValidationOutcome =
  | { valid: true; value: unknown }
  | { valid: false; message: string };

/**
 * Runs a field validator through the Standard Schema V1 interface.
 *
 * The `~standard` property is the universal adapter: it lets a schema field
 * carry a Zod, Valibot or ArkType validator without library-specific code.
 *
 * Validator Object Layout:
 * ```ts
 * const validator = {
 *   // Result pattern: returns { value } or { issues }, never throws.
 *   "~standard": {
 *     validate: (input) => Result
 *   },
 *   // Library-specific methods (e.g. .parse) are ignored.
 *   ...otherLibrarySpecificProps
 * };
 * ```
 *
 * @param validator - The attached validator.
 * @param value - Plain (wire) value of the field, secrets stripped.
 * @param property - Textual path of the field, used in messages.
 * @returns the validated value, or the first issue's message.
 */
export function validateField(
  validator: FieldValidator,
  value: unknown,
  property: string
): FieldValidationOutcome {
  const result = validator['~standard'].validate(value);

  // Check runs synchronously; a pending validation cannot be awaited here.
  if (result instanceof Promise) {
    return {
      valid: false,
      message: `async validation is not supported for "${property}"`
    };
  }

  const [firstIssue] = result.issues ?? [];
  if (firstIssue) {
    const issuePath = firstIssue.path
      ?.map(segment => (typeof segment === 'object' ? String(segment.key) : String(segment)))
      .join('.');
    const location = issuePath ? `${property}.${issuePath}` : property;
    return {
      valid: false,
      message: `Invalid value for "${location}": ${firstIssue.message}`
    };
  }

  return { valid: true, value: 'value' in result ? result.value : value };
}
