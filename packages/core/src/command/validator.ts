import { ZodType } from "zod";
import { ValidationError } from "@flagroute/sdk";
import type { ValidateFunc } from "@flagroute/sdk";
import { validateInput } from "@flagroute/shared";

/**
 * A validator that checks an option object against the zod schema declared
 * as `static schema` on its class. Objects whose class has none pass.
 */
export function createSchemaValidator(): ValidateFunc {
  return (options) => {
    const schema: unknown = Reflect.get(options.constructor, "schema");
    if (!(schema instanceof ZodType)) return undefined;
    const result = validateInput(schema, options);
    if (result.success) return undefined;
    return new ValidationError(`invalid options: ${result.error ?? "unknown error"}`);
  };
}
