import { describe, it, expect } from "vitest";
import { z } from "zod";
import { ValidationError } from "@flagroute/sdk";
import { createSchemaValidator } from "../validator.js";

class ServeOptions {
  port = 8080;

  static schema = z.object({ port: z.number().int().min(1) });
}

describe("createSchemaValidator", () => {
  const validate = createSchemaValidator();

  it("passes objects that match the class schema", () => {
    expect(validate(new ServeOptions())).toBeUndefined();
  });

  it("reports schema violations", () => {
    const options = new ServeOptions();
    options.port = 0;

    const result = validate(options);

    expect(result).toBeInstanceOf(ValidationError);
    expect(result instanceof Error ? result.message : "").toBe("invalid options: port: Number must be greater than or equal to 1");
  });

  it("passes objects whose class declares no schema", () => {
    expect(validate({ anything: true })).toBeUndefined();
  });
});
