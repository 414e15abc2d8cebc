import fs from "fs";
import path from "path";
import Ajv2020 from "ajv/dist/2020";
import type { AnySchema } from "ajv";
import { getRepoRoot } from "../paths";

export type ValidationResult = { valid: boolean; errors: string[] };

const compilers = new Map<string, Ajv2020>();

function loadSchemas(root: string): AnySchema[] {
  const schemaDir = path.join(root, "schemas");
  const schemaFiles = fs.readdirSync(schemaDir).filter((file) => file.endsWith(".schema.json"));
  return schemaFiles.map((file) => {
    const schema: unknown = JSON.parse(fs.readFileSync(path.join(schemaDir, file), "utf-8"));
    if (typeof schema !== "object" || schema === null || Array.isArray(schema)) {
      throw new Error(`Schema is not an object: ${file}`);
    }
    return { $id: file, ...schema };
  });
}

function compilerFor(root: string): Ajv2020 {
  const cached = compilers.get(root);
  if (cached) {
    return cached;
  }
  const ajv = new Ajv2020({ allErrors: true });
  for (const schema of loadSchemas(root)) {
    ajv.addSchema(schema);
  }
  compilers.set(root, ajv);
  return ajv;
}

export function validateJson(schemaFile: string, data: unknown, root: string = getRepoRoot()): ValidationResult {
  const validate = compilerFor(root).getSchema(schemaFile);
  if (!validate) {
    return { valid: false, errors: [`Schema not found: ${schemaFile}`] };
  }
  const valid = validate(data);
  const errors = (validate.errors ?? []).map((error) => `${error.instancePath} ${error.message ?? ""}`.trim());
  return { valid: Boolean(valid), errors };
}
