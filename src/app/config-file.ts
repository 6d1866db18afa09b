import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Ajv2020 } from "ajv/dist/2020.js";
import YAML from "yaml";
import { errorMessage } from "../errors.js";
import type { ReviewRelayFile } from "../types.js";

export const CONFIG_FILENAME = ".review-relay.yml";

let cachedValidator: ((data: unknown) => data is ReviewRelayFile) | null = null;
let cachedSchemaErrors: (() => string[]) | null = null;

function getSchemaPath(): string {
  const current = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(current, "../../docs/review-relay.schema.json");
}

function ensureValidator(): (data: unknown) => data is ReviewRelayFile {
  if (cachedValidator) return cachedValidator;
  const raw = fs.readFileSync(getSchemaPath(), "utf8");
  const ajv = new Ajv2020({ allErrors: true, strict: true });
  const validate = ajv.compile<ReviewRelayFile>(JSON.parse(raw));
  cachedSchemaErrors = () =>
    (validate.errors ?? []).map((err) => {
      const location = err.instancePath || "(root)";
      return `${location}: ${err.message}`;
    });
  cachedValidator = validate;
  return validate;
}

export function readConfigFile(repoRoot: string): ReviewRelayFile | null {
  const filePath = path.join(repoRoot, CONFIG_FILENAME);
  if (!fs.existsSync(filePath)) return null;
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new Error(`Failed to read ${CONFIG_FILENAME}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new Error(`Invalid YAML in ${CONFIG_FILENAME}: ${errorMessage(error)}`);
  }

  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`${CONFIG_FILENAME} must contain a YAML object.`);
  }

  const validate = ensureValidator();
  if (!validate(parsed)) {
    const errors = cachedSchemaErrors?.() ?? ["(unknown schema error)"];
    throw new Error(`Invalid ${CONFIG_FILENAME}: ${errors.join("; ")}`);
  }
  return parsed;
}
