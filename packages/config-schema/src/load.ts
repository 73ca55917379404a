import fs from "fs";
import path from "path";
import YAML from "yaml";
import { TemplateConfigSchema, type TemplateConfig } from "./schema";

const SUPPORTED_EXTENSIONS = [".yml", ".yaml", ".json"];

/**
 * Loads every config file in `configDir` and validates the merged result.
 * Later files (alphabetical) override earlier ones section by section. A
 * missing directory yields the built-in defaults.
 */
export function loadTemplateConfig(configDir: string): TemplateConfig {
  if (!fs.existsSync(configDir)) {
    return TemplateConfigSchema.parse({});
  }

  const files = fs
    .readdirSync(configDir)
    .filter((file) => SUPPORTED_EXTENSIONS.includes(path.extname(file)))
    .sort();

  const merged: Record<string, Record<string, unknown>> = {};

  for (const file of files) {
    const fullPath = path.join(configDir, file);
    const raw = fs.readFileSync(fullPath, "utf8");
    const parsed = parseConfigFile(raw, path.extname(file));

    if (parsed === null || parsed === undefined) continue;
    if (typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new Error(`${file}: expected a mapping at the top level`);
    }

    for (const [section, value] of Object.entries(parsed)) {
      if (value && typeof value === "object" && !Array.isArray(value)) {
        merged[section] = { ...merged[section], ...value };
      } else {
        throw new Error(`${file}: section "${section}" must be a mapping`);
      }
    }
  }

  return TemplateConfigSchema.parse(merged);
}

function parseConfigFile(raw: string, ext: string): unknown {
  if (ext === ".json") {
    return JSON.parse(raw);
  }

  return YAML.parse(raw);
}

/**
 * Replaces {{variableName}} patterns in text with values from a variables object.
 * Unmatched variables are left unchanged.
 */
export function interpolateVariables(text: string, variables: Record<string, string>): string {
  return text.replace(/\{\{(\w+)\}\}/g, (match: string, key: string) => {
    return Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : match;
  });
}
