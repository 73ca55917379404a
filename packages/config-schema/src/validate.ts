import path from "path";
import { loadTemplateConfig } from "./load";

const configDir = process.env.CONFIG_DIR
  ? path.resolve(process.env.CONFIG_DIR)
  : path.resolve(process.cwd(), "../../configs");

try {
  const config = loadTemplateConfig(configDir);
  console.log(
    `Template config valid for ${configDir} (document: ${config.documentTemplate.templateName}, body: ${config.bodyTemplate.templateName})`
  );
} catch (error) {
  console.error("Template config validation failed:", error);
  process.exit(1);
}
