import path from "path";
import { loadTemplateConfig } from "@sheet_relay/config-schema";
import { loadDotenv, loadEnv } from "../apps/api/src/env";
import { relaySheet } from "../apps/api/src/relay";
import { createSheetStore } from "../apps/api/src/sheets";

async function main() {
  loadDotenv();
  const env = loadEnv();
  const configDir = process.env.CONFIG_DIR
    ? path.resolve(env.configDir)
    : path.resolve(__dirname, "../configs");
  const templates = loadTemplateConfig(configDir);
  const store = createSheetStore(env.sheets);

  const result = await relaySheet(env, templates, store);

  if (!result.ok) {
    console.error(
      result.reason === "config"
        ? "CLIENT_API_KEY and an absolute http(s) CLIENT_API_ENDPOINT are required"
        : "Failed to retrieve data from Google Sheets"
    );
    process.exit(1);
  }

  console.log(JSON.stringify(result.report, null, 2));
}

main().catch((error) => {
  console.error("Relay failed", error);
  process.exit(1);
});
