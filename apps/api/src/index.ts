import path from "path";
import { loadTemplateConfig } from "@sheet_relay/config-schema";
import { loadDotenv, loadEnv } from "./env";
import { createApp } from "./server";

loadDotenv();

const env = loadEnv();
const templates = loadTemplateConfig(path.resolve(env.configDir));
const app = createApp(env, { templates });

app.listen(env.port, () => {
  console.log(`Sheet relay listening on port ${env.port}`);
});
