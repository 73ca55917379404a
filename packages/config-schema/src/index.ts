export * from "./schema";
export { loadTemplateConfig, interpolateVariables } from "./load";
