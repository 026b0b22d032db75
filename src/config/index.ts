export { createDefaultConfig, loadConfig, resolvePaths, createVersionHandler } from "./config";
