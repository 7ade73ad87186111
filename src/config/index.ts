export { loadConfig, parseConfigYaml, formatConfigError } from './loader.js';
export { configSchema, DEFAULT_CONFIG_FILE, type WrConfig } from './schema.js';
