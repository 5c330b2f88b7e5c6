/**
 * Config module - configuration resolution
 */

export { resolveConfig, parseEnvBoolean, CONFIG_ENV_VARS } from './resolve-config';
export type { CliFlags } from './resolve-config';
