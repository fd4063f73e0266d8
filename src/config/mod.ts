// Config module exports

export { VidpickConfig, DEFAULT_PLAYER, type ConfigInitOptions, type ConfigSource } from './config.ts';
export { parseCliFlags, generateFlagHelp, generateEnvVarHelp, type ParsedCliFlags } from './cli.ts';
