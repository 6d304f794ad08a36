export { CONTINUOUS_TRADING, type EngineConfig, EngineConfigSchema } from "./engine";
export { LogLevel, type LoggingConfig, LoggingConfigSchema } from "./logging";
export { type PathsConfig, PathsConfigSchema } from "./paths";
