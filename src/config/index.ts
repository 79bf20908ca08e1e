export { ConfigError, ConfigValidationError, MissingEnvironmentVariableError } from "./errors";
export type { LoadConfigOptions, LoadedSitecheckConfig, ParseConfigOptions } from "./loader";
export { loadSitecheckConfig, parseSitecheckConfig } from "./loader";
export { resolvePlaceholders } from "./placeholders";
export type { ResolveSettingsOptions, SitecheckSettings, TargetSource } from "./settings";
export { DEFAULT_INTERVAL_MS, DEFAULT_TARGETS_FILE, resolveSettings } from "./settings";
export type { RawSitecheckFile, RawValidationConfig, TimeSourceKind } from "./types";
export { validateSitecheckConfig } from "./validator";
