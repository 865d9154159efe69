// @pratidhvani/core — Foundation
export * from "./types.js";
export * from "./errors.js";
export { parseBindAddress, parsePort, validateHost, formatAddress } from "./address.js";
export type { BindAddress } from "./address.js";
export {
	createConfig,
	cascadeConfigs,
	isRecord,
	getPratidhvaniHome,
	loadGlobalSettings,
	loadProjectConfig,
	loadEnvConfig,
	validateSettings,
	resolveSettings,
	PROJECT_CONFIG_FILE,
} from "./config.js";
export type { ResolveSettingsOptions } from "./config.js";

// Observability (Drishti)
export * from "./observability/index.js";
