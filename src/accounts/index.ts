export {
	AccountKind,
	type AccountInput,
	type TrackedAccount,
	type AccountDocument,
	accountDocumentSchema,
	accountInputSchema,
	accountsFromDocument,
	accountsToDocument,
} from "./types.js";
export {
	AccountRegistry,
	type AccountRegistryOptions,
	type AccountWriteError,
	type AccountChangeListener,
} from "./account-registry.js";
export {
	AccountHealthTracker,
	DEFAULT_HEALTH_CONFIG,
	HealthStatus,
	type AccountHealth,
	type HealthConfig,
} from "./account-health.js";
