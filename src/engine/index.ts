export { ConfluenceEngine, type ConfluenceEngineDeps } from "./confluence-engine.js";
export {
	EngineBuilder,
	type EngineComponents,
	type FromConfigOptions,
} from "./engine-builder.js";
export type { EngineEvents, EngineHealth } from "./types.js";
