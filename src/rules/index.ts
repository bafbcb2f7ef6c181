export {
	type RuleSet,
	type RuleName,
	type RuleSource,
	type RuleSetDto,
	DEFAULT_RULES,
	MIN_WINDOW_MS,
	ruleSetSchema,
	ruleSetDtoSchema,
	ruleSetToDto,
	ruleSetFromDto,
} from "./types.js";
export {
	RuleRegistry,
	type RuleRegistryOptions,
	type RuleWriteError,
	type RuleChangeListener,
} from "./rule-registry.js";
