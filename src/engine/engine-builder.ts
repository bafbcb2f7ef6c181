import { DEFAULT_HEALTH_CONFIG, type HealthConfig } from "../accounts/account-health.js";
import { AccountRegistry } from "../accounts/account-registry.js";
import type { AlertSink } from "../alert/types.js";
import {
	DEFAULT_CATEGORIES_PATH,
	InstrumentClassifier,
} from "../classifier/instrument-classifier.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import {
	type DocumentStore,
	FileDocumentStore,
	MemoryDocumentStore,
} from "../persistence/document-store.js";
import { FileJournal } from "../persistence/file-journal.js";
import type { Journal } from "../persistence/journal.js";
import { RuleRegistry } from "../rules/rule-registry.js";
import { type EngineConfig, resolveEngineConfig } from "../shared/config.js";
import { ConfigError, type EngineError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { diffSnapshots } from "../snapshot/snapshot-differ.js";
import type { SnapshotSource, TradeDiffer } from "../snapshot/types.js";
import { ConfluenceEngine } from "./confluence-engine.js";

/** Optional dependency overrides for the EngineBuilder. */
export interface EngineComponents {
	source?: SnapshotSource | undefined;
	sink?: AlertSink | undefined;
	rules?: RuleRegistry | undefined;
	accounts?: AccountRegistry | undefined;
	classifier?: InstrumentClassifier | undefined;
	journal?: Journal | null | undefined;
	differ?: TradeDiffer | undefined;
	config?: Partial<EngineConfig> | undefined;
	healthConfig?: HealthConfig | undefined;
	clock?: Clock | undefined;
	logger?: Logger | undefined;
}

export interface FromConfigOptions {
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
}

function storeFor(path: string | undefined, logger: Logger): DocumentStore {
	return path !== undefined
		? FileDocumentStore.create({ filePath: path, logger })
		: new MemoryDocumentStore();
}

/** Fluent, immutable builder for assembling a ConfluenceEngine from its components. */
export class EngineBuilder {
	private readonly components: EngineComponents;

	constructor(components: EngineComponents = {}) {
		this.components = components;
	}

	static create(components?: EngineComponents): EngineBuilder {
		return new EngineBuilder(components);
	}

	/**
	 * Load rules, accounts, categories and the journal from the paths in
	 * `config`. A missing rules or accounts path keeps that state in memory.
	 * The source and sink still have to be supplied.
	 */
	static async fromConfig(
		config: EngineConfig,
		options: FromConfigOptions = {},
	): Promise<Result<EngineBuilder, EngineError>> {
		const clock = options.clock ?? SystemClock;
		const logger = options.logger ?? createLogger({ level: config.logLevel });

		const rules = await RuleRegistry.create({
			store: storeFor(config.rulesPath, logger),
			logger: logger.child({ component: "rules" }),
		});
		if (!rules.ok) return rules;

		const accounts = await AccountRegistry.create({
			store: storeFor(config.accountsPath, logger),
			clock,
			logger: logger.child({ component: "accounts" }),
		});
		if (!accounts.ok) return accounts;

		const classifier = await InstrumentClassifier.fromFile(
			config.categoriesPath ?? DEFAULT_CATEGORIES_PATH,
			{ logger: logger.child({ component: "classifier" }) },
		);
		if (!classifier.ok) return classifier;

		const journal =
			config.journalPath !== undefined
				? FileJournal.create({
						filePath: config.journalPath,
						logger: logger.child({ component: "journal" }),
					})
				: null;

		return ok(
			new EngineBuilder({
				rules: rules.value,
				accounts: accounts.value,
				classifier: classifier.value,
				journal,
				config,
				clock,
				logger,
			}),
		);
	}

	withSource(source: SnapshotSource): EngineBuilder {
		return new EngineBuilder({ ...this.components, source });
	}

	withSink(sink: AlertSink): EngineBuilder {
		return new EngineBuilder({ ...this.components, sink });
	}

	withRules(rules: RuleRegistry): EngineBuilder {
		return new EngineBuilder({ ...this.components, rules });
	}

	withAccounts(accounts: AccountRegistry): EngineBuilder {
		return new EngineBuilder({ ...this.components, accounts });
	}

	withClassifier(classifier: InstrumentClassifier): EngineBuilder {
		return new EngineBuilder({ ...this.components, classifier });
	}

	withJournal(journal: Journal | null): EngineBuilder {
		return new EngineBuilder({ ...this.components, journal });
	}

	/** Replace the snapshot differ; fixed for the life of the engine. */
	withDiffer(differ: TradeDiffer): EngineBuilder {
		return new EngineBuilder({ ...this.components, differ });
	}

	withConfig(config: Partial<EngineConfig>): EngineBuilder {
		return new EngineBuilder({
			...this.components,
			config: { ...this.components.config, ...config },
		});
	}

	withHealthConfig(healthConfig: HealthConfig): EngineBuilder {
		return new EngineBuilder({ ...this.components, healthConfig });
	}

	withClock(clock: Clock): EngineBuilder {
		return new EngineBuilder({ ...this.components, clock });
	}

	withLogger(logger: Logger): EngineBuilder {
		return new EngineBuilder({ ...this.components, logger });
	}

	build(): Result<ConfluenceEngine, ConfigError> {
		const { source, sink, rules, accounts, classifier } = this.components;
		if (!source) return err(new ConfigError("Engine requires a snapshot source"));
		if (!sink) return err(new ConfigError("Engine requires an alert sink"));
		if (!rules) return err(new ConfigError("Engine requires a rule registry"));
		if (!accounts) return err(new ConfigError("Engine requires an account registry"));
		if (!classifier) return err(new ConfigError("Engine requires an instrument classifier"));

		let config: EngineConfig;
		try {
			config = resolveEngineConfig(this.components.config);
		} catch (thrown: unknown) {
			if (thrown instanceof ConfigError) return err(thrown);
			throw thrown;
		}

		return ok(
			new ConfluenceEngine({
				source,
				sink,
				rules,
				accounts,
				classifier,
				journal: this.components.journal ?? null,
				differ: this.components.differ ?? diffSnapshots,
				config,
				healthConfig: this.components.healthConfig ?? DEFAULT_HEALTH_CONFIG,
				clock: this.components.clock ?? SystemClock,
				logger: this.components.logger ?? createLogger({ level: config.logLevel }),
			}),
		);
	}
}
