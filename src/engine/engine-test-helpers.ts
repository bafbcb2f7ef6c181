import { AccountRegistry } from "../accounts/account-registry.js";
import { MemoryAlertSink } from "../alert/memory-alert-sink.js";
import { InstrumentClassifier } from "../classifier/instrument-classifier.js";
import { silentLogger } from "../lib/logger/index.js";
import { MemoryDocumentStore } from "../persistence/document-store.js";
import type { Journal } from "../persistence/journal.js";
import { MemoryJournal } from "../persistence/memory-journal.js";
import { RuleRegistry } from "../rules/rule-registry.js";
import type { EngineConfig } from "../shared/config.js";
import type { AccountId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import type { TradeDiffer } from "../snapshot/types.js";
import { FakeSnapshotSource } from "../testing/fake-snapshot-source.js";
import { testAccount } from "../testing/fixtures.js";
import type { ConfluenceEngine } from "./confluence-engine.js";
import { EngineBuilder } from "./engine-builder.js";

export const ALPHA = testAccount("a");
export const BRAVO = testAccount("b");
export const CHARLIE = testAccount("c");
export const START = 1_700_000_000_000;

export const TEST_CATEGORIES = {
	version: 1,
	categories: {
		ai: { emoji: "🤖", instruments: ["FET", "ARKM"] },
		meme: { emoji: "🐸", instruments: ["DOGE", "PEPE"] },
	},
};

const ROSTER: ReadonlyArray<readonly [AccountId, string]> = [
	[ALPHA, "Alpha"],
	[BRAVO, "Bravo"],
	[CHARLIE, "Charlie"],
];

export interface HarnessOptions {
	readonly config?: Partial<EngineConfig> | undefined;
	readonly differ?: TradeDiffer | undefined;
	readonly journal?: Journal | undefined;
}

export interface EngineHarness {
	readonly engine: ConfluenceEngine;
	readonly source: FakeSnapshotSource;
	readonly sink: MemoryAlertSink;
	readonly journal: MemoryJournal;
	readonly clock: FakeClock;
}

/** Engine over in-memory stores with three accounts, all flat. */
export async function createHarness(options: HarnessOptions = {}): Promise<EngineHarness> {
	const logger = silentLogger();
	const clock = new FakeClock(START);
	const rules = unwrap(await RuleRegistry.create({ store: new MemoryDocumentStore(), logger }));
	const accounts = unwrap(
		await AccountRegistry.create({ store: new MemoryDocumentStore(), clock, logger }),
	);
	for (const [address, name] of ROSTER) {
		unwrap(await accounts.add({ address, name }));
	}
	const classifier = unwrap(InstrumentClassifier.fromTable(TEST_CATEGORIES, { logger }));

	const source = new FakeSnapshotSource();
	for (const [address] of ROSTER) source.setPositions(address, []);
	const sink = new MemoryAlertSink();
	const journal = new MemoryJournal();

	let builder = EngineBuilder.create()
		.withSource(source)
		.withSink(sink)
		.withRules(rules)
		.withAccounts(accounts)
		.withClassifier(classifier)
		.withJournal(options.journal ?? journal)
		.withClock(clock)
		.withLogger(logger)
		.withConfig({ pollIntervalMs: 10, fetchTimeoutMs: 50, ...options.config });
	if (options.differ !== undefined) builder = builder.withDiffer(options.differ);

	return { engine: unwrap(builder.build()), source, sink, journal, clock };
}
