/**
 * Engine Demo
 *
 * Runs the engine against a scripted snapshot source:
 * - Three accounts start flat
 * - Two of them open ETH a minute apart, a third buys an AI token
 * - Alerts are printed instead of delivered, behind the retrying decorator
 */

import {
	AccountRegistry,
	type AlertSink,
	DEFAULT_CATEGORIES_PATH,
	EngineBuilder,
	FakeClock,
	FakeSnapshotSource,
	InstrumentClassifier,
	MemoryDocumentStore,
	RuleRegistry,
	accountId,
	createLogger,
	ok,
	unwrap,
	withDeliveryRetry,
} from "../src/index.js";

const printSink: AlertSink = {
	async deliver(payload) {
		console.log(`\n${payload.text}\n`);
		return ok(undefined);
	},
};

async function main(): Promise<void> {
	const logger = createLogger({ level: "warn" });
	const clock = new FakeClock(Date.UTC(2024, 0, 15, 12, 0, 0));

	const rules = unwrap(await RuleRegistry.create({ store: new MemoryDocumentStore(), logger }));
	const accounts = unwrap(
		await AccountRegistry.create({ store: new MemoryDocumentStore(), clock, logger }),
	);
	const classifier = unwrap(await InstrumentClassifier.fromFile(DEFAULT_CATEGORIES_PATH, { logger }));

	const whale = accountId(`0x${"1".repeat(40)}`);
	const fund = accountId(`0x${"2".repeat(40)}`);
	const desk = accountId(`0x${"3".repeat(40)}`);
	unwrap(await accounts.add({ address: whale, name: "Whale" }));
	unwrap(await accounts.add({ address: fund, name: "Fund" }));
	unwrap(await accounts.add({ address: desk, name: "Desk", kind: "wallet" }));

	const source = new FakeSnapshotSource()
		.setPositions(whale, [])
		.setPositions(fund, [])
		.setPositions(desk, [["FET", 1000, 1500]]);

	const engine = unwrap(
		EngineBuilder.create()
			.withSource(source)
			.withSink(withDeliveryRetry(printSink, { clock, logger, maxAgeMs: 60_000 }))
			.withRules(rules)
			.withAccounts(accounts)
			.withClassifier(classifier)
			.withClock(clock)
			.withLogger(logger)
			.build(),
	);
	engine.on("trade", (events) => {
		for (const event of events) {
			console.log(`${event.accountId.slice(0, 8)} ${event.action} ${event.instrument} ${event.value}`);
		}
	});

	unwrap(await engine.runCycle());

	source.setPositions(whale, [["ETH", 4, 12000]]);
	unwrap(await engine.runCycle());

	clock.advance(60_000);
	source.setPositions(fund, [["ETH", -2, 6000]]).setPositions(desk, [["FET", 3000, 4500]]);
	unwrap(await engine.runCycle());

	await engine.stop();
	console.log(engine.health());
}

main().catch((error: unknown) => {
	console.error(error);
	process.exitCode = 1;
});
