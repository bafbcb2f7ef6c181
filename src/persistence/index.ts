export {
	type Journal,
	type JournalEntry,
	type JournalEntryType,
	type CorrelationEntry,
	correlationEntrySchema,
	correlationEmitted,
	fetchFailed,
	baselineReset,
	ruleChanged,
	tradeDetected,
} from "./journal.js";
export {
	FileJournal,
	type CorruptLine,
	type FileJournalConfig,
	type RestoreResult,
} from "./file-journal.js";
export { MemoryJournal, type MemoryJournalConfig } from "./memory-journal.js";
export {
	FileDocumentStore,
	MemoryDocumentStore,
	type DocumentStore,
	type FileDocumentStoreConfig,
	type StoredDocument,
} from "./document-store.js";
