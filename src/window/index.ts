export {
	EventWindowStore,
	createSequence,
	type InsertResult,
	type SequenceSource,
	type WindowEntry,
} from "./event-window-store.js";
