export {
	TradeAction,
	PositionSide,
	type Position,
	type PositionSnapshot,
	type TradeEvent,
	type SnapshotSource,
	type FetchOptions,
	type ClassifyFn,
	type DiffOptions,
	type TradeDiffer,
} from "./types.js";
export { diffSnapshots } from "./snapshot-differ.js";
export {
	snapshotFromDto,
	snapshotDtoSchema,
	validateSnapshot,
	type SnapshotDto,
	type PositionDto,
} from "./snapshot-dto.js";
export { BaselineStore } from "./baseline-store.js";
