export {
	InstrumentClassifier,
	DEFAULT_CATEGORIES_PATH,
	categoryTableSchema,
	type CategoryTable,
	type ClassifierLoadError,
	type ClassifierOptions,
} from "./instrument-classifier.js";
