export {
	UsageSnapshot,
	UsageFiguresSchema,
	type UsageFigures,
	type UsageFiguresInput,
} from './snapshot.js';
export { extractUsage, DEFAULT_EXTRACTOR_OPTIONS, type ExtractorOptions } from './extractor.js';
export {
	UsageAlertTracker,
	type UsageAlert,
	type UsageAlertKind,
	type UsageAlertOptions,
} from './alerts.js';
