export { shouldAutoFetch, isWithinWorkHours, isPollInterval, type AutoFetchInput, type PollInterval } from './policy.js';
export { Poller, type PollerOptions, type FetchTarget } from './poller.js';
