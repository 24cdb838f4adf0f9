export { withDeadline, toUpstreamError } from './deadline';
export type { DeadlineOptions } from './deadline';
