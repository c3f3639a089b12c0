export { aggregate, toOutcome } from './aggregator';
export type { AggregationInput } from './aggregator';
export { parseReply } from './reply-parser';
export type { ParsedReply } from './reply-parser';
export { LineSummarizer, ReportSummarizer } from './summarizers';
export * from './types';
