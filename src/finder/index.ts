export { FinderModule } from './finder.module';
export { FinderService } from './finder.service';
export type { FinderReport, SourceSummary } from './finder.service';
export { EXTRACTORS } from './extractors';
export type { CandidateExtractor } from './extractors';
export * from './exceptions';
