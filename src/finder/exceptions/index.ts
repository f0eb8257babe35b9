export { AllSourcesFailedException } from './all-sources-failed.exception';
export { NoCandidatesFoundException } from './no-candidates-found.exception';
export { SourceFetchException } from './source-fetch.exception';
