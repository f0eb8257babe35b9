export {
  candidateKey,
  dedupeCandidates,
  formatCandidate,
  isValidHost,
  isValidPort,
  parseCandidate,
  PROXY_SCHEMES,
} from './proxy-candidate';
export type { ProxyCandidate, ProxyScheme } from './proxy-candidate';
export {
  parseCandidateList,
  readCandidateFile,
  serializeCandidates,
  writeCandidateFile,
} from './candidate-list';
export type { CandidateList, SkippedLine } from './candidate-list';
export { ProxyListReadException } from './exceptions';
