import { ProxyCandidate, SkippedLine } from '../candidates';

export type CheckStatus = 'alive' | 'dead';

export interface CheckResult {
  proxy: string;
  candidate: ProxyCandidate;
  status: CheckStatus;
  latencyMs?: number;
  exitIp?: string;
  error?: string;
}

export interface CheckReport {
  input: string;
  testUrl: string;
  skipped: SkippedLine[];
  results: CheckResult[];
  alive: ProxyCandidate[];
}
