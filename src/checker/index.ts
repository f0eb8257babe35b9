export { CheckerModule } from './checker.module';
export { CheckerService, outputPathsFor, serializeReport } from './checker.service';
export type { CheckOutputPaths } from './checker.service';
export { ProxyProbeService } from './proxy-probe.service';
export { buildProxyRoute } from './proxy-route';
export { CHECKER_USAGE, parseCheckerArgs, UsageException } from './checker-args';
export type {
  CheckReport,
  CheckResult,
  CheckStatus,
} from './check-result.interface';
