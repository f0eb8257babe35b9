import { writeFile } from 'node:fs/promises';
import { join, parse } from 'node:path';

import { Injectable, Logger } from '@nestjs/common';
import Bottleneck from 'bottleneck';

import { CheckReport, CheckResult } from './check-result.interface';
import { ProxyProbeService } from './proxy-probe.service';
import {
  ProxyCandidate,
  readCandidateFile,
  writeCandidateFile,
} from '../candidates';
import { AppConfigService } from '../config';

export interface CheckOutputPaths {
  aliveList: string;
  report: string;
}

/** `lists/proxies.txt` -> `lists/proxies_alive.txt`, `lists/proxies_results.json` */
export function outputPathsFor(inputPath: string): CheckOutputPaths {
  const { dir, name } = parse(inputPath);
  const stem = join(dir, name);
  return {
    aliveList: `${stem}_alive.txt`,
    report: `${stem}_results.json`,
  };
}

@Injectable()
export class CheckerService {
  private readonly logger = new Logger(CheckerService.name);

  constructor(
    private readonly probeService: ProxyProbeService,
    private readonly configService: AppConfigService,
  ) {}

  async run(inputPath: string): Promise<CheckReport> {
    const report = await this.checkFile(inputPath);
    await this.writeOutputs(report);
    return report;
  }

  async checkFile(inputPath: string): Promise<CheckReport> {
    const { candidates, skipped } = await readCandidateFile(inputPath);

    for (const line of skipped) {
      this.logger.warn(
        `Skipping malformed line ${line.lineNumber}: ${line.content}`,
      );
    }
    this.logger.log(`Loaded ${candidates.length} proxies from ${inputPath}`);

    const results = await this.checkCandidates(candidates);
    const alive = results
      .filter((result) => result.status === 'alive')
      .map((result) => result.candidate);

    this.logger.log(
      `Summary: ${alive.length}/${results.length} proxies are working`,
    );

    return {
      input: inputPath,
      testUrl: this.configService.get('checker.testUrl'),
      skipped,
      results,
      alive,
    };
  }

  /**
   * Probes every candidate through a bounded pool. The returned results
   * follow the order of `candidates`, not completion order.
   */
  async checkCandidates(candidates: ProxyCandidate[]): Promise<CheckResult[]> {
    if (candidates.length === 0) {
      return [];
    }

    const maxConcurrent = this.configService.get('checker.maxConcurrent');
    this.logger.log(
      `Checking ${candidates.length} proxies with ${maxConcurrent} concurrent workers`,
    );

    const pool = new Bottleneck({ maxConcurrent });

    return Promise.all(
      candidates.map((candidate) =>
        pool.schedule(async () => {
          const result = await this.probeService.probe(candidate);
          this.logResult(result);
          return result;
        }),
      ),
    );
  }

  async writeOutputs(report: CheckReport): Promise<void> {
    const output = this.configService.get('checker.output');
    const paths = outputPathsFor(report.input);

    if (output.aliveList) {
      await writeCandidateFile(paths.aliveList, report.alive);
      this.logger.log(`Alive proxies saved to ${paths.aliveList}`);
    }

    if (output.report) {
      await writeFile(paths.report, serializeReport(report), 'utf8');
      this.logger.log(`Results saved to ${paths.report}`);
    }
  }

  private logResult(result: CheckResult): void {
    if (result.status === 'alive') {
      this.logger.log(
        `alive ${result.proxy} - ${result.latencyMs}ms - exit IP: ${result.exitIp ?? 'N/A'}`,
      );
    } else {
      this.logger.debug(`dead ${result.proxy} - ${result.error}`);
    }
  }
}

export function serializeReport(report: CheckReport): string {
  const aliveCount = report.alive.length;

  return `${JSON.stringify(
    {
      input: report.input,
      testUrl: report.testUrl,
      summary: {
        total: report.results.length,
        alive: aliveCount,
        dead: report.results.length - aliveCount,
        skipped: report.skipped.length,
      },
      results: report.results.map(({ candidate: _candidate, ...rest }) => rest),
      skipped: report.skipped,
    },
    null,
    2,
  )}\n`;
}
