import { Injectable, Logger } from '@nestjs/common';

import { HandleSourceError } from './decorators';
import {
  AllSourcesFailedException,
  NoCandidatesFoundException,
} from './exceptions';
import { EXTRACTORS } from './extractors';
import {
  dedupeCandidates,
  ProxyCandidate,
  writeCandidateFile,
} from '../candidates';
import { sanitizeUrlForLogging, SourceClientFactory } from '../common';
import { AppConfigService, SourceConfig } from '../config';

export interface SourceSummary {
  name: string;
  url: string;
  status: 'ok' | 'failed';
  found: number;
  error?: string;
}

export interface FinderReport {
  candidates: ProxyCandidate[];
  sources: SourceSummary[];
}

@Injectable()
export class FinderService {
  private readonly logger = new Logger(FinderService.name);

  constructor(
    private readonly sourceClients: SourceClientFactory,
    private readonly configService: AppConfigService,
  ) {}

  /**
   * Collects candidates and writes them to `finder.outputFile`. Nothing is
   * written when collection fails.
   */
  async run(): Promise<FinderReport> {
    const report = await this.findCandidates();
    const outputFile = this.configService.get('finder.outputFile');

    await writeCandidateFile(outputFile, report.candidates);
    this.logger.log(
      `Wrote ${report.candidates.length} unique candidates to ${outputFile}`,
    );

    return report;
  }

  async findCandidates(): Promise<FinderReport> {
    const sources = this.configService
      .get('finder.sources')
      .filter((source) => source.enabled);
    const limit = this.configService.get('finder.maxCandidatesPerSource');

    if (sources.length === 0) {
      throw new AllSourcesFailedException(0);
    }

    this.logger.log(`Fetching proxy lists from ${sources.length} sources`);
    const outcomes = await Promise.allSettled(
      sources.map((source) => this.fetchSource(source)),
    );

    const collected: ProxyCandidate[] = [];
    const summaries = outcomes.map((outcome, index): SourceSummary => {
      const source = sources[index];
      const url = sanitizeUrlForLogging(source.url);

      if (outcome.status === 'rejected') {
        const error =
          outcome.reason instanceof Error
            ? outcome.reason.message
            : String(outcome.reason);
        this.logger.warn(`Skipping source ${source.name}: ${error}`);
        return { name: source.name, url, status: 'failed', found: 0, error };
      }

      const found = outcome.value;
      const taken = limit === null ? found : found.slice(0, limit);
      for (const candidate of taken) {
        collected.push(candidate);
      }
      this.logger.log(`${source.name}: found ${found.length} candidates`);
      return { name: source.name, url, status: 'ok', found: found.length };
    });

    const responding = summaries.filter((summary) => summary.status === 'ok');
    if (responding.length === 0) {
      throw new AllSourcesFailedException(sources.length);
    }

    const candidates = dedupeCandidates(collected);
    this.logger.log(`Collected ${candidates.length} unique candidates`);

    if (candidates.length === 0) {
      throw new NoCandidatesFoundException(responding.length);
    }

    return { candidates, sources: summaries };
  }

  @HandleSourceError()
  async fetchSource(source: SourceConfig): Promise<ProxyCandidate[]> {
    const body = await this.sourceClients.forSource(source).fetchText(source.url);
    return EXTRACTORS[source.format](body);
  }
}
