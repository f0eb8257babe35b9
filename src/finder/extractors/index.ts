import { extractFromHtmlTable } from './html-table.extractor';
import { extractFromJson } from './json.extractor';
import { extractFromText } from './text.extractor';
import { ProxyCandidate } from '../../candidates';
import { SourceFormat } from '../../config';

export type CandidateExtractor = (content: string) => ProxyCandidate[];

export const EXTRACTORS: Record<SourceFormat, CandidateExtractor> = {
  text: extractFromText,
  json: extractFromJson,
  'html-table': extractFromHtmlTable,
};

export { extractFromHtmlTable, extractFromJson, extractFromText };
