import { readFile, writeFile } from 'node:fs/promises';

import { ProxyListReadException } from './exceptions';
import {
  formatCandidate,
  parseCandidate,
  ProxyCandidate,
} from './proxy-candidate';

export interface SkippedLine {
  lineNumber: number;
  content: string;
}

export interface CandidateList {
  candidates: ProxyCandidate[];
  skipped: SkippedLine[];
}

export function parseCandidateList(content: string): CandidateList {
  const candidates: ProxyCandidate[] = [];
  const skipped: SkippedLine[] = [];

  content.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      return;
    }

    const candidate = parseCandidate(trimmed);
    if (candidate) {
      candidates.push(candidate);
    } else {
      skipped.push({ lineNumber: index + 1, content: trimmed });
    }
  });

  return { candidates, skipped };
}

export async function readCandidateFile(path: string): Promise<CandidateList> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    throw new ProxyListReadException(path, error);
  }

  return parseCandidateList(content);
}

export function serializeCandidates(candidates: ProxyCandidate[]): string {
  return candidates.map((candidate) => `${formatCandidate(candidate)}\n`).join('');
}

export async function writeCandidateFile(
  path: string,
  candidates: ProxyCandidate[],
): Promise<void> {
  await writeFile(path, serializeCandidates(candidates), 'utf8');
}
