export const PROXY_SCHEMES = ['http', 'https'] as const;

export type ProxyScheme = (typeof PROXY_SCHEMES)[number];

export interface ProxyCandidate {
  host: string;
  port: number;
  scheme?: ProxyScheme;
}

const CANDIDATE_PATTERN =
  /^(?:([a-z][a-z0-9+.-]*):\/\/)?([a-z0-9-]+(?:\.[a-z0-9-]+)*):(\d{1,5})\/?$/i;
const HOST_LABEL_PATTERN = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/;
const NUMERIC_LABEL_PATTERN = /^\d+$/;

function isProxyScheme(value: string): value is ProxyScheme {
  return PROXY_SCHEMES.some((scheme) => scheme === value);
}

export function isValidHost(host: string): boolean {
  if (host.length > 253) {
    return false;
  }

  const labels = host.split('.');
  if (labels.every((label) => NUMERIC_LABEL_PATTERN.test(label))) {
    return (
      labels.length === 4 &&
      labels.every((label) => label.length <= 3 && Number(label) <= 255)
    );
  }

  return labels.every(
    (label) => label.length <= 63 && HOST_LABEL_PATTERN.test(label),
  );
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function normalizeHost(host: string): string {
  const labels = host.toLowerCase().split('.');
  if (labels.every((label) => NUMERIC_LABEL_PATTERN.test(label))) {
    return labels.map((label) => String(Number(label))).join('.');
  }
  return labels.join('.');
}

/**
 * Parses `[scheme://]host:port`. Returns null for anything that is not
 * a usable HTTP proxy address.
 */
export function parseCandidate(raw: string): ProxyCandidate | null {
  const match = CANDIDATE_PATTERN.exec(raw.trim());
  if (!match) {
    return null;
  }

  const [, rawScheme, rawHost, rawPort] = match;
  const port = Number(rawPort);
  if (!isValidHost(rawHost.toLowerCase()) || !isValidPort(port)) {
    return null;
  }
  const host = normalizeHost(rawHost);

  if (rawScheme === undefined) {
    return { host, port };
  }

  const scheme = rawScheme.toLowerCase();
  if (!isProxyScheme(scheme)) {
    return null;
  }

  return { host, port, scheme };
}

export function formatCandidate(candidate: ProxyCandidate): string {
  const address = `${candidate.host}:${candidate.port}`;
  return candidate.scheme ? `${candidate.scheme}://${address}` : address;
}

/** Identity used for deduplication; a bare address means plain http. */
export function candidateKey(candidate: ProxyCandidate): string {
  return `${candidate.scheme ?? 'http'}://${candidate.host}:${candidate.port}`;
}

export function dedupeCandidates(candidates: ProxyCandidate[]): ProxyCandidate[] {
  const seen = new Set<string>();
  const unique: ProxyCandidate[] = [];

  for (const candidate of candidates) {
    const key = candidateKey(candidate);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(candidate);
    }
  }

  return unique;
}
