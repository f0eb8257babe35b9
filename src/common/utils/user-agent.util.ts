import UserAgent = require('user-agents');

export function getRandomUserAgent(): string {
  return new UserAgent({ deviceCategory: 'desktop' }).toString();
}
