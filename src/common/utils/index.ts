export { getRandomUserAgent } from './user-agent.util';
