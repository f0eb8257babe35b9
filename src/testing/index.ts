export { createTestConfigService } from './test-config';
