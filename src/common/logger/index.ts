export { AppLoggerModule } from './logger.module';
