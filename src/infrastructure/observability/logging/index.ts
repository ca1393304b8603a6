export { LoggerModule, buildPinoParams, buildHttpLoggerOptions } from './logger.module';
export { AppLoggerService, OrderEvent } from './app-logger.service';
