// src/services/logger.ts: structured logging for the recommender
import { Logger, type ILogObj } from 'tslog';
import { appConfig } from '@/config/app.config';

export const logger: Logger<ILogObj> = new Logger({
  name: 'menu-match',
  minLevel: appConfig.logLevel,
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: 'pretty',
});
