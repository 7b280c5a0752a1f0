import { Provider } from '@nestjs/common';
import { Logger, createLogger } from '@contractflow/shared';
import { WORKFLOW_CONFIG, WorkflowConfig } from './config';

export const LOGGER = Symbol('LOGGER');

export const loggerProvider: Provider = {
  provide: LOGGER,
  inject: [WORKFLOW_CONFIG],
  useFactory: (config: WorkflowConfig): Logger =>
    createLogger({
      serviceName: config.serviceName,
      level: process.env.LOG_LEVEL || 'info',
      prettyPrint: process.env.NODE_ENV !== 'production',
    }),
};
