export * from './EventEnvelope';
