export * from './backend/http';
export * from './backend/fake';
export * from './logger/pino';
export * from './logger/fake';
export * from './telemetry/fake';
