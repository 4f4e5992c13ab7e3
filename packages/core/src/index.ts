export * from './lifecycle';
export * from './errors';

export * from './entities/session';
export * from './entities/pool';
export * from './entities/work';

export * from './ports/backend';
export * from './ports/logger';
export * from './ports/telemetry';

export * from './config/defaults';
export * from './config/types';

export * from './schemas/requests';

export * from './utils/async';
export * from './utils/json';
