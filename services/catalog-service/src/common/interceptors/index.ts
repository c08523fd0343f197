export * from './logging.interceptor';
export * from './timeout.interceptor';
