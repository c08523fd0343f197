process.env.NODE_ENV = 'test';
process.env.DATABASE_PATH = ':memory:';
process.env.SEED_ON_STARTUP = 'false';
process.env.RECONCILIATION_ENABLED = 'false';
process.env.RETRY_BASE_DELAY_MS = '1';
delete process.env.REDIS_URL;
