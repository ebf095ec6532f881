// Loaded by Jest before every test file.
process.env.NODE_ENV = 'test';
process.env.DB_TYPE = 'better-sqlite3';
process.env.SQLITE_DATABASE = ':memory:';
process.env.DB_SYNCHRONIZE = 'true';
process.env.DB_MIGRATIONS_RUN = 'false';
process.env.DB_LOGGING = 'false';
process.env.DB_RESET_ON_STARTUP = 'false';
process.env.AUTH_DOMAIN = 'test-tenant.example.com';
process.env.AUTH_AUDIENCE = 'drinks';
