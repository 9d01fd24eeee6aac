// vitest.setup.ts
// Entorno fijo para los tests: store en memoria y logs silenciados.
process.env.ANNOUNCEMENT_STORE = 'memory';
process.env.AUTHORIZED_USERS = 'alice,bob';
process.env.LOG_LEVEL = 'silent';
process.env.OAUTH_API_BASE_URL = 'https://identity.test';
delete process.env.ACTION_LOG_FILE;
