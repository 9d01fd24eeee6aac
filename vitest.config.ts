import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Zona horaria fija y distinta de UTC: las fechas sin offset se leen en hora local.
process.env.TZ = 'Europe/Rome';

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
  },
});
