import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // fallback tiers log with console.warn; keep the reporter readable
    silent: true
  }
});
