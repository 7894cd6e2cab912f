import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    // Таймаут для асинхронных тестов
    testTimeout: 10000,
    watch: false,
  },
});
