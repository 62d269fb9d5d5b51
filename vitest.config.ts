import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/test-*.ts'],
    environment: 'node',
    testTimeout: 20000,
    hookTimeout: 20000,
    // Suites spawn real processes and bind real ports
    fileParallelism: false,
  },
});
