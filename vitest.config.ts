import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['{shared,server,frontend}/src/**/*.test.ts'],
    environment: 'node',
  },
});
