import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'daemon',
    environment: 'node',
    /** Lifecycle tests patch process-wide signal handlers */
    fileParallelism: false,
  },
});
