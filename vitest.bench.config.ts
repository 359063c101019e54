/**
 * Vitest benchmark configuration.
 *
 * Separate from the main vitest.config.ts so benchmarks never run as part
 * of `npm test`. Run them with `npm run test:bench`.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    benchmark: {
      include: ['src/benchmarks/**/*.bench.ts'],
    },
  },
});
