import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@shared': fromRoot('./src/shared'),
      '@core': fromRoot('./src/eligibility-core'),
      '@api': fromRoot('./src/eligibility-api'),
      '@cli': fromRoot('./src/eligibility-cli'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
  },
});
