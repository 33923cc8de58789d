import {defineConfig} from 'vitest/config';

export default defineConfig({
  test: {
    onConsoleLog(log) {
      if (
        log.includes('skipping subtract') ||
        log.includes('producers') ||
        log.includes('distinct')
      ) {
        return false;
      }
    },
    include: ['src/**/*.{test,spec}.?(c|m)[jt]s?(x)'],
    environment: 'node',
    typecheck: {
      enabled: false,
    },
  },
});
