import { fileURLToPath } from 'node:url';

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default {
  test: {
    mockReset: true,
    include: ['src/**/*.test.ts'],
    coverage: {
      reporter: ['text'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.{schema,types,error,const}.ts', 'src/index.ts'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 90,
        statements: 80,
      },
    },
  },
  resolve: {
    alias: {
      '@constants': fromRoot('./src/constants'),
      '@errors': fromRoot('./src/errors'),
      '@models': fromRoot('./src/models'),
      '@services': fromRoot('./src/services'),
      '@utils': fromRoot('./src/utils'),
    },
  },
};
