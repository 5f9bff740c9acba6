import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'services/*/src/**/*.test.ts'],
    server: {
      deps: {
        // 워크스페이스 패키지는 TypeScript 소스를 그대로 export
        inline: [/@backtest-lab\//],
      },
    },
  },
});
