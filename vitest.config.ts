import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // 파이프라인은 Node 런타임에서만 동작
    environment: 'node',

    // 테스트 파일 패턴
    include: ['src/**/*.{test,spec}.ts'],

    // node_modules 제외
    exclude: ['node_modules', 'dist'],

    // 타임아웃 설정
    testTimeout: 10000,
    hookTimeout: 10000,
  },

  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
});
