import { defineConfig } from 'vitest/config'

/**
 * Vitest 配置
 *
 * - 目标：离线回归可执行（fetch 全部注入替身，不访问网络）
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**']
  }
})
