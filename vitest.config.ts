/**
 * 测试基建
 * - 配置 Vitest：Node 环境、全局测试 API、包含规则与路径别名。
 */
// 导入 Vitest 配置方法：用于导出测试配置
import { defineConfig } from 'vitest/config'
// 导入 Node URL 工具：为测试环境配置与 tsconfig 相同的路径别名
import { fileURLToPath, URL } from 'node:url'

// 导出：Vitest 配置，供 `npm test` 使用
export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['tests/**/*.spec.ts']
  },
  resolve: {
    alias: {
      '@app': fileURLToPath(new URL('./src/app', import.meta.url)),
      '@domain': fileURLToPath(new URL('./src/domain', import.meta.url)),
      '@ports': fileURLToPath(new URL('./src/ports', import.meta.url)),
      '@adapters': fileURLToPath(new URL('./src/adapters', import.meta.url)),
      '@utils': fileURLToPath(new URL('./src/utils', import.meta.url))
    }
  }
})
