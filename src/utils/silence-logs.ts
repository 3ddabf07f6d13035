/**
 * 工具：静默控制台日志
 * - 用途：在生产环境或指定条件下，关闭 console.log/info/debug（可保留 warn/error）。
 * - 注意：不修改调用方代码，通过覆盖全局 console 方法实现。
 */
export interface SilenceOptions { // 导出：静默选项，供应用入口调用
  keepWarn?: boolean // 是否保留 console.warn（默认 true）
  keepError?: boolean // 是否保留 console.error（默认 true）
}

/**
 * 静默日志：将 console.log/info/debug 替换为无操作函数，可选保留 warn/error。
 * 返回：恢复函数，调用后还原被替换的方法
 */
export function silenceLogs(options?: SilenceOptions): () => void { // 导出：供入口 main.ts 在生产环境调用
  const keepWarn = options?.keepWarn !== false
  const keepError = options?.keepError !== false
  const original = { log: console.log, info: console.info, debug: console.debug, warn: console.warn, error: console.error }
  const noop = () => {}
  console.log = noop
  console.info = noop
  console.debug = noop
  if (!keepWarn) console.warn = noop
  if (!keepError) console.error = noop
  return () => {
    Object.assign(console, original)
  }
}
