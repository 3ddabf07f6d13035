/**
 * 配置：从环境变量读取存档目录与日志静默开关
 * - POSE_SAVE_DIR：存档目录，默认 ./assets/saves
 * - LOG_SILENT=1 或 NODE_ENV=production：静默调试日志（保留 warn/error）
 */
import type { PersistenceConfig } from '@domain/systems/pose-persistence' // 引入：存档配置类型

export const DEFAULT_SAVE_DIRECTORY = './assets/saves' // 导出：默认存档目录

export type Env = Record<string, string | undefined> // 导出：环境变量表

export function resolvePersistenceConfig(env: Env): PersistenceConfig { // 导出：解析存档配置
  const dir = env.POSE_SAVE_DIR?.trim()
  return { directory: dir ? dir : DEFAULT_SAVE_DIRECTORY }
}

export function shouldSilenceLogs(env: Env): boolean { // 导出：是否静默调试日志
  return env.NODE_ENV === 'production' || env.LOG_SILENT === '1'
}
