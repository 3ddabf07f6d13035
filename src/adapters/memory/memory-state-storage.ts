/**
 * 内存存储适配器：以 Map 模拟文件，用于测试与无磁盘环境。
 * - failWritesTo：对指定路径的写入抛错，模拟磁盘故障。
 */
import { splitLines, stateFilePath, type StateStoragePort, type StateWriter } from '@ports/state-storage' // 引入：存档端口契约

export interface MemoryStateStorage extends StateStoragePort { // 导出：附带检查方法的内存存储
  files: Map<string, string>
  directories: Set<string>
  failWritesTo: Set<string>
}

export function createMemoryStateStorage(seed?: Record<string, string>): MemoryStateStorage { // 导出：内存适配器工厂
  const files = new Map<string, string>(Object.entries(seed ?? {}))
  const directories = new Set<string>()
  const failWritesTo = new Set<string>()
  return {
    files,
    directories,
    failWritesTo,
    statePath: stateFilePath,
    ensureDirectory: (directory) => {
      directories.add(directory)
    },
    readLines: (path) => {
      const text = files.get(path)
      return text === undefined ? null : splitLines(text)
    },
    createWriter: (path): StateWriter => {
      let buffer = ''
      return {
        write: (chunk) => {
          if (failWritesTo.has(path)) throw new Error(`simulated write failure: ${path}`)
          buffer += chunk
        },
        flush: () => {
          files.set(path, buffer)
        }
      }
    }
  }
}
