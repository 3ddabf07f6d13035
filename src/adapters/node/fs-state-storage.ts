/**
 * Node 文件系统存储适配器
 * - 同步 I/O：存档很小（15 行），在关闭/启动时一次性读写。
 * - flush 先写入 <path>.tmp 再重命名，避免写到一半留下损坏文件。
 */
import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs' // 引入：Node 同步文件 API
import { splitLines, stateFilePath, type StateStoragePort, type StateWriter } from '@ports/state-storage' // 引入：存档端口契约

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

export function createFsStateStorage(): StateStoragePort { // 导出：文件系统适配器工厂
  return {
    statePath: stateFilePath,
    ensureDirectory: (directory) => {
      if (existsSync(directory)) return
      console.log('[存储] 创建存档目录', { directory })
      mkdirSync(directory, { recursive: true })
    },
    readLines: (path) => {
      let text: string
      try {
        text = readFileSync(path, 'utf8')
      } catch (err) {
        if (isMissingFile(err)) return null
        throw err
      }
      return splitLines(text)
    },
    createWriter: (path): StateWriter => {
      const chunks: string[] = []
      return {
        write: (chunk) => {
          chunks.push(chunk)
        },
        flush: () => {
          const tmp = `${path}.tmp`
          try {
            writeFileSync(tmp, chunks.join(''), 'utf8')
            renameSync(tmp, path)
          } catch (err) {
            // 失败时不留下临时文件，错误原样上抛
            rmSync(tmp, { force: true })
            throw err
          }
          chunks.length = 0
        }
      }
    }
  }
}
