/**
 * 端口：存档存储
 * - 用端口隔离文件系统，领域层仅依赖本接口。
 * - 读：按行产出（不含行结束符），文件不存在返回 null。
 * - 写：缓冲写入，flush 时提交。
 */
import type { TransformSink } from '@domain/serialization/transform-codec' // 引入：编码器输出端口

export interface StateWriter extends TransformSink { // 导出：缓冲写入器
  flush(): void
}

export interface StateStoragePort { // 导出：存档存储端口契约
  statePath(directory: string, name: string): string
  ensureDirectory(directory: string): void
  readLines(path: string): Iterable<string> | null
  createWriter(path: string): StateWriter
}

/** 拼接存档路径：<目录>/<名称>.state */
export function stateFilePath(directory: string, name: string): string { // 导出：供各适配器共用
  return `${directory}/${name}.state`
}

/**
 * 按行切分：以 \n 分隔并去除行尾 \r；末尾换行不产生额外空行。
 */
export function* splitLines(text: string): Generator<string> { // 导出：供各适配器共用
  if (text.length === 0) return
  const parts = text.split('\n')
  if (parts[parts.length - 1] === '') parts.pop()
  for (const part of parts) {
    yield part.endsWith('\r') ? part.slice(0, -1) : part
  }
}
