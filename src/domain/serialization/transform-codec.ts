/**
 * 编解码：变换的 v0 文本格式
 * - 每个数值独占一行，标签行与空行仅供人读，解码时只按位置跳过。
 * - 解码全有或全无：缺行、版本不符、数值非法都会整体失败。
 *
 * 格式：
 * ```
 * v0
 *
 * translation:
 * <x> <y> <z>   （各占一行）
 *
 * rotation:
 * <x> <y> <z> <w>
 *
 * scale:
 * <x> <y> <z>
 * ```
 */
import { Quaternion, Vector3 } from 'three' // 引入：three 数学类型
import type { Transform } from '@domain/components/transform' // 引入：变换组件类型
import { formatF32, parseF32 } from './float32-text' // 引入：f32 文本转换

export const STATE_FORMAT_VERSION = 'v0' // 导出：当前唯一支持的格式版本

/** 写出目标：只需按顺序接受字符串片段，不负责刷新与关闭 */
export interface TransformSink { // 导出：编码器输出端口
  write(chunk: string): void
}

/** 解析错误：仅携带可读信息 */
export class TransformParseError extends Error { // 导出：解码错误类型
  constructor(message: string) {
    super(message)
    this.name = 'TransformParseError'
  }

  static expectedLine(): TransformParseError {
    return new TransformParseError("Expected line to be there, but it wasn't there")
  }

  /** 包装底层错误（读取失败等），原样保留其信息 */
  static fromError(err: unknown): TransformParseError {
    return new TransformParseError(err instanceof Error ? err.message : String(err))
  }
}

export type DecodeResult = { ok: true; transform: Transform } | { ok: false; error: TransformParseError } // 导出：解码结果

/**
 * 编码：按 v0 布局写出变换。
 * - sink.write 抛出的错误原样向上传递，已写出的片段不回滚。
 */
export function serializeTransform(sink: TransformSink, transform: Transform): void { // 导出：存档写出
  const { translation: t, rotation: r, scale: s } = transform
  sink.write(`${STATE_FORMAT_VERSION}\n\n`)

  sink.write('translation:\n')
  sink.write(`${formatF32(t.x)}\n${formatF32(t.y)}\n${formatF32(t.z)}\n\n`)

  sink.write('rotation:\n')
  sink.write(`${formatF32(r.x)}\n${formatF32(r.y)}\n${formatF32(r.z)}\n${formatF32(r.w)}\n\n`)

  sink.write('scale:\n')
  sink.write(`${formatF32(s.x)}\n${formatF32(s.y)}\n${formatF32(s.z)}\n`)
}

/** 按行读取，缺行或读取异常都转为 TransformParseError 抛出（仅在本模块内部捕获） */
function nextLine(lines: Iterator<string>): string {
  let step: IteratorResult<string>
  try {
    step = lines.next()
  } catch (err) {
    throw TransformParseError.fromError(err)
  }
  if (step.done) throw TransformParseError.expectedLine()
  return step.value
}

function nextFloat(lines: Iterator<string>): number {
  const parsed = parseF32(nextLine(lines))
  if (!parsed.ok) throw new TransformParseError(parsed.message)
  return parsed.value
}

function skipLines(lines: Iterator<string>, count: number): void {
  for (let i = 0; i < count; i++) nextLine(lines)
}

function readTransform(lines: Iterator<string>): Transform {
  const version = nextLine(lines)
  if (version !== STATE_FORMAT_VERSION) {
    throw new TransformParseError(`Wrong version: ${version}`)
  }

  skipLines(lines, 2)
  const translation = new Vector3(nextFloat(lines), nextFloat(lines), nextFloat(lines))

  skipLines(lines, 2)
  const rotation = new Quaternion(nextFloat(lines), nextFloat(lines), nextFloat(lines), nextFloat(lines))

  skipLines(lines, 2)
  const scale = new Vector3(nextFloat(lines), nextFloat(lines), nextFloat(lines))

  return { translation, rotation, scale }
}

/**
 * 解码：从行序列还原变换。
 * 参数：lines —— 已去除行结束符的行序列，按文件顺序产出
 * 返回：DecodeResult —— 成功为变换，失败为首个错误
 */
export function deserializeTransform(lines: Iterable<string>): DecodeResult { // 导出：存档读取
  try {
    return { ok: true, transform: readTransform(lines[Symbol.iterator]()) }
  } catch (err) {
    if (err instanceof TransformParseError) return { ok: false, error: err }
    return { ok: false, error: TransformParseError.fromError(err) }
  }
}
