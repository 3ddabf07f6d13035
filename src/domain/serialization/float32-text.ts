/**
 * 工具：单精度浮点文本转换
 * - formatF32：最短可往返的十进制表示，始终为定点写法（不出现指数）。
 * - parseF32：严格解析十进制文本，结果量化为 f32。
 */

/** 解析结果：成功携带数值，失败携带错误描述 */
export type F32ParseResult = { ok: true; value: number } | { ok: false; message: string } // 导出：浮点解析结果

const EMPTY_MESSAGE = 'cannot parse float from empty string'
const INVALID_MESSAGE = 'invalid float literal'

const DECIMAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/
const SPECIAL_RE = /^([+-]?)(inf|infinity|nan)$/i

// f32 的最短往返表示最多 9 位有效数字
const MAX_F32_DIGITS = 9

/** 十进制候选：数值 = digits × 10^exp10，digits 为不含前导零的整数串 */
interface DecimalDigits {
  digits: string
  exp10: number
}

/**
 * 展开为定点写法：先去掉末尾零，再按小数点位置补零。
 */
function toPlainDecimal({ digits, exp10 }: DecimalDigits): string {
  let d = digits
  let e = exp10
  while (d.length > 1 && d.endsWith('0')) {
    d = d.slice(0, -1)
    e++
  }
  const point = d.length + e
  if (point <= 0) return `0.${'0'.repeat(-point)}${d}`
  if (point >= d.length) return d + '0'.repeat(point - d.length)
  return `${d.slice(0, point)}.${d.slice(point)}`
}

/**
 * 最短位数搜索（v 为正的有限 f32）。
 * - 每个位数先取就近舍入的候选，再试末位 ±1：2 的幂附近舍入区间不对称，
 *   就近候选可能落在区间外，而相邻候选仍能还原。
 * - 同一位数有多个候选可还原时取最接近 v 的。
 */
function shortestDigits(v: number): DecimalDigits {
  for (let n = 1; n <= MAX_F32_DIGITS; n++) {
    const [mantissa, expPart] = v.toExponential(n - 1).split('e')
    const nearest = Number(mantissa.replace('.', ''))
    const exp10 = Number(expPart) - (n - 1)
    let best: { m: number; dist: number } | null = null
    for (const m of [nearest, nearest - 1, nearest + 1]) {
      if (m <= 0) continue
      const candidate = Number(`${m}e${exp10}`)
      if (Math.fround(candidate) !== v) continue
      const dist = Math.abs(candidate - v)
      if (!best || dist < best.dist) best = { m, dist }
    }
    if (best) return { digits: String(best.m), exp10 }
  }
  // 9 位有效数字的就近舍入总能还原，循环内必然返回
  const [mantissa, expPart] = v.toExponential(MAX_F32_DIGITS - 1).split('e')
  return { digits: mantissa.replace('.', ''), exp10: Number(expPart) - (MAX_F32_DIGITS - 1) }
}

/**
 * 格式化：输出能精确还原为同一 f32 的最少位数十进制文本。
 * 参数：value —— 任意数值，先量化为 f32
 * 返回：如 "1"、"-0.1"、"10.000002"、"inf"、"NaN"
 */
export function formatF32(value: number): string { // 导出：供编码器写出数值行
  const v = Math.fround(value)
  if (Number.isNaN(v)) return 'NaN'
  if (v === Infinity) return 'inf'
  if (v === -Infinity) return '-inf'
  if (v === 0) return Object.is(v, -0) ? '-0' : '0'
  const plain = toPlainDecimal(shortestDigits(Math.abs(v)))
  return v < 0 ? `-${plain}` : plain
}

/**
 * 解析：接受可选符号、十进制小数与可选指数，以及 inf/infinity/nan（不区分大小写）。
 * 不接受首尾空白、十六进制与下划线分隔。
 */
export function parseF32(text: string): F32ParseResult { // 导出：供解码器读取数值行
  if (text.length === 0) return { ok: false, message: EMPTY_MESSAGE }
  const special = SPECIAL_RE.exec(text)
  if (special) {
    const sign = special[1] === '-' ? -1 : 1
    const word = special[2].toLowerCase()
    return { ok: true, value: word === 'nan' ? NaN : sign * Infinity }
  }
  if (!DECIMAL_RE.test(text)) return { ok: false, message: INVALID_MESSAGE }
  return { ok: true, value: Math.fround(Number(text)) }
}
