/**
 * 应用入口（Node）
 * - 读取环境配置，按需静默日志，装配世界。
 * - 帧循环：固定步长推进；收到 SIGINT/SIGTERM 时视为窗口关闭，保存后退出。
 */
import { composeApp } from './setup' // 应用装配入口
import { resolvePersistenceConfig, shouldSilenceLogs } from './config' // 引入：环境配置
import { silenceLogs } from '@utils/silence-logs' // 引入：日志静默工具

const FRAME_MS = 1000 / 60

function main() {
  if (shouldSilenceLogs(process.env)) {
    silenceLogs({ keepWarn: true, keepError: true })
  }
  console.log('[启动] 初始化应用')
  process.on('uncaughtException', (err) => {
    console.error('[错误] 未处理异常:', err)
    process.exit(1)
  })
  process.on('unhandledRejection', (reason) => {
    console.error('[错误] 未处理 Promise 拒绝:', reason)
  })

  const { world, bus, camera } = composeApp({ config: resolvePersistenceConfig(process.env) })
  // 首帧：恢复存档并订阅关闭事件
  world.step(0)
  const timer = setInterval(() => world.step(FRAME_MS / 1000), FRAME_MS)

  let closing = false
  const close = () => {
    if (closing) return
    closing = true
    console.log('[关闭] 收到关闭信号，保存变换', { camera: camera.transform.translation.toArray() })
    bus.emit({ type: 'window/closing' })
    world.step(0)
    clearInterval(timer)
  }
  process.on('SIGINT', close)
  process.on('SIGTERM', close)
}

main()
