/**
 * 系统：变换存档
 * - 启动后首帧：为每个带 PoseTag 的实体读取 <目录>/<name>.state 并恢复变换
 * - 收到 window/closing：下一帧保存全部带标签实体的变换
 * - 恢复失败保留实体原变换；保存失败中止本轮并记录已保存数量
 */
import type { System, World } from '@domain/core/world' // 引入：系统与世界类型
import type { StateStoragePort } from '@ports/state-storage' // 引入：存档存储端口
import { deserializeTransform, serializeTransform } from '@domain/serialization/transform-codec' // 引入：变换编解码

/** 存档配置：目录由装配层显式传入 */
export interface PersistenceConfig { // 导出：存档配置
  directory: string
}

export interface SaveSummary { // 导出：保存结果
  saved: number
  failed: boolean
}

/**
 * 恢复：读取并解码所有带标签实体的存档。
 * 返回：成功恢复的数量
 */
export function loadPoses(world: World, config: PersistenceConfig, storage: StateStoragePort): number { // 导出：启动恢复
  let initialized = 0
  for (const entity of world.entities()) {
    if (!entity.poseTag) continue
    const path = storage.statePath(config.directory, entity.poseTag.name)
    let lines: Iterable<string> | null
    try {
      lines = storage.readLines(path)
    } catch (err) {
      console.warn('[存档] 读取存档失败，保留原变换', { path, err })
      continue
    }
    if (!lines) continue
    const result = deserializeTransform(lines)
    if (result.ok) {
      entity.transform = result.transform
      initialized++
    } else {
      console.error(`[存档] 无法解析变换: ${result.error.message}`)
    }
  }
  console.log(`[存档] 已恢复 ${initialized} 个变换`)
  return initialized
}

/**
 * 保存：逐个编码写出；首个失败即中止。
 */
export function savePoses(world: World, config: PersistenceConfig, storage: StateStoragePort): SaveSummary { // 导出：关闭保存
  const { directory } = config
  let saved = 0
  for (const entity of world.entities()) {
    if (!entity.poseTag) continue
    const path = storage.statePath(directory, entity.poseTag.name)
    try {
      storage.ensureDirectory(directory)
      const writer = storage.createWriter(path)
      serializeTransform(writer, entity.transform)
      writer.flush()
      saved++
    } catch (err) {
      console.error('[存档] 写入失败，中止保存', { path, err })
      console.log(`[存档] 已保存 ${saved} 个变换到: ${directory}`)
      return { saved, failed: true }
    }
  }
  console.log(`[存档] 已保存 ${saved} 个变换到: ${directory}`)
  return { saved, failed: false }
}

/**
 * 创建存档系统
 * 参数：config —— 存档目录
 * 返回：System —— 注册到世界后生效
 */
export function posePersistenceSystem(opts: { config: PersistenceConfig }): System { // 导出：存档系统供装配使用
  let started = false
  let closingRequested = false
  let warnedNoStorage = false

  function update(_dt: number, world: World) {
    const storage = world.ports.storage
    if (!storage) {
      if (!warnedNoStorage) console.warn('[存档] 未注入存储端口，存档系统不工作')
      warnedNoStorage = true
      return
    }
    if (!started) {
      started = true
      world.bus.on('window/closing', () => {
        closingRequested = true
      })
      const count = loadPoses(world, opts.config, storage)
      world.bus.emit({ type: 'pose/loaded', payload: { count } })
      return
    }
    if (!closingRequested) return
    closingRequested = false
    const summary = savePoses(world, opts.config, storage)
    world.bus.emit({ type: 'pose/saved', payload: { count: summary.saved, failed: summary.failed } })
  }

  return { name: 'PosePersistence', update }
}
