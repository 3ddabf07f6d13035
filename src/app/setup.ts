// 引入 World：领域世界创建与系统调度
import { createWorld, type EntityRecord, type World } from '@domain/core/world' // 引入：创建世界与类型
// 引入事件总线：系统间解耦通信
import { createEventBus, type DomainEventBus } from '@domain/core/event-bus' // 引入：事件总线工厂
import type { StateStoragePort } from '@ports/state-storage' // 引入：存档存储端口类型
import { createFsStateStorage } from '@adapters/node/fs-state-storage' // 引入：文件系统适配器
import { posePersistenceSystem, type PersistenceConfig } from '@domain/systems/pose-persistence' // 引入：存档系统
import { lookingAt, transformFromXyz } from '@domain/components/transform' // 引入：变换工具
import { cameraPoseTag } from '@domain/components/tags' // 引入：相机标签
import { Vector3 } from 'three' // 引入：three 向量

export interface ComposedApp { // 导出：装配结果
  world: World
  bus: DomainEventBus
  camera: EntityRecord
}

/**
 * 装配根（事件总线/端口/系统）
 * - 注入存储端口（默认文件系统）
 * - 注册存档系统，生成带相机标签的相机实体
 */
export function composeApp(opts: { config: PersistenceConfig; storage?: StateStoragePort }): ComposedApp { // 导出：应用装配
  const bus = createEventBus()
  const storage = opts.storage ?? createFsStateStorage()
  const world = createWorld({ bus, ports: { storage } })
  world.registerSystem(posePersistenceSystem({ config: opts.config }))

  // 相机默认位于 (10, 10, 10) 并看向原点；若有存档，首帧会被覆盖
  const camera = world.spawnEntity({
    id: 'camera',
    transform: lookingAt(transformFromXyz(10, 10, 10), new Vector3(0, 0, 0)),
    poseTag: cameraPoseTag()
  })
  console.log('[装配] 存档目录', { directory: opts.config.directory })
  return { world, bus, camera }
}
