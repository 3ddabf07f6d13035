/**
 * 世界：实体存储、系统注册、事件派发、步进。
 * - 实体为普通记录：变换 + 可选存档标签。
 * - 系统按注册顺序执行。
 */
// 引入事件总线类型：用于世界内事件派发
import type { DomainEventBus } from './event-bus'
import type { StateStoragePort } from '@ports/state-storage' // 引入：存档存储端口类型
import { createTransform, type Transform } from '@domain/components/transform' // 引入：变换组件
import type { PoseTag } from '@domain/components/tags' // 引入：存档标签

/** 实体标识类型 */
export type EntityId = string // 导出：实体标识类型

/**
 * 系统接口：
 * - name：系统名称，便于调试与日志。
 * - update(dt, world)：推进系统一帧逻辑。
 */
export interface System { // 导出：系统接口
  name: string
  update: (dt: number, world: World) => void
}

/** 端口集合：用于注入外部适配器。 */
export interface Ports { // 导出：端口集合接口
  storage?: StateStoragePort
}

export interface EntityRecord { // 导出：实体记录
  id: EntityId
  transform: Transform
  poseTag?: PoseTag
}

export interface SpawnOptions { // 导出：生成实体参数；缺省变换为单位变换
  id?: EntityId
  transform?: Transform
  poseTag?: PoseTag
}

export interface World { // 导出：世界接口
  bus: DomainEventBus
  ports: Ports
  registerSystem: (sys: System) => void
  step: (dt: number) => void
  spawnEntity: (opts?: SpawnOptions) => EntityRecord
  getEntity: (id: EntityId) => EntityRecord | undefined
  entities: () => EntityRecord[]
  destroyEntity: (id: EntityId) => void
}

/**
 * 创建世界：收集系统并按注册顺序执行。
 * 参数：bus —— 事件总线；ports —— 外设端口集合。
 * 返回：World 实例。
 */
export function createWorld(opts: { bus: DomainEventBus; ports: Ports }): World { // 导出：创建世界工厂函数
  console.log('[世界] 创建 World 实例')
  const systems: System[] = []
  const store = new Map<EntityId, EntityRecord>()
  let nextId = 1
  const world: World = {
    bus: opts.bus,
    ports: opts.ports,
    registerSystem: (sys) => {
      console.log(`[世界] 注册系统: ${sys.name}`)
      systems.push(sys)
    },
    step: (dt) => {
      for (const s of systems) s.update(dt, world)
    },
    spawnEntity: (spawn) => {
      const id = spawn?.id ?? `entity:${nextId++}`
      if (store.has(id)) throw new Error(`[世界] 实体已存在: ${id}`)
      const record: EntityRecord = { id, transform: spawn?.transform ?? createTransform() }
      if (spawn?.poseTag) record.poseTag = spawn.poseTag
      store.set(id, record)
      opts.bus.emit({ type: 'entity/spawned', payload: { id } })
      return record
    },
    getEntity: (id) => store.get(id),
    entities: () => Array.from(store.values()),
    destroyEntity: (id) => {
      store.delete(id)
      opts.bus.emit({ type: 'entity/destroyed', payload: { id } })
    }
  }
  return world
}
