/**
 * 事件总线（强类型）
 * - DomainEventMap 登记全部事件类型及其载荷，emit/on 按类型检查载荷。
 * - window/closing 触发保存；pose/loaded、pose/saved 报告存档结果；entity/* 来自世界。
 */
import type { EntityId } from './world' // 引入：实体标识类型

/** 事件类型 → 载荷；undefined 表示无载荷 */
export interface DomainEventMap { // 导出：领域事件登记表
  'window/closing': undefined
  'pose/loaded': { count: number }
  'pose/saved': { count: number; failed: boolean }
  'entity/spawned': { id: EntityId }
  'entity/destroyed': { id: EntityId }
}

export type DomainEventType = keyof DomainEventMap // 导出：事件类型名

/** 领域事件：无载荷的事件可省略 payload */
export type DomainEvent<K extends DomainEventType = DomainEventType> = { type: K } & (undefined extends DomainEventMap[K]
  ? { payload?: DomainEventMap[K] }
  : { payload: DomainEventMap[K] }) // 导出：领域事件类型

export type DomainEventListener<K extends DomainEventType> = (e: DomainEvent<K>) => void // 导出：事件监听器

export interface DomainEventBus { // 导出：事件总线契约
  emit: <K extends DomainEventType>(e: DomainEvent<K>) => void
  on: <K extends DomainEventType>(type: K, fn: DomainEventListener<K>) => () => void
}

type ListenerTable = { [K in DomainEventType]: Set<DomainEventListener<K>> }

/**
 * 创建事件总线：提供基础的发布/订阅能力。
 * 返回：DomainEventBus —— emit/on API 与取消订阅句柄。
 */
export function createEventBus(): DomainEventBus {
  const listeners: ListenerTable = {
    'window/closing': new Set(),
    'pose/loaded': new Set(),
    'pose/saved': new Set(),
    'entity/spawned': new Set(),
    'entity/destroyed': new Set()
  }
  console.log('[事件] 事件总线已创建')

  function emit<K extends DomainEventType>(e: DomainEvent<K>): void {
    const set: Set<DomainEventListener<K>> = listeners[e.type]
    set.forEach((fn) => fn(e))
  }

  function on<K extends DomainEventType>(type: K, fn: DomainEventListener<K>): () => void {
    const set: Set<DomainEventListener<K>> = listeners[type]
    set.add(fn)
    return () => {
      set.delete(fn)
    }
  }

  return { emit, on }
}
