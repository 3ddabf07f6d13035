/**
 * 测试存档系统：启动恢复、关闭保存、失败处理（内存存储）。
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest'
import { createEventBus } from '@domain/core/event-bus'
import { createWorld, type Ports } from '@domain/core/world'
import { identityTransform, transformFromXyz, transformsEqual } from '@domain/components/transform'
import { cameraPoseTag, poseTag } from '@domain/components/tags'
import { loadPoses, posePersistenceSystem, savePoses } from '@domain/systems/pose-persistence'
import { createMemoryStateStorage } from '@adapters/memory/memory-state-storage'

const config = { directory: 'saves' }
const CAMERA_TEXT = 'v0\n\ntranslation:\n1\n2\n3\n\nrotation:\n0\n0\n0\n1\n\nscale:\n1\n1\n1\n'

function setup(ports: Ports = {}) {
  const bus = createEventBus()
  const world = createWorld({ bus, ports })
  return { bus, world }
}

describe('loadPoses 启动恢复', () => {
  let errorSpy: MockInstance

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    errorSpy.mockRestore()
  })

  it('读取 <目录>/<name>.state 并替换带标签实体的变换', () => {
    const storage = createMemoryStateStorage({ 'saves/camera.state': CAMERA_TEXT })
    const { world } = setup()
    const camera = world.spawnEntity({ poseTag: cameraPoseTag() })
    const untagged = world.spawnEntity()

    expect(loadPoses(world, config, storage)).toBe(1)
    expect(camera.transform.translation.toArray()).toEqual([1, 2, 3])
    expect(transformsEqual(untagged.transform, identityTransform())).toBe(true)
  })

  it('存档不存在时静默跳过', () => {
    const storage = createMemoryStateStorage()
    const { world } = setup()
    const camera = world.spawnEntity({ transform: transformFromXyz(5, 5, 5), poseTag: cameraPoseTag() })

    expect(loadPoses(world, config, storage)).toBe(0)
    expect(camera.transform.translation.toArray()).toEqual([5, 5, 5])
    expect(errorSpy).not.toHaveBeenCalled()
  })

  it('解析失败时记录错误并保留原变换', () => {
    const storage = createMemoryStateStorage({ 'saves/camera.state': 'v9\n' })
    const { world } = setup()
    const camera = world.spawnEntity({ transform: transformFromXyz(5, 5, 5), poseTag: cameraPoseTag() })

    expect(loadPoses(world, config, storage)).toBe(0)
    expect(camera.transform.translation.toArray()).toEqual([5, 5, 5])
    expect(errorSpy).toHaveBeenCalledWith('[存档] 无法解析变换: Wrong version: v9')
  })
})

describe('savePoses 关闭保存', () => {
  it('写出每个带标签实体并创建目录', () => {
    const storage = createMemoryStateStorage()
    const { world } = setup()
    world.spawnEntity({ transform: transformFromXyz(1, 2, 3), poseTag: cameraPoseTag() })
    world.spawnEntity({ poseTag: poseTag('cube') })
    world.spawnEntity()

    expect(savePoses(world, config, storage)).toEqual({ saved: 2, failed: false })
    expect(storage.directories.has('saves')).toBe(true)
    expect(storage.files.get('saves/camera.state')).toBe(CAMERA_TEXT)
    expect(storage.files.get('saves/cube.state')).toBe(
      'v0\n\ntranslation:\n0\n0\n0\n\nrotation:\n0\n0\n0\n1\n\nscale:\n1\n1\n1\n'
    )
    expect(storage.files.size).toBe(2)
  })

  it('首个写入失败即中止，并返回已保存数量', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const storage = createMemoryStateStorage()
    storage.failWritesTo.add('saves/b.state')
    const { world } = setup()
    world.spawnEntity({ poseTag: poseTag('a') })
    world.spawnEntity({ poseTag: poseTag('b') })
    world.spawnEntity({ poseTag: poseTag('c') })

    expect(savePoses(world, config, storage)).toEqual({ saved: 1, failed: true })
    expect([...storage.files.keys()]).toEqual(['saves/a.state'])
    expect(errorSpy).toHaveBeenCalledTimes(1)
    errorSpy.mockRestore()
  })

  it('保存后再恢复得到相同变换', () => {
    const storage = createMemoryStateStorage()
    const first = setup()
    const source = first.world.spawnEntity({ transform: transformFromXyz(0.5, -1.25, 8), poseTag: poseTag('player') })
    source.transform.rotation.set(0, 0.6, 0, 0.8)
    source.transform.scale.set(2, -1, 0.5)
    savePoses(first.world, config, storage)

    const second = setup()
    const target = second.world.spawnEntity({ poseTag: poseTag('player') })
    expect(loadPoses(second.world, config, storage)).toBe(1)
    expect(target.transform.translation.toArray()).toEqual([0.5, -1.25, 8])
    expect(target.transform.rotation.toArray()).toEqual([0, Math.fround(0.6), 0, Math.fround(0.8)])
    expect(target.transform.scale.toArray()).toEqual([2, -1, 0.5])
  })
})

describe('posePersistenceSystem 生命周期', () => {
  it('首帧恢复，收到关闭事件后的下一帧保存一次', () => {
    const storage = createMemoryStateStorage({ 'saves/camera.state': CAMERA_TEXT })
    const { bus, world } = setup({ storage })
    const camera = world.spawnEntity({ poseTag: cameraPoseTag() })
    world.registerSystem(posePersistenceSystem({ config }))
    const loaded = vi.fn()
    const saved = vi.fn()
    bus.on('pose/loaded', loaded)
    bus.on('pose/saved', saved)

    world.step(0)
    expect(loaded).toHaveBeenCalledWith({ type: 'pose/loaded', payload: { count: 1 } })
    expect(camera.transform.translation.toArray()).toEqual([1, 2, 3])

    world.step(0.016)
    expect(saved).not.toHaveBeenCalled()

    camera.transform.translation.set(7, 8, 9)
    bus.emit({ type: 'window/closing' })
    bus.emit({ type: 'window/closing' })
    world.step(0.016)
    world.step(0.016)

    expect(saved).toHaveBeenCalledTimes(1)
    expect(saved).toHaveBeenCalledWith({ type: 'pose/saved', payload: { count: 1, failed: false } })
    expect(storage.files.get('saves/camera.state')).toBe(
      'v0\n\ntranslation:\n7\n8\n9\n\nrotation:\n0\n0\n0\n1\n\nscale:\n1\n1\n1\n'
    )
  })

  it('未注入存储端口时只警告一次', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const { world } = setup()
    world.registerSystem(posePersistenceSystem({ config }))
    world.step(0)
    world.step(0)
    expect(warnSpy).toHaveBeenCalledTimes(1)
    warnSpy.mockRestore()
  })
})
