/**
 * 组件：变换（平移 + 四元数旋转 + 缩放）
 * - 使用 three 的 Vector3 / Quaternion 作为数据载体
 * - 旋转不做归一化，缩放允许为负或非均匀
 */
import { Matrix4, Quaternion, Vector3 } from 'three' // 引入：three 数学类型

export interface Transform { // 导出：实体变换组件，供存档系统读写
  translation: Vector3
  rotation: Quaternion
  scale: Vector3
}

/** 初始化参数：缺省部分取单位变换 */
export interface TransformInit { // 导出：createTransform 的可选参数
  translation?: Vector3
  rotation?: Quaternion
  scale?: Vector3
}

/**
 * 工具：创建 Transform
 * 参数：可选的平移/旋转/缩放（会被复制，不共享引用）
 * 返回：Transform 实例
 */
export function createTransform(init?: TransformInit): Transform { // 导出：工厂函数，供实体初始化
  return {
    translation: init?.translation?.clone() ?? new Vector3(0, 0, 0),
    rotation: init?.rotation?.clone() ?? new Quaternion(0, 0, 0, 1),
    scale: init?.scale?.clone() ?? new Vector3(1, 1, 1)
  }
}

export function identityTransform(): Transform { // 导出：单位变换
  return createTransform()
}

export function transformFromXyz(x: number, y: number, z: number): Transform { // 导出：仅带平移的变换
  return createTransform({ translation: new Vector3(x, y, z) })
}

export function cloneTransform(t: Transform): Transform { // 导出：深拷贝
  return createTransform(t)
}

/**
 * 朝向目标：返回新变换，其局部 -Z 轴指向 target（相机约定）。
 * 参数：up —— 上方向，默认 +Y
 */
export function lookingAt(t: Transform, target: Vector3, up: Vector3 = new Vector3(0, 1, 0)): Transform { // 导出：相机初始朝向
  const m = new Matrix4().lookAt(t.translation, target, up)
  const next = cloneTransform(t)
  next.rotation.setFromRotationMatrix(m)
  return next
}

/** 精确比较：逐分量全等 */
export function transformsEqual(a: Transform, b: Transform): boolean { // 导出：供测试与存档比对
  return a.translation.equals(b.translation) && a.rotation.equals(b.rotation) && a.scale.equals(b.scale)
}
