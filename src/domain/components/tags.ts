/**
 * 组件：存档标签
 * - PoseTag：标记需要在关闭时保存、启动时恢复变换的实体
 * - name 决定存档文件名：<目录>/<name>.state
 */
export interface PoseTag { // 导出：存档标签，标记实体参与变换持久化
  name: string
}

export function poseTag(name: string): PoseTag { // 导出：按名称创建标签
  return { name }
}

/** 相机简写，等价于 poseTag('camera') */
export function cameraPoseTag(): PoseTag { // 导出：相机标签
  return poseTag('camera')
}
