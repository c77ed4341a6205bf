import type { HierarchyPath } from '@/types'

export const HIERARCHY_SEPARATOR = ' - '

/**
 * "Players - Planners - AOs" のような階層付きグループ名を分解
 * 区切りがなければ名前全体が末端ラベルになる（トリムしない）
 */
export function parseHierarchy(name: string): HierarchyPath {
  if (!name.includes(HIERARCHY_SEPARATOR)) {
    return { ancestors: [], leaf: name }
  }

  const parts = name.split(HIERARCHY_SEPARATOR).map((part) => part.trim())
  return {
    ancestors: parts.slice(0, -1),
    leaf: parts[parts.length - 1],
  }
}
