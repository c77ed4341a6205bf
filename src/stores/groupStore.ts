import { createStore, type StoreApi } from 'zustand/vanilla'
import type { ScheduleGroup, TimeSlot } from '@/types'
import { parseHierarchy } from '@/lib/hierarchy'

interface GroupState {
  // Map は登録順を保持する
  groups: Map<string, ScheduleGroup>

  addGroup: (name: string, activities?: Record<TimeSlot, string>, locations?: string[]) => void
  addActivity: (name: string, timeSlot: TimeSlot, activity: string, location?: string) => void
  getGroup: (name: string) => ScheduleGroup | undefined
  hasGroup: (name: string) => boolean
  getGroups: () => ScheduleGroup[]
  snapshot: () => Record<string, ScheduleGroup>
}

export type GroupStore = StoreApi<GroupState>

function cloneGroup(group: ScheduleGroup): ScheduleGroup {
  return {
    name: group.name,
    hierarchy: { ancestors: [...group.hierarchy.ancestors], leaf: group.hierarchy.leaf },
    activities: { ...group.activities },
    locations: [...group.locations],
  }
}

// 空文字を除き、最初に出てきた順で重複を取り除く
function uniqueLocations(locations: string[]): string[] {
  return locations.filter((location, index) => location && locations.indexOf(location) === index)
}

function createGroup(
  name: string,
  activities: Record<TimeSlot, string>,
  locations: string[]
): ScheduleGroup {
  return {
    name,
    hierarchy: parseHierarchy(name),
    activities: { ...activities },
    locations: uniqueLocations(locations),
  }
}

/**
 * グループ登録ストア
 * スケジュールごとに独立したインスタンスを作る
 */
export function createGroupStore(): GroupStore {
  return createStore<GroupState>((set, get) => ({
    groups: new Map<string, ScheduleGroup>(),

    // 既存グループは上書きしない
    addGroup: (name, activities = {}, locations = []) =>
      set((state) => {
        if (state.groups.has(name)) return state
        const newMap = new Map(state.groups)
        newMap.set(name, createGroup(name, activities, locations))
        return { groups: newMap }
      }),

    addActivity: (name, timeSlot, activity, location = '') => {
      get().addGroup(name)
      set((state) => {
        const group = state.groups.get(name)
        if (!group) return state
        const locations =
          location && !group.locations.includes(location)
            ? [...group.locations, location]
            : group.locations
        const newMap = new Map(state.groups)
        newMap.set(name, {
          ...group,
          activities: { ...group.activities, [timeSlot]: activity },
          locations,
        })
        return { groups: newMap }
      })
    },

    // 外部には複製を返す（state は set 経由でのみ変更する）
    getGroup: (name) => {
      const group = get().groups.get(name)
      return group ? cloneGroup(group) : undefined
    },

    hasGroup: (name) => get().groups.has(name),

    getGroups: () => Array.from(get().groups.values(), cloneGroup),

    snapshot: () => {
      const result: Record<string, ScheduleGroup> = {}
      for (const [name, group] of get().groups) {
        result[name] = cloneGroup(group)
      }
      return result
    },
  }))
}
