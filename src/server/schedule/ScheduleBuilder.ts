/**
 * ScheduleBuilder - 時間軸とグループ登録を保持し、表・CSV・辞書形式で出力する
 */

import type { ScheduleExport, ScheduleGroup, ScheduleTable, TimeSlot } from '@/types'
import { generateTimeSlots, DEFAULT_INTERVAL_MINUTES } from '@/lib/timeUtils'
import { createGroupStore, type GroupStore } from '@/stores/groupStore'
import { buildScheduleTable } from './tableBuilder'
import { writeScheduleCsv } from './csvWriter'

export class ScheduleBuilder {
  private timeSlots: TimeSlot[] = []
  private readonly store: GroupStore

  constructor(store: GroupStore = createGroupStore()) {
    this.store = store
  }

  /**
   * 表の時間帯を設定（既存の時間軸は置き換える）
   */
  setTimePeriod(start: string, end: string, intervalMinutes: number = DEFAULT_INTERVAL_MINUTES): void {
    this.timeSlots = generateTimeSlots(start, end, intervalMinutes)
  }

  getTimeSlots(): TimeSlot[] {
    return [...this.timeSlots]
  }

  addGroup(name: string, activities: Record<TimeSlot, string> = {}, locations: string[] = []): void {
    this.store.getState().addGroup(name, activities, locations)
  }

  addActivity(name: string, timeSlot: TimeSlot, activity: string, location = ''): void {
    this.store.getState().addActivity(name, timeSlot, activity, location)
  }

  getGroup(name: string): ScheduleGroup | undefined {
    return this.store.getState().getGroup(name)
  }

  getGroups(): ScheduleGroup[] {
    return this.store.getState().getGroups()
  }

  buildTable(): ScheduleTable {
    return buildScheduleTable(this.timeSlots, Array.from(this.store.getState().groups.values()))
  }

  exportToDict(): ScheduleExport {
    return {
      timeSlots: this.getTimeSlots(),
      groups: this.store.getState().snapshot(),
      table: this.buildTable(),
    }
  }

  async exportToCsv(filePath: string): Promise<void> {
    await writeScheduleCsv(filePath, this.buildTable())
  }
}
