/**
 * スケジュール表の型定義
 */

// "HHMM" 形式の時刻ラベル。"2400" は日の終わりを表す
export type TimeSlot = string

export interface HierarchyPath {
  ancestors: string[]   // 上位階層（なければ空配列）
  leaf: string          // 末端ラベル
}

export interface ScheduleGroup {
  name: string                         // 元のグループ名（一意キー）
  hierarchy: HierarchyPath             // 登録時に name から導出
  activities: Record<TimeSlot, string> // 時刻 → 活動内容
  locations: string[]                  // 登録順・重複なし
}

// 1行 = セルの配列。0行目がヘッダー、1行目が空行、2行目以降がグループ
export type ScheduleRow = string[]
export type ScheduleTable = ScheduleRow[]

export interface ScheduleExport {
  timeSlots: TimeSlot[]
  groups: Record<string, ScheduleGroup>
  table: ScheduleTable
}
