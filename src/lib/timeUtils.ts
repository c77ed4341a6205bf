/**
 * 時刻関連のユーティリティ関数
 * スケジュール表の列（時間軸）は "HHMM" 形式のラベルで表す
 */

import type { TimeSlot } from '@/types'
import { ConfigurationError } from './errors'

export const MINUTES_PER_DAY = 1440
export const DEFAULT_INTERVAL_MINUTES = 30

// 日の終わりを表す番兵。"0000" とは区別する
export const END_OF_DAY_LABEL = '2400'

const SLOT_PATTERN = /^\d{4}$/

/**
 * "HHMM" 形式の文字列を時・分にパース
 * 範囲外・形式不正は ConfigurationError
 */
export function parseSlotTime(label: string, field = 'time'): { hour: number; minute: number } {
  if (!SLOT_PATTERN.test(label)) {
    throw new ConfigurationError(`Invalid time "${label}": expected HHMM`, field)
  }

  const hour = parseInt(label.slice(0, 2), 10)
  const minute = parseInt(label.slice(2), 10)

  if (hour > 23 || minute > 59) {
    throw new ConfigurationError(`Invalid time "${label}": out of range`, field)
  }

  return { hour, minute }
}

/**
 * 時刻を分単位に変換（0:00 = 0, 23:59 = 1439）
 */
export function timeToMinutes(time: { hour: number; minute: number }): number {
  return time.hour * 60 + time.minute
}

/**
 * 分単位から時刻に変換
 */
export function minutesToTime(minutes: number): { hour: number; minute: number } {
  const normalizedMinutes = ((minutes % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY // 0-1439 に正規化
  return {
    hour: Math.floor(normalizedMinutes / 60),
    minute: normalizedMinutes % 60,
  }
}

/**
 * 分単位の時刻を "HHMM" にフォーマット（日付部分は捨てる）
 */
export function formatSlotLabel(minutes: number): TimeSlot {
  const { hour, minute } = minutesToTime(minutes)
  return `${String(hour).padStart(2, '0')}${String(minute).padStart(2, '0')}`
}

/**
 * start から end まで intervalMinutes 刻みの時刻ラベルを生成（両端を含む）
 *
 * - end が start 以前なら翌日の end とみなす（日をまたぐスケジュール）
 * - end = "2400" は常に日の終わり（基準日翌日の 0:00）
 * - 開始より後に 0:00 に達した枠は "0000" ではなく "2400" と表記する
 */
export function generateTimeSlots(
  start: string,
  end: string,
  intervalMinutes: number = DEFAULT_INTERVAL_MINUTES
): TimeSlot[] {
  if (!Number.isInteger(intervalMinutes) || intervalMinutes <= 0) {
    throw new ConfigurationError(
      `Interval must be a positive whole number of minutes, got ${intervalMinutes}`,
      'intervalMinutes'
    )
  }

  const startMinutes = timeToMinutes(parseSlotTime(start, 'start'))

  let endMinutes: number
  if (end === END_OF_DAY_LABEL) {
    endMinutes = MINUTES_PER_DAY
  } else {
    endMinutes = timeToMinutes(parseSlotTime(end, 'end'))
    if (endMinutes <= startMinutes) {
      endMinutes += MINUTES_PER_DAY
    }
  }

  const slots: TimeSlot[] = []
  for (let current = startMinutes; current <= endMinutes; current += intervalMinutes) {
    const label = formatSlotLabel(current)
    slots.push(label === '0000' && current > startMinutes ? END_OF_DAY_LABEL : label)
  }

  return slots
}
