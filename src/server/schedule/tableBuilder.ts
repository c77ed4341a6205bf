/**
 * tableBuilder - グループ一覧と時間軸からスケジュール表を組み立てる
 *
 * 上位階層のラベルは値が変わった最初の行にだけ出力し、
 * 結合セルのような見た目にする。
 */

import type { ScheduleGroup, ScheduleRow, ScheduleTable, TimeSlot } from '@/types'
import { PreconditionError } from '@/lib/errors'

export const PREFIX_COLUMNS = 3

type RowPrefix = [string, string, string]

// 階層の深さごとの行の種類
export type HierarchyRowKind =
  | { depth: 1; top: string }
  | { depth: 2; top: string; second: string }
  | { depth: 3; top: string; second: string; third: string }
  | { depth: 'deep'; leaf: string }

// 直前に出力した上位ラベル（ソート順に畳み込む）
export interface SpanState {
  top: string | null
  second: string | null
}

export const INITIAL_SPAN_STATE: SpanState = { top: null, second: null }

/**
 * ソートキー
 * 階層なしのグループは名前全体、階層ありは (上位..., 末端)
 */
export function getSortKey(group: ScheduleGroup): string[] {
  const { ancestors, leaf } = group.hierarchy
  if (ancestors.length === 0) {
    return [group.name]
  }
  return [...ancestors, leaf]
}

/**
 * 文字列をコードポイント順で比較
 * サロゲートペアも1文字として扱う（"😀" は "！" より後）
 */
export function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a)
  const right = Array.from(b)
  const length = Math.min(left.length, right.length)
  for (let i = 0; i < length; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0)
    if (diff !== 0) return diff
  }
  return left.length - right.length
}

/**
 * タプルの辞書順比較。前方一致なら短い方が先
 */
export function compareSortKeys(a: string[], b: string[]): number {
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    const diff = compareCodePoints(a[i], b[i])
    if (diff !== 0) return diff
  }
  return a.length - b.length
}

export function classifyRow(key: string[], leaf: string): HierarchyRowKind {
  switch (key.length) {
    case 1:
      return { depth: 1, top: key[0] }
    case 2:
      return { depth: 2, top: key[0], second: key[1] }
    case 3:
      return { depth: 3, top: key[0], second: key[1], third: key[2] }
    default:
      return { depth: 'deep', leaf }
  }
}

// 変化したときだけラベルを出す
function spanLabel(label: string, previous: string | null): string {
  return label !== previous ? label : ''
}

/**
 * 1行分のプレフィックス（先頭3列）と次の状態を計算
 * 4階層以上は末端ラベルだけを3列目に出し、状態は変えない
 */
export function renderPrefix(
  kind: HierarchyRowKind,
  state: SpanState
): { prefix: RowPrefix; state: SpanState } {
  switch (kind.depth) {
    case 1:
      return {
        prefix: [kind.top, '', ''],
        state: { top: kind.top, second: null },
      }
    case 2:
      return {
        prefix: [spanLabel(kind.top, state.top), kind.second, ''],
        state: { top: kind.top, second: kind.second },
      }
    case 3:
      return {
        prefix: [spanLabel(kind.top, state.top), spanLabel(kind.second, state.second), kind.third],
        state: { top: kind.top, second: kind.second },
      }
    case 'deep':
      return { prefix: ['', '', kind.leaf], state }
  }
}

/**
 * 場所を3列目に "(A, B)" の形で付け足す
 */
export function appendLocations(cell: string, locations: string[]): string {
  if (locations.length === 0) return cell
  const annotation = `(${locations.join(', ')})`
  return cell ? `${cell} ${annotation}` : annotation
}

export function buildScheduleTable(timeSlots: TimeSlot[], groups: ScheduleGroup[]): ScheduleTable {
  if (timeSlots.length === 0) {
    throw new PreconditionError('Time period must be set before building schedule')
  }

  const header: ScheduleRow = [...Array<string>(PREFIX_COLUMNS).fill(''), ...timeSlots]
  const spacer: ScheduleRow = Array<string>(PREFIX_COLUMNS + timeSlots.length).fill('')
  const table: ScheduleTable = [header, spacer]

  // 同じキーになるグループ（"A - B" と "A  - B" など）は後から登録した方で置き換える
  const byKey = new Map<string, { group: ScheduleGroup; key: string[] }>()
  for (const group of groups) {
    const key = getSortKey(group)
    byKey.set(JSON.stringify(key), { group, key })
  }

  const sorted = Array.from(byKey.values()).sort((a, b) => compareSortKeys(a.key, b.key))

  let state = INITIAL_SPAN_STATE
  for (const { group, key } of sorted) {
    const rendered = renderPrefix(classifyRow(key, group.hierarchy.leaf), state)
    state = rendered.state

    const [first, second, third] = rendered.prefix
    const row: ScheduleRow = [first, second, appendLocations(third, group.locations)]
    for (const slot of timeSlots) {
      row.push(group.activities[slot] ?? '')
    }
    table.push(row)
  }

  return table
}
