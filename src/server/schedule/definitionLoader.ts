import { promises as fs } from 'fs'
import { z } from 'zod'
import { ScheduleLoadError } from '@/lib/errors'
import { DEFAULT_INTERVAL_MINUTES } from '@/lib/timeUtils'
import type { ScheduleBuilder } from './ScheduleBuilder'

const TimeLabelSchema = z.string().regex(/^\d{4}$/, 'Expected HHMM')

const GroupDefinitionSchema = z.object({
  name: z.string().min(1),
  activities: z.record(z.string(), z.string()).default({}),
  locations: z.array(z.string()).default([]),
})

const ActivityDefinitionSchema = z.object({
  group: z.string().min(1),
  time: TimeLabelSchema,
  activity: z.string(),
  location: z.string().default(''),
})

export const ScheduleDefinitionSchema = z.object({
  timePeriod: z.object({
    start: TimeLabelSchema,
    end: TimeLabelSchema,
    intervalMinutes: z.number().int().positive().default(DEFAULT_INTERVAL_MINUTES),
  }),
  groups: z.array(GroupDefinitionSchema).default([]),
  activities: z.array(ActivityDefinitionSchema).default([]),
})

export type ScheduleDefinition = z.infer<typeof ScheduleDefinitionSchema>

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

export function parseScheduleDefinition(raw: unknown, filePath: string | null = null): ScheduleDefinition {
  const result = ScheduleDefinitionSchema.safeParse(raw)
  if (!result.success) {
    throw new ScheduleLoadError(filePath, `Invalid schedule definition: ${formatIssues(result.error)}`)
  }
  return result.data
}

/**
 * スケジュール定義 JSON を読み込んで検証
 */
export async function loadScheduleDefinition(filePath: string): Promise<ScheduleDefinition> {
  let content: string
  try {
    content = await fs.readFile(filePath, 'utf-8')
  } catch (error) {
    throw new ScheduleLoadError(
      filePath,
      `Failed to read schedule definition: ${filePath}`,
      error instanceof Error ? error : undefined
    )
  }

  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    throw new ScheduleLoadError(
      filePath,
      `Schedule definition is not valid JSON: ${filePath}`,
      error instanceof Error ? error : undefined
    )
  }

  const definition = parseScheduleDefinition(raw, filePath)
  console.log(
    `[ScheduleLoader] Loaded ${definition.groups.length} groups, ${definition.activities.length} activities from ${filePath}`
  )
  return definition
}

// 時間帯 → グループ → 活動の順に適用
export function applyScheduleDefinition(builder: ScheduleBuilder, definition: ScheduleDefinition): ScheduleBuilder {
  const { start, end, intervalMinutes } = definition.timePeriod
  builder.setTimePeriod(start, end, intervalMinutes)

  for (const group of definition.groups) {
    builder.addGroup(group.name, group.activities, group.locations)
  }
  for (const entry of definition.activities) {
    builder.addActivity(entry.group, entry.time, entry.activity, entry.location)
  }

  return builder
}
