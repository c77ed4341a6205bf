import { config } from 'dotenv'
config({ path: '.env.local' })

import { ScheduleBuilder, loadScheduleDefinition, applyScheduleDefinition } from '../src/server/schedule'
import { resolveExportConfig } from '../src/lib/exportConfig'
import { toAppError } from '../src/lib/errors'

async function main() {
  const { definitionPath, outputPath } = resolveExportConfig(process.env, process.argv.slice(2))

  const definition = await loadScheduleDefinition(definitionPath)
  const builder = applyScheduleDefinition(new ScheduleBuilder(), definition)
  console.log(`[Export] ${builder.getTimeSlots().length} time slots, ${builder.getGroups().length} groups`)

  await builder.exportToCsv(outputPath)
  console.log(`Schedule created as '${outputPath}'`)
}

main().catch((error: unknown) => {
  const appError = toAppError(error)
  console.error(`[Export] Failed (${appError.code}): ${appError.message}`)
  process.exit(1)
})
