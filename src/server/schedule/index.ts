export { ScheduleBuilder } from './ScheduleBuilder'
export {
  buildScheduleTable,
  getSortKey,
  compareSortKeys,
  compareCodePoints,
  classifyRow,
  renderPrefix,
  appendLocations,
  INITIAL_SPAN_STATE,
  PREFIX_COLUMNS,
} from './tableBuilder'
export type { HierarchyRowKind, SpanState } from './tableBuilder'
export { stringifyCsv, writeScheduleCsv, CSV_LINE_TERMINATOR } from './csvWriter'
export {
  ScheduleDefinitionSchema,
  parseScheduleDefinition,
  loadScheduleDefinition,
  applyScheduleDefinition,
} from './definitionLoader'
export type { ScheduleDefinition } from './definitionLoader'
