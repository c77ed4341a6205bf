import type { ExportConfig } from '@/types'

export const DEFAULT_DEFINITION_PATH = 'data/example-schedule.json'
export const DEFAULT_OUTPUT_PATH = 'example_schedule.csv'

// 空文字は未設定として扱う
function firstNonEmpty(...values: (string | undefined)[]): string | undefined {
  return values.find((value) => value !== undefined && value !== '')
}

/**
 * CLI 引数 > 環境変数 > デフォルト の順で出力設定を決める
 * SCHEDULE_DEFINITION_PATH / SCHEDULE_OUTPUT_PATH
 */
export function resolveExportConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = []
): ExportConfig {
  return {
    definitionPath:
      firstNonEmpty(argv[0], env.SCHEDULE_DEFINITION_PATH) ?? DEFAULT_DEFINITION_PATH,
    outputPath: firstNonEmpty(argv[1], env.SCHEDULE_OUTPUT_PATH) ?? DEFAULT_OUTPUT_PATH,
  }
}
