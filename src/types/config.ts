export interface ExportConfig {
  definitionPath: string  // スケジュール定義 JSON
  outputPath: string      // 出力 CSV
}
