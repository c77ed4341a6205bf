/**
 * カスタムエラークラス
 * アプリケーション全体で一貫したエラーハンドリングを実現
 */

// 基底エラークラス
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'AppError'
  }
}

// 前提条件エラー（時間帯未設定のまま表を組み立てた場合など）
export class PreconditionError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, 'PRECONDITION_ERROR', cause)
    this.name = 'PreconditionError'
  }
}

// 設定値エラー（時刻・間隔の不正）
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: Error
  ) {
    super(message, 'CONFIGURATION_ERROR', cause)
    this.name = 'ConfigurationError'
  }
}

// スケジュール定義ファイルの読み込みエラー
export class ScheduleLoadError extends AppError {
  constructor(
    public readonly filePath: string | null,
    message: string,
    cause?: Error
  ) {
    super(message, 'SCHEDULE_LOAD_ERROR', cause)
    this.name = 'ScheduleLoadError'
  }
}

// 出力エラー
export class ExportError extends AppError {
  constructor(
    public readonly filePath: string,
    message: string,
    cause?: Error
  ) {
    super(message, 'EXPORT_ERROR', cause)
    this.name = 'ExportError'
  }
}

/**
 * エラーがAppErrorかどうかを判定
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * unknownエラーをAppErrorに変換
 */
export function toAppError(error: unknown, defaultMessage = 'Unknown error'): AppError {
  if (error instanceof AppError) {
    return error
  }
  if (error instanceof Error) {
    return new AppError(error.message, 'UNKNOWN_ERROR', error)
  }
  return new AppError(defaultMessage, 'UNKNOWN_ERROR')
}
