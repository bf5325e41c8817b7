export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export interface Config {
  // System Config
  dbPath: string
  logLevel: LogLevel
  // List Sync Config
  changeHistoryLimit: number
  mappingConcurrency: number
}
