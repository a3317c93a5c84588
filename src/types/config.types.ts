export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export type DbType = 'sqlite' | 'postgres'

export interface DatabaseConfig {
  dbType: DbType
  dbPath: string
  dbHost: string
  dbPort: number
  dbName: string
  dbUser: string
  dbPassword: string
  dbConnectionString: string
}

export interface Config extends DatabaseConfig {
  // System Config
  baseUrl: string
  port: number
  logLevel: LogLevel
  closeGraceDelay: number
  rateLimitMax: number
  // Import Config
  importBatchSize: number
  // Query Config
  searchLimit: number
  detailCastLimit: number
}
