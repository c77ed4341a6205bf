export * from './schedule'
export * from './config'
