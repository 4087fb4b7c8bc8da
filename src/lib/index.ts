export * from './types'
export * from './errors'
export * from './logger'
export * from './cells'
export * from './hours'
export * from './sequence'
export * from './workpack'
export * from './policy'
export * from './identifier'
export * from './coefficient'
export * from './bonus'
export * from './quality'
export * from './reconcile'
export * from './engine'
export * from './settings'
export * from './xlsx'
export * from './run'
