export * from './binding-module'
export * from './command-binding'
export * from './converters'
export * from './property-binding'
