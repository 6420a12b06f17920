export * from './activation'
export * from './affinity'
export * from './async-memo-cache'
export * from './auto-persist'
export * from './builder'
export * from './command'
export * from './derived-property'
export * from './errors'
export * from './expression'
export * from './interaction'
export * from './logging'
export * from './memo-cache'
export * from './message-bus'
export * from './observe'
export * from './reactive-list'
export * from './reactive-object'
export * from './registry'
export * from './routing'
export * from './settings'
export * from './suspension'
export * from './view-for'
export * from './view-locator'
