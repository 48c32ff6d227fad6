/**
 * Core module exports.
 *
 * Everything public is exported from here; the package entry
 * re-exports this barrel.
 */

// Levels
export * from './level/index.js'

// Styles
export * from './style/index.js'

// Time
export { formatTime, DEFAULT_TIMESTAMP_FORMAT } from './time.js'
export type { TimeZone } from './time.js'

// Formatting
export * from './format/index.js'

// Configuration
export * from './config/index.js'

// Observer
export { createObserver } from './observer.js'
export type { LoggerEvents, LoggerObserver, SinkName } from './observer.js'

// Logger
export * from './logger/index.js'
