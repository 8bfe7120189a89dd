/**
 * @asekit/core - Shared image types, errors and logging
 */

export * from './types'
export * from './errors'
export * from './logger'
