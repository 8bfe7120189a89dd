/**
 * PNG export
 */

export * from './encoder'
